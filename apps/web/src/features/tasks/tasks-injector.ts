import type { Locator } from "@/core/di/registry";
import { createLogger } from "@/core/logging/logger";
import { TaskLocalDataSourceImpl } from "@/features/tasks/data/task-local-data-source";
import { TaskRemoteDataSourceImpl } from "@/features/tasks/data/task-remote-data-source";
import { TaskRepository } from "@/features/tasks/data/task-repository";
import { createTaskViewModel } from "@/features/tasks/viewmodel/task-view-model";

export function initTasksInjector(sl: Locator): void {
  sl.registerLazySingleton("taskRemoteDataSource", () => new TaskRemoteDataSourceImpl(sl.get("apiClient")));
  sl.registerLazySingleton("taskLocalDataSource", () => new TaskLocalDataSourceImpl(sl.get("appPref")));
  sl.registerLazySingleton(
    "taskRepository",
    () =>
      new TaskRepository(sl.get("taskRemoteDataSource"), sl.get("taskLocalDataSource"), createLogger(sl.get("logger"), "tasks")),
  );
  sl.registerFactory("taskViewModel", () => createTaskViewModel(sl.get("taskRepository")));
}
