import { createStore, type StoreApi } from "zustand/vanilla";
import type { TaskRepository } from "@/features/tasks/data/task-repository";
import type { CreateTaskInput, TaskModel } from "@/features/tasks/model/task-model";

export type TaskViewState = {
  tasks: TaskModel[];
  isLoading: boolean;
  errorMessage: string | null;
  loadTasks: () => Promise<void>;
  createTask: (input: CreateTaskInput) => Promise<boolean>;
};

export type TaskViewModel = StoreApi<TaskViewState>;

export function createTaskViewModel(repository: Pick<TaskRepository, "getTasks" | "createTask">): TaskViewModel {
  return createStore<TaskViewState>((set, get) => ({
    tasks: [],
    isLoading: false,
    errorMessage: null,

    loadTasks: async () => {
      set({ isLoading: true, errorMessage: null });
      const result = await repository.getTasks();
      if (!result.ok) {
        set({ isLoading: false, errorMessage: result.error });
        return;
      }
      set({ tasks: result.value, isLoading: false });
    },

    createTask: async (input) => {
      set({ isLoading: true, errorMessage: null });
      const result = await repository.createTask(input);
      if (!result.ok) {
        set({ isLoading: false, errorMessage: result.error });
        return false;
      }
      set({ tasks: [result.value, ...get().tasks], isLoading: false });
      return true;
    },
  }));
}
