import { AppPrefKeys, type AppPref } from "@/core/storage/app-pref";
import { taskListSchema, type TaskModel } from "@/features/tasks/model/task-model";

export interface TaskLocalDataSource {
  getTasks(): Promise<TaskModel[]>;
  saveTasks(tasks: TaskModel[]): Promise<void>;
  saveTask(task: TaskModel): Promise<void>;
}

export class TaskLocalDataSourceImpl implements TaskLocalDataSource {
  constructor(private readonly pref: AppPref) {}

  async getTasks(): Promise<TaskModel[]> {
    const raw = await this.pref.getString(AppPrefKeys.tasks);
    if (!raw) {
      return [];
    }
    return taskListSchema.parse(JSON.parse(raw));
  }

  async saveTasks(tasks: TaskModel[]): Promise<void> {
    await this.pref.setString(AppPrefKeys.tasks, JSON.stringify(tasks));
  }

  async saveTask(task: TaskModel): Promise<void> {
    const tasks = await this.getTasks();
    const index = tasks.findIndex((t) => t.id === task.id);
    if (index >= 0) {
      tasks[index] = task;
    } else {
      tasks.push(task);
    }
    await this.saveTasks(tasks);
  }
}
