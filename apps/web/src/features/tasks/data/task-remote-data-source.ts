import type { ApiClient } from "@/core/network/api-client";
import { AppUrls } from "@/core/network/app-urls";
import { taskListSchema, taskModelSchema, type CreateTaskInput, type TaskModel } from "@/features/tasks/model/task-model";

export interface TaskRemoteDataSource {
  getTasks(): Promise<TaskModel[]>;
  createTask(input: CreateTaskInput): Promise<TaskModel>;
}

export class TaskRemoteDataSourceImpl implements TaskRemoteDataSource {
  constructor(private readonly client: ApiClient) {}

  async getTasks(): Promise<TaskModel[]> {
    return taskListSchema.parse(await this.client.get(AppUrls.tasks));
  }

  async createTask(input: CreateTaskInput): Promise<TaskModel> {
    return taskModelSchema.parse(await this.client.post(AppUrls.tasks, input));
  }
}
