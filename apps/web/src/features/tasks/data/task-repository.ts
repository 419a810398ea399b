import { err, ok, type Result } from "@/core/functional/result";
import type { Logger } from "@/core/logging/logger";
import { getErrorMessage } from "@/core/utils/error-handler";
import type { TaskLocalDataSource } from "@/features/tasks/data/task-local-data-source";
import type { TaskRemoteDataSource } from "@/features/tasks/data/task-remote-data-source";
import type { CreateTaskInput, TaskModel } from "@/features/tasks/model/task-model";

export class TaskRepository {
  constructor(
    private readonly remote: TaskRemoteDataSource,
    private readonly local: TaskLocalDataSource,
    private readonly logger: Logger,
  ) {}

  async getTasks(): Promise<Result<TaskModel[]>> {
    try {
      const tasks = await this.remote.getTasks();
      await this.local.saveTasks(tasks);
      return ok(tasks);
    } catch (error) {
      this.logger.warn({ err: error }, "remote tasks failed, reading local copy");
    }
    try {
      return ok(await this.local.getTasks());
    } catch (error) {
      return err(`Failed to load tasks: ${getErrorMessage(error)}`);
    }
  }

  async createTask(input: CreateTaskInput): Promise<Result<TaskModel>> {
    try {
      const task = await this.remote.createTask(input);
      await this.local.saveTask(task);
      return ok(task);
    } catch (error) {
      return err(`Failed to create task: ${getErrorMessage(error)}`);
    }
  }
}
