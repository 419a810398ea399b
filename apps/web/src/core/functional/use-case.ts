import type { Result } from "@/core/functional/result";

export interface UseCase<T, P> {
  execute(params: P): Promise<Result<T>>;
}

export interface UseCaseNoParams<T> {
  execute(): Promise<Result<T>>;
}
