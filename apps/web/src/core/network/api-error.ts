export class ApiError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly data?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export const TIMEOUT_MESSAGE = "Connection timeout. Please try again.";
export const NO_INTERNET_MESSAGE = "No internet connection. Please check your network.";
