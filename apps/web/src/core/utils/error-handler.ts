import { ApiError } from "@/core/network/api-error";

export const UNEXPECTED_ERROR_MESSAGE = "An unexpected error occurred. Please try again.";

export function getErrorMessage(error: unknown): string {
  if (error instanceof ApiError) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.message || UNEXPECTED_ERROR_MESSAGE;
  }
  if (typeof error === "string") {
    return error;
  }
  return UNEXPECTED_ERROR_MESSAGE;
}

export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof ApiError)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return error.statusCode === 0 || message.includes("network") || message.includes("connection");
}

export function isAuthError(error: unknown): boolean {
  return error instanceof ApiError && (error.statusCode === 401 || error.statusCode === 403);
}

export function isServerError(error: unknown): boolean {
  return error instanceof ApiError && error.statusCode >= 500;
}

export function isClientError(error: unknown): boolean {
  return error instanceof ApiError && error.statusCode >= 400 && error.statusCode < 500;
}
