import type { Logger } from "@/core/logging/logger";
import type { ApiInterceptor } from "@/core/network/api-client";

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const out = { ...headers };
  if (out.authorization) {
    out.authorization = "Bearer ***";
  }
  return out;
}

export function createLoggingInterceptor(logger: Logger): ApiInterceptor {
  return {
    onRequest(request) {
      logger.debug({ method: request.method, url: request.url, headers: redactHeaders(request.headers) }, "api request");
    },
    onResponse(response) {
      logger.debug(
        { method: response.request.method, url: response.request.url, status: response.status, durationMs: response.durationMs },
        "api response",
      );
    },
    onError(error, request) {
      logger.warn({ method: request.method, url: request.url, status: error.statusCode, message: error.message }, "api error");
    },
  };
}
