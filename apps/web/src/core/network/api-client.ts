import { ApiError, NO_INTERNET_MESSAGE, TIMEOUT_MESSAGE } from "@/core/network/api-error";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | null | undefined;

export type RequestOptions = {
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
};

export type ApiRequest = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
};

export type ApiResponse = {
  request: ApiRequest;
  status: number;
  data: unknown;
  durationMs: number;
};

export interface ApiInterceptor {
  onRequest?(request: ApiRequest): void;
  onResponse?(response: ApiResponse): void;
  onError?(error: ApiError, request: ApiRequest): void;
}

export type ApiClientOptions = {
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

function encodeQuery(params: Record<string, QueryValue> | undefined): string {
  if (!params) {
    return "";
  }
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    search.set(key, String(value));
  }
  const query = search.toString();
  return query ? `?${query}` : "";
}

function parseBody(text: string): unknown {
  if (!text.trim()) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { message: text };
  }
}

function messageFromBody(data: unknown): string {
  if (typeof data === "object" && data !== null) {
    if ("message" in data && typeof data.message === "string" && data.message) {
      return data.message;
    }
    if ("error" in data && typeof data.error === "string" && data.error) {
      return data.error;
    }
  }
  return "Request failed";
}

export class ApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;
  private interceptors: ApiInterceptor[] = [];

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.headers = {
      "content-type": "application/json",
      accept: "application/json",
      ...options.defaultHeaders,
    };
  }

  setAuthToken(token: string): void {
    this.headers.authorization = `Bearer ${token}`;
  }

  removeAuthToken(): void {
    delete this.headers.authorization;
  }

  hasAuthToken(): boolean {
    return this.headers.authorization !== undefined;
  }

  addInterceptor(interceptor: ApiInterceptor): void {
    this.interceptors.push(interceptor);
  }

  clearInterceptors(): void {
    this.interceptors = [];
  }

  get(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request("GET", path, undefined, options);
  }

  post(path: string, body?: unknown, options?: RequestOptions): Promise<unknown> {
    return this.request("POST", path, body, options);
  }

  put(path: string, body?: unknown, options?: RequestOptions): Promise<unknown> {
    return this.request("PUT", path, body, options);
  }

  delete(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request("DELETE", path, undefined, options);
  }

  private async request(method: HttpMethod, path: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    const request: ApiRequest = {
      method,
      url: `${this.baseUrl}${path}${encodeQuery(options.query)}`,
      headers: { ...this.headers, ...options.headers },
      body,
    };
    this.interceptors.forEach((interceptor) => interceptor.onRequest?.(request));

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const startedAt = Date.now();

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(request.url, {
          method,
          headers: request.headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          cache: "no-store",
          signal: controller.signal,
        });
      } catch {
        throw new ApiError(timedOut ? TIMEOUT_MESSAGE : NO_INTERNET_MESSAGE, 0);
      }

      const data = response.status === 204 ? {} : parseBody(await response.text());
      if (!response.ok) {
        throw new ApiError(messageFromBody(data), response.status, data);
      }
      this.interceptors.forEach((interceptor) =>
        interceptor.onResponse?.({ request, status: response.status, data, durationMs: Date.now() - startedAt }),
      );
      return data;
    } catch (error) {
      const apiError =
        error instanceof ApiError ? error : new ApiError(error instanceof Error ? error.message : "Request failed", 0);
      this.interceptors.forEach((interceptor) => interceptor.onError?.(apiError, request));
      throw apiError;
    } finally {
      clearTimeout(timer);
    }
  }
}
