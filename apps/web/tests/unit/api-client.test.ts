import pino from "pino";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ApiClient, type ApiInterceptor } from "@/core/network/api-client";
import { ApiError } from "@/core/network/api-error";
import { createLoggingInterceptor } from "@/core/network/logging-interceptor";
import { createFetchMock, jsonResponse } from "../helpers/fakes";

describe("api client", () => {
  const fetchMock = createFetchMock();

  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("builds urls with query strings and parses JSON", async () => {
    const client = new ApiClient({ baseUrl: "http://localhost:8787/", fetchImpl: fetchMock });
    fetchMock.mockResolvedValueOnce(jsonResponse({ products: [] }));

    const data = await client.get("/products", { query: { skip: 0, limit: 30, q: undefined } });

    expect(data).toEqual({ products: [] });
    expect(fetchMock).toHaveBeenCalledWith(
      "http://localhost:8787/products?skip=0&limit=30",
      expect.objectContaining({ method: "GET", body: undefined }),
    );
  });

  it("sends JSON bodies and the bearer token", async () => {
    const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock });
    client.setAuthToken("test-token");
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "1" }, 201));

    await client.post("/tasks", { title: "Write docs" });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.body).toBe(JSON.stringify({ title: "Write docs" }));
    expect(init?.headers).toMatchObject({ authorization: "Bearer test-token", "content-type": "application/json" });

    client.removeAuthToken();
    expect(client.hasAuthToken()).toBe(false);
  });

  it("turns empty and 204 bodies into an empty object", async () => {
    const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock });
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
    await expect(client.post("/auth/logout")).resolves.toEqual({});
  });

  it("raises ApiError with the body message on non-2xx", async () => {
    const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock });
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "not found", message: "Product with id '9' not found" }, 404));

    const error = await client.get("/products/9").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: "Product with id '9' not found", statusCode: 404 });
  });

  it("falls back to the error field, then a generic message", async () => {
    const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock });
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "invalid body" }, 400));
    await expect(client.post("/tasks", {})).rejects.toMatchObject({ message: "invalid body", statusCode: 400 });

    fetchMock.mockResolvedValueOnce(jsonResponse({}, 500));
    await expect(client.get("/tasks")).rejects.toMatchObject({ message: "Request failed", statusCode: 500 });
  });

  it("maps transport failures to status 0", async () => {
    const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock });
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(client.get("/products")).rejects.toMatchObject({
      message: "No internet connection. Please check your network.",
      statusCode: 0,
    });
  });

  it("times out slow requests", async () => {
    vi.useFakeTimers();
    try {
      const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock, timeoutMs: 50 });
      fetchMock.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
          }),
      );
      const pending = client.get("/products").catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(50);
      await expect(pending).resolves.toMatchObject({ message: "Connection timeout. Please try again.", statusCode: 0 });
    } finally {
      vi.useRealTimers();
    }
  });

  it("notifies interceptors", async () => {
    const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock });
    const interceptor = { onRequest: vi.fn(), onResponse: vi.fn(), onError: vi.fn() } satisfies ApiInterceptor;
    client.addInterceptor(interceptor);

    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));
    await client.get("/health");
    expect(interceptor.onRequest).toHaveBeenCalledWith(expect.objectContaining({ method: "GET", url: "http://localhost:8787/health" }));
    expect(interceptor.onResponse).toHaveBeenCalledWith(expect.objectContaining({ status: 200, data: { ok: true } }));

    fetchMock.mockResolvedValueOnce(jsonResponse({ message: "nope" }, 401));
    await client.get("/tasks").catch(() => undefined);
    expect(interceptor.onError).toHaveBeenCalledWith(expect.objectContaining({ statusCode: 401 }), expect.anything());

    client.clearInterceptors();
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));
    await client.get("/health");
    expect(interceptor.onRequest).toHaveBeenCalledTimes(2);
  });
});

describe("logging interceptor", () => {
  it("logs requests with the bearer token redacted", async () => {
    const logger = pino({ level: "silent" });
    const debug = vi.spyOn(logger, "debug");
    const warn = vi.spyOn(logger, "warn");
    const fetchMock = createFetchMock();
    const client = new ApiClient({ baseUrl: "http://localhost:8787", fetchImpl: fetchMock });
    client.addInterceptor(createLoggingInterceptor(logger));
    client.setAuthToken("test-token");

    fetchMock.mockResolvedValueOnce(jsonResponse([]));
    await client.get("/tasks");
    expect(debug).toHaveBeenCalledWith(
      {
        method: "GET",
        url: "http://localhost:8787/tasks",
        headers: { "content-type": "application/json", accept: "application/json", authorization: "Bearer ***" },
      },
      "api request",
    );
    expect(debug).toHaveBeenCalledWith(expect.objectContaining({ status: 200 }), "api response");

    fetchMock.mockResolvedValueOnce(jsonResponse({ message: "Task title is required" }, 400));
    await client.post("/tasks", {}).catch(() => undefined);
    expect(warn).toHaveBeenCalledWith(
      { method: "POST", url: "http://localhost:8787/tasks", status: 400, message: "Task title is required" },
      "api error",
    );
  });
});
