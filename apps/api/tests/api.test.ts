import { hashSync } from "bcryptjs";
import { beforeEach, describe, expect, it } from "vitest";
import { loadEnv } from "../src/config/env.js";
import { buildApp } from "../src/lib/app.js";
import { verifyToken } from "../src/lib/tokens.js";
import { MemoryStore } from "../src/services/memory-store.js";

describe("sample-architecture-api", () => {
  let store: MemoryStore;
  const env = loadEnv({});

  beforeEach(() => {
    store = new MemoryStore();
  });

  it("reports health", async () => {
    const app = await buildApp(store, env, { logger: false });
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, mode: "memory" });
  });

  it("pages through products with skip and limit", async () => {
    const app = await buildApp(store, env, { logger: false });

    const first = await app.inject({ method: "GET", url: "/products?skip=0&limit=10" });
    expect(first.statusCode).toBe(200);
    const firstPage = first.json();
    expect(firstPage.total).toBe(42);
    expect(firstPage.skip).toBe(0);
    expect(firstPage.limit).toBe(10);
    expect(firstPage.products).toHaveLength(10);
    expect(firstPage.products[0].id).toBe(1);

    const last = await app.inject({ method: "GET", url: "/products?skip=40&limit=10" });
    const lastPage = last.json();
    expect(lastPage.products.map((p: { id: number }) => p.id)).toEqual([41, 42]);
  });

  it("defaults to 30 products and returns everything for limit=0", async () => {
    const app = await buildApp(store, env, { logger: false });

    const defaults = await app.inject({ method: "GET", url: "/products" });
    expect(defaults.json().products).toHaveLength(30);
    expect(defaults.json().limit).toBe(30);

    const all = await app.inject({ method: "GET", url: "/products?limit=0" });
    expect(all.json().products).toHaveLength(42);
    expect(all.json().limit).toBe(42);
  });

  it("rejects invalid pagination", async () => {
    const app = await buildApp(store, env, { logger: false });
    const res = await app.inject({ method: "GET", url: "/products?limit=500" });
    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("Invalid pagination parameters");
  });

  it("finds a product by id and 404s on a missing one", async () => {
    const app = await buildApp(store, env, { logger: false });

    const found = await app.inject({ method: "GET", url: "/products/15" });
    expect(found.statusCode).toBe(200);
    expect(found.json().title).toBe("Aero 14 Ultrabook");

    const missing = await app.inject({ method: "GET", url: "/products/999" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json().message).toBe("Product with id '999' not found");
  });

  it("filters by category and searches", async () => {
    const app = await buildApp(store, env, { logger: false });

    const laptops = await app.inject({ method: "GET", url: "/products/category/laptops" });
    expect(laptops.json().total).toBe(4);
    expect(laptops.json().products.map((p: { id: number }) => p.id)).toEqual([15, 16, 17, 18]);

    const search = await app.inject({ method: "GET", url: "/products/search?q=voltbyte" });
    expect(search.json().total).toBe(2);
    expect(search.json().products.map((p: { id: number }) => p.id)).toEqual([15, 17]);
  });

  it("logs in any user when no password hash is configured", async () => {
    const app = await buildApp(store, env, { logger: false });
    const res = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { email: "Demo@Example.com", password: "anything" },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.success).toBe(true);
    expect(body.email).toBe("demo@example.com");
    expect(body.expiresIn).toBe(86400);
    expect(body.userId).toMatch(/^user_[0-9a-f]{12}$/);
    expect(verifyToken(body.token, env.TOKEN_SECRET, "access")?.email).toBe("demo@example.com");
  });

  it("checks the password against a configured bcrypt hash", async () => {
    const guarded = loadEnv({ DEMO_PASSWORD_BCRYPT: hashSync("test-password", 4) });
    const app = await buildApp(store, guarded, { logger: false });

    const rejected = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { email: "demo@example.com", password: "wrong-password" },
    });
    expect(rejected.statusCode).toBe(401);
    expect(rejected.json()).toMatchObject({ success: false, message: "Invalid email or password" });

    const accepted = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { email: "demo@example.com", password: "test-password" },
    });
    expect(accepted.statusCode).toBe(200);
  });

  it("rejects a malformed login body", async () => {
    const app = await buildApp(store, env, { logger: false });
    const res = await app.inject({ method: "POST", url: "/auth/login", payload: { email: "not-an-email" } });
    expect(res.statusCode).toBe(400);
  });

  it("verifies the demo otp code", async () => {
    const app = await buildApp(store, env, { logger: false });

    const bad = await app.inject({
      method: "POST",
      url: "/auth/verify-otp",
      payload: { email: "demo@example.com", otp: "000000" },
    });
    expect(bad.statusCode).toBe(401);

    const good = await app.inject({
      method: "POST",
      url: "/auth/verify-otp",
      payload: { email: "demo@example.com", otp: "123456" },
    });
    expect(good.statusCode).toBe(200);
    expect(good.json().message).toBe("Verification successful");
  });

  it("refreshes a session only with a refresh token", async () => {
    const app = await buildApp(store, env, { logger: false });
    const login = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { email: "demo@example.com", password: "anything" },
    });
    const { token, refreshToken } = login.json();

    const withAccess = await app.inject({ method: "POST", url: "/auth/refresh", payload: { refreshToken: token } });
    expect(withAccess.statusCode).toBe(401);

    const refreshed = await app.inject({ method: "POST", url: "/auth/refresh", payload: { refreshToken } });
    expect(refreshed.statusCode).toBe(200);
    expect(refreshed.json().email).toBe("demo@example.com");
  });

  it("logs out with 204", async () => {
    const app = await buildApp(store, env, { logger: false });
    const res = await app.inject({ method: "POST", url: "/auth/logout" });
    expect(res.statusCode).toBe(204);
  });

  it("creates and lists tasks newest first", async () => {
    const app = await buildApp(store, env, { logger: false });

    const first = await app.inject({ method: "POST", url: "/tasks", payload: { title: "Write docs", description: "" } });
    expect(first.statusCode).toBe(201);
    expect(first.json()).toMatchObject({ title: "Write docs", isCompleted: false });
    await app.inject({ method: "POST", url: "/tasks", payload: { title: "Ship release", description: "v1" } });

    const list = await app.inject({ method: "GET", url: "/tasks" });
    expect(list.json().map((t: { title: string }) => t.title)).toEqual(["Ship release", "Write docs"]);

    const invalid = await app.inject({ method: "POST", url: "/tasks", payload: { title: "  " } });
    expect(invalid.statusCode).toBe(400);
  });

  it("creates and lists notes", async () => {
    const app = await buildApp(store, env, { logger: false });
    const created = await app.inject({ method: "POST", url: "/notes", payload: { title: "Layers", content: "domain has no deps" } });
    expect(created.statusCode).toBe(201);
    expect(created.json().content).toBe("domain has no deps");

    const list = await app.inject({ method: "GET", url: "/notes" });
    expect(list.json()).toHaveLength(1);
  });
});
