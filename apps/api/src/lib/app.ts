import cors from "@fastify/cors";
import { compare } from "bcryptjs";
import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import type { ApiEnv } from "../config/env.js";
import type { DataStore } from "../services/store.js";
import {
  createNoteInputSchema,
  createTaskInputSchema,
  loginInputSchema,
  productsQuerySchema,
  refreshInputSchema,
  searchProductsQuerySchema,
  verifyOtpInputSchema,
  type LoginResponse,
} from "./schemas.js";
import { issueSession, verifyToken } from "./tokens.js";

export type BuildAppOptions = {
  logger?: boolean;
};

function toLoginResponse(email: string, env: ApiEnv, message: string): LoginResponse {
  const session = issueSession(email, env.TOKEN_SECRET, env.TOKEN_TTL_SECONDS);
  return {
    success: true,
    message,
    token: session.token,
    userId: session.userId,
    email: email.trim().toLowerCase(),
    refreshToken: session.refreshToken,
    expiresIn: session.expiresIn,
  };
}

export async function buildApp(store: DataStore, env: ApiEnv, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? true,
  });

  await app.register(cors, {
    origin: true,
  });

  app.get("/health", async () => {
    return { ok: true, mode: store.kind() };
  });

  app.post("/auth/login", async (request, reply) => {
    const parsed = loginInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "invalid body", message: "Email and password are required", detail: parsed.error.issues });
    }

    if (env.DEMO_PASSWORD_BCRYPT) {
      const validPassword = await compare(parsed.data.password, env.DEMO_PASSWORD_BCRYPT);
      if (!validPassword) {
        request.log.warn({ email: parsed.data.email }, "login rejected");
        return reply.status(401).send({ success: false, error: "invalid_credentials", message: "Invalid email or password" });
      }
    }

    return toLoginResponse(parsed.data.email, env, "Login successful");
  });

  app.post("/auth/verify-otp", async (request, reply) => {
    const parsed = verifyOtpInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "invalid body", message: "A 6 digit code is required", detail: parsed.error.issues });
    }
    if (parsed.data.otp !== env.DEMO_OTP_CODE) {
      return reply.status(401).send({ success: false, error: "invalid_otp", message: "Invalid verification code" });
    }
    return toLoginResponse(parsed.data.email, env, "Verification successful");
  });

  app.post("/auth/refresh", async (request, reply) => {
    const parsed = refreshInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "invalid body", message: "Refresh token is required" });
    }
    const payload = verifyToken(parsed.data.refreshToken, env.TOKEN_SECRET, "refresh");
    if (!payload) {
      return reply.status(401).send({ success: false, error: "invalid_refresh_token", message: "Session expired. Please log in again." });
    }
    return toLoginResponse(payload.email, env, "Token refreshed");
  });

  app.post("/auth/logout", async (_request, reply) => {
    return reply.status(204).send();
  });

  app.get("/products", async (request, reply) => {
    const query = productsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.status(400).send({ error: "invalid query", message: "Invalid pagination parameters" });
    }
    return store.listProducts(query.data);
  });

  app.get("/products/search", async (request, reply) => {
    const query = searchProductsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.status(400).send({ error: "invalid query", message: "Invalid search parameters" });
    }
    const { q, ...page } = query.data;
    return store.searchProducts(q, page);
  });

  app.get("/products/category/:category", async (request, reply) => {
    const params = z.object({ category: z.string().min(1) }).safeParse(request.params);
    const query = productsQuerySchema.safeParse(request.query ?? {});
    if (!params.success || !query.success) {
      return reply.status(400).send({ error: "invalid request", message: "Invalid category request" });
    }
    return store.listProductsByCategory(params.data.category, query.data);
  });

  app.get("/products/:id", async (request, reply) => {
    const params = z.object({ id: z.coerce.number().int().positive() }).safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: "invalid id", message: "Invalid product id" });
    }
    const product = await store.getProduct(params.data.id);
    if (!product) {
      return reply.status(404).send({ error: "not found", message: `Product with id '${params.data.id}' not found` });
    }
    return product;
  });

  app.get("/tasks", async () => {
    return store.listTasks();
  });

  app.post("/tasks", async (request, reply) => {
    const parsed = createTaskInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "invalid body", message: "Task title is required", detail: parsed.error.issues });
    }
    const task = await store.createTask(parsed.data);
    return reply.status(201).send(task);
  });

  app.get("/notes", async () => {
    return store.listNotes();
  });

  app.post("/notes", async (request, reply) => {
    const parsed = createNoteInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "invalid body", message: "Note title is required", detail: parsed.error.issues });
    }
    const note = await store.createNote(parsed.data);
    return reply.status(201).send(note);
  });

  return app;
}
