import { z } from "zod";
import type { LoginEntity } from "@/features/auth/domain/login";

/** Accepts both camelCase and snake_case field names. */
export const loginResponseSchema = z
  .object({
    token: z.string().min(1),
    userId: z.string().optional(),
    user_id: z.string().optional(),
    email: z.string(),
    refreshToken: z.string().optional(),
    refresh_token: z.string().optional(),
    expiresIn: z.number().int().optional(),
    expires_in: z.number().int().optional(),
  })
  .transform((raw) => ({
    token: raw.token,
    userId: raw.userId ?? raw.user_id ?? "",
    email: raw.email,
    refreshToken: raw.refreshToken ?? raw.refresh_token,
    expiresIn: raw.expiresIn ?? raw.expires_in,
  }));

export type LoginResponse = z.output<typeof loginResponseSchema>;

export const mockLoginResponse = {
  success: true,
  message: "Login successful (Mock)",
  token: "mock_jwt_token_12345",
  userId: "mock_user_123",
  email: "test@example.com",
  refreshToken: "mock_refresh_token_12345",
  expiresIn: 86400,
};

export const MOCK_OTP_CODE = "123456";

export function toLoginEntity(response: LoginResponse, now: number = Date.now()): LoginEntity {
  const entity: LoginEntity = {
    token: response.token,
    userId: response.userId,
    email: response.email,
  };
  if (response.refreshToken) {
    entity.refreshToken = response.refreshToken;
  }
  if (response.expiresIn !== undefined) {
    entity.expiresAt = new Date(now + response.expiresIn * 1000);
  }
  return entity;
}
