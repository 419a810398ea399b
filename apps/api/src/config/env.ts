import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  HOST: z.string().min(1).default("0.0.0.0"),
  DEMO_PASSWORD_BCRYPT: z.string().min(1).optional(),
  DEMO_OTP_CODE: z.string().regex(/^\d{6}$/).default("123456"),
  TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(60 * 60 * 24 * 30).default(86400),
  TOKEN_SECRET: z.string().min(8).default("local-dev-token-secret"),
});

export type ApiEnv = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): ApiEnv {
  const parsed = envSchema.safeParse({
    PORT: source.PORT,
    HOST: source.HOST,
    DEMO_PASSWORD_BCRYPT: source.DEMO_PASSWORD_BCRYPT?.trim() || undefined,
    DEMO_OTP_CODE: source.DEMO_OTP_CODE,
    TOKEN_TTL_SECONDS: source.TOKEN_TTL_SECONDS,
    TOKEN_SECRET: source.TOKEN_SECRET?.trim() || undefined,
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ");
    throw new Error(`invalid api environment: ${detail}`);
  }
  return parsed.data;
}
