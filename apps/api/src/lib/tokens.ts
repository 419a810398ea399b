import crypto from "node:crypto";
import { z } from "zod";

const sessionTokenPayloadSchema = z.object({
  sub: z.string(),
  email: z.string(),
  kind: z.enum(["access", "refresh"]),
  exp: z.number(),
  nonce: z.string(),
});

type SessionTokenPayload = z.infer<typeof sessionTokenPayloadSchema>;

export type IssuedSession = {
  token: string;
  refreshToken: string;
  userId: string;
  expiresIn: number;
};

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function base64urlEncode(input: string): string {
  return Buffer.from(input, "utf8").toString("base64url");
}

function base64urlDecode(input: string): string {
  return Buffer.from(input, "base64url").toString("utf8");
}

function signPayload(encodedPayload: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(encodedPayload).digest("base64url");
}

function secureEqualString(left: string, right: string): boolean {
  const leftBuf = Buffer.from(left);
  const rightBuf = Buffer.from(right);
  if (leftBuf.length !== rightBuf.length) {
    return false;
  }
  return crypto.timingSafeEqual(leftBuf, rightBuf);
}

function encodeToken(payload: SessionTokenPayload, secret: string): string {
  const encodedPayload = base64urlEncode(JSON.stringify(payload));
  return `${encodedPayload}.${signPayload(encodedPayload, secret)}`;
}

export function userIdForEmail(email: string): string {
  const digest = crypto.createHash("sha256").update(email.trim().toLowerCase()).digest("hex");
  return `user_${digest.slice(0, 12)}`;
}

export function issueSession(email: string, secret: string, ttlSeconds: number): IssuedSession {
  const normalized = email.trim().toLowerCase();
  const userId = userIdForEmail(normalized);
  const now = nowSeconds();
  const token = encodeToken(
    { sub: userId, email: normalized, kind: "access", exp: now + ttlSeconds, nonce: crypto.randomUUID() },
    secret,
  );
  // refresh tokens outlive the access token by a week
  const refreshToken = encodeToken(
    { sub: userId, email: normalized, kind: "refresh", exp: now + ttlSeconds + 7 * 24 * 60 * 60, nonce: crypto.randomUUID() },
    secret,
  );
  return { token, refreshToken, userId, expiresIn: ttlSeconds };
}

export function verifyToken(token: string, secret: string, kind: SessionTokenPayload["kind"]): SessionTokenPayload | null {
  const separator = token.lastIndexOf(".");
  if (separator <= 0) {
    return null;
  }
  const encodedPayload = token.slice(0, separator);
  const signature = token.slice(separator + 1);
  if (!secureEqualString(signature, signPayload(encodedPayload, secret))) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(base64urlDecode(encodedPayload));
  } catch {
    return null;
  }
  const payload = sessionTokenPayloadSchema.safeParse(parsed);
  if (!payload.success || payload.data.kind !== kind) {
    return null;
  }
  if (payload.data.exp < nowSeconds()) {
    return null;
  }
  return payload.data;
}
