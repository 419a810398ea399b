import { describe, expect, it } from "vitest";
import { issueSession, userIdForEmail, verifyToken } from "../src/lib/tokens.js";

const secret = "test-secret";

describe("session tokens", () => {
  it("derives a stable user id from the normalized email", () => {
    expect(userIdForEmail(" Demo@Example.com ")).toBe(userIdForEmail("demo@example.com"));
    expect(userIdForEmail("demo@example.com")).toMatch(/^user_[0-9a-f]{12}$/);
  });

  it("issues access and refresh tokens that verify by kind", () => {
    const session = issueSession("demo@example.com", secret, 60);
    expect(session.expiresIn).toBe(60);
    expect(verifyToken(session.token, secret, "access")?.sub).toBe(session.userId);
    expect(verifyToken(session.refreshToken, secret, "refresh")?.email).toBe("demo@example.com");
    expect(verifyToken(session.token, secret, "refresh")).toBeNull();
  });

  it("rejects a token signed with another secret", () => {
    const session = issueSession("demo@example.com", secret, 60);
    expect(verifyToken(session.token, "other-secret", "access")).toBeNull();
  });

  it("rejects malformed and expired tokens", () => {
    expect(verifyToken("garbage", secret, "access")).toBeNull();
    const expired = issueSession("demo@example.com", secret, -10);
    expect(verifyToken(expired.token, secret, "access")).toBeNull();
  });
});
