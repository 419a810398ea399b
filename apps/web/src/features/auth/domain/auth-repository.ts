import type { Result } from "@/core/functional/result";
import type { LoginEntity, LoginParams, VerifyOtpParams } from "@/features/auth/domain/login";

export interface AuthRepository {
  /** Does not persist anything; `verifyOtp` starts the session. */
  loginUser(params: LoginParams): Promise<Result<LoginEntity>>;
  verifyOtp(params: VerifyOtpParams): Promise<Result<LoginEntity>>;
  logout(): Promise<Result<void>>;
  /** Also restores the bearer token on the API client for a persisted session. */
  isAuthenticated(): Promise<Result<boolean>>;
}
