import { err, ok, type Result } from "@/core/functional/result";
import type { Logger } from "@/core/logging/logger";
import type { ApiClient } from "@/core/network/api-client";
import type { AppPref } from "@/core/storage/app-pref";
import { getErrorMessage } from "@/core/utils/error-handler";
import type { AuthRemoteDataSource } from "@/features/auth/data/auth-remote-data-source";
import { toLoginEntity, type LoginResponse } from "@/features/auth/data/login-response";
import type { AuthRepository } from "@/features/auth/domain/auth-repository";
import type { LoginEntity, LoginParams, VerifyOtpParams } from "@/features/auth/domain/login";

export class AuthRepositoryImpl implements AuthRepository {
  constructor(
    private readonly remote: AuthRemoteDataSource,
    private readonly pref: AppPref,
    private readonly client: ApiClient,
    private readonly logger: Logger,
  ) {}

  /** Checks the credentials only; the session starts once the code is verified. */
  async loginUser(params: LoginParams): Promise<Result<LoginEntity>> {
    try {
      return ok(toLoginEntity(await this.remote.login(params)));
    } catch (error) {
      return err(getErrorMessage(error));
    }
  }

  verifyOtp(params: VerifyOtpParams): Promise<Result<LoginEntity>> {
    return this.startSession(() => this.remote.verifyOtp(params));
  }

  async logout(): Promise<Result<void>> {
    try {
      await this.remote.logout();
    } catch (error) {
      this.logger.warn({ err: error }, "remote logout failed, clearing local session anyway");
    }
    try {
      await this.pref.clearSession();
      this.client.removeAuthToken();
      return ok(undefined);
    } catch (error) {
      this.client.removeAuthToken();
      return err(getErrorMessage(error));
    }
  }

  async isAuthenticated(): Promise<Result<boolean>> {
    try {
      const [loggedIn, token] = await Promise.all([this.pref.getLoginStatus(), this.pref.getToken()]);
      const authenticated = loggedIn && token !== "";
      if (authenticated && !this.client.hasAuthToken()) {
        this.client.setAuthToken(token);
      }
      return ok(authenticated);
    } catch (error) {
      return err(getErrorMessage(error));
    }
  }

  private async startSession(request: () => Promise<LoginResponse>): Promise<Result<LoginEntity>> {
    try {
      const entity = toLoginEntity(await request());
      await this.pref.setToken(entity.token);
      await this.pref.setUserId(entity.userId);
      if (entity.refreshToken) {
        await this.pref.setRefreshToken(entity.refreshToken);
      }
      await this.pref.setLoginStatus(true);
      this.client.setAuthToken(entity.token);
      this.logger.info({ userId: entity.userId }, "session started");
      return ok(entity);
    } catch (error) {
      return err(getErrorMessage(error));
    }
  }
}
