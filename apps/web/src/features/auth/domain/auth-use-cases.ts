import type { Result } from "@/core/functional/result";
import type { UseCase, UseCaseNoParams } from "@/core/functional/use-case";
import type { AuthRepository } from "@/features/auth/domain/auth-repository";
import type { LoginEntity, LoginParams, VerifyOtpParams } from "@/features/auth/domain/login";

export class LoginUseCase implements UseCase<LoginEntity, LoginParams> {
  constructor(private readonly repository: AuthRepository) {}

  execute(params: LoginParams): Promise<Result<LoginEntity>> {
    return this.repository.loginUser({ email: params.email.trim(), password: params.password });
  }
}

export class VerifyOtpUseCase implements UseCase<LoginEntity, VerifyOtpParams> {
  constructor(private readonly repository: AuthRepository) {}

  execute(params: VerifyOtpParams): Promise<Result<LoginEntity>> {
    return this.repository.verifyOtp({ email: params.email.trim(), otp: params.otp.trim() });
  }
}

export class LogoutUseCase implements UseCaseNoParams<void> {
  constructor(private readonly repository: AuthRepository) {}

  execute(): Promise<Result<void>> {
    return this.repository.logout();
  }
}

export class IsAuthenticatedUseCase implements UseCaseNoParams<boolean> {
  constructor(private readonly repository: AuthRepository) {}

  execute(): Promise<Result<boolean>> {
    return this.repository.isAuthenticated();
  }
}
