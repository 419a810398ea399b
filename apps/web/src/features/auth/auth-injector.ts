import type { Locator } from "@/core/di/registry";
import { createLogger } from "@/core/logging/logger";
import { AuthRemoteDataSourceImpl } from "@/features/auth/data/auth-remote-data-source";
import { AuthRepositoryImpl } from "@/features/auth/data/auth-repository-impl";
import {
  IsAuthenticatedUseCase,
  LoginUseCase,
  LogoutUseCase,
  VerifyOtpUseCase,
} from "@/features/auth/domain/auth-use-cases";
import { createAuthStore } from "@/features/auth/presentation/auth-store";

export function initAuthInjector(sl: Locator): void {
  sl.registerLazySingleton(
    "authRemoteDataSource",
    () => new AuthRemoteDataSourceImpl(sl.get("apiClient"), { useMockData: sl.get("config").useMockData }),
  );
  sl.registerLazySingleton(
    "authRepository",
    () =>
      new AuthRepositoryImpl(
        sl.get("authRemoteDataSource"),
        sl.get("appPref"),
        sl.get("apiClient"),
        createLogger(sl.get("logger"), "auth"),
      ),
  );
  sl.registerLazySingleton("loginUseCase", () => new LoginUseCase(sl.get("authRepository")));
  sl.registerLazySingleton("verifyOtpUseCase", () => new VerifyOtpUseCase(sl.get("authRepository")));
  sl.registerLazySingleton("logoutUseCase", () => new LogoutUseCase(sl.get("authRepository")));
  sl.registerLazySingleton("isAuthenticatedUseCase", () => new IsAuthenticatedUseCase(sl.get("authRepository")));
  sl.registerLazySingleton("authStore", () =>
    createAuthStore({
      login: sl.get("loginUseCase"),
      verifyOtp: sl.get("verifyOtpUseCase"),
      logout: sl.get("logoutUseCase"),
      isAuthenticated: sl.get("isAuthenticatedUseCase"),
    }),
  );
}
