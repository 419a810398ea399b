import { createStore, type StoreApi } from "zustand/vanilla";
import type { StateStatus } from "@/core/functional/state-status";
import type {
  IsAuthenticatedUseCase,
  LoginUseCase,
  LogoutUseCase,
  VerifyOtpUseCase,
} from "@/features/auth/domain/auth-use-cases";
import type { LoginEntity, LoginParams, VerifyOtpParams } from "@/features/auth/domain/login";

export type AuthUseCases = {
  login: Pick<LoginUseCase, "execute">;
  verifyOtp: Pick<VerifyOtpUseCase, "execute">;
  logout: Pick<LogoutUseCase, "execute">;
  isAuthenticated: Pick<IsAuthenticatedUseCase, "execute">;
};

export type AuthState = {
  loginStatus: StateStatus;
  verifyOtpStatus: StateStatus;
  loginEntity: LoginEntity | null;
  errorMessage: string | null;
  loginUser: (params: LoginParams) => Promise<boolean>;
  verifyOtp: (params: VerifyOtpParams) => Promise<boolean>;
  logout: () => Promise<void>;
  checkSession: () => Promise<boolean>;
  reset: () => void;
  resetLoginStatus: () => void;
  resetVerifyOtpStatus: () => void;
};

export type AuthStore = StoreApi<AuthState>;

const initialState = {
  loginStatus: "idle",
  verifyOtpStatus: "idle",
  loginEntity: null,
  errorMessage: null,
} satisfies Partial<AuthState>;

export function createAuthStore(useCases: AuthUseCases): AuthStore {
  return createStore<AuthState>((set) => ({
    ...initialState,

    loginUser: async (params) => {
      set({ loginStatus: "loading", errorMessage: null });
      const result = await useCases.login.execute(params);
      if (!result.ok) {
        set({ loginStatus: "error", errorMessage: result.error });
        return false;
      }
      set({ loginStatus: "success", loginEntity: result.value });
      return true;
    },

    verifyOtp: async (params) => {
      set({ verifyOtpStatus: "loading", errorMessage: null });
      const result = await useCases.verifyOtp.execute(params);
      if (!result.ok) {
        set({ verifyOtpStatus: "error", errorMessage: result.error });
        return false;
      }
      set({ verifyOtpStatus: "success", loginEntity: result.value });
      return true;
    },

    logout: async () => {
      const result = await useCases.logout.execute();
      set({ ...initialState, errorMessage: result.ok ? null : result.error });
    },

    checkSession: async () => {
      const result = await useCases.isAuthenticated.execute();
      if (!result.ok) {
        set({ loginStatus: "unauthorized" });
        return false;
      }
      if (!result.value) {
        set({ loginStatus: "unauthorized" });
      }
      return result.value;
    },

    reset: () => set({ ...initialState }),
    resetLoginStatus: () => set({ loginStatus: "idle", errorMessage: null }),
    resetVerifyOtpStatus: () => set({ verifyOtpStatus: "idle", errorMessage: null }),
  }));
}
