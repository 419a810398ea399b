import { z } from "zod";
import type { ApiClient } from "@/core/network/api-client";
import { AppUrls } from "@/core/network/app-urls";
import {
  loginResponseSchema,
  MOCK_OTP_CODE,
  mockLoginResponse,
  type LoginResponse,
} from "@/features/auth/data/login-response";
import type { LoginParams, VerifyOtpParams } from "@/features/auth/domain/login";

export interface AuthRemoteDataSource {
  login(params: LoginParams): Promise<LoginResponse>;
  verifyOtp(params: VerifyOtpParams): Promise<LoginResponse>;
  logout(): Promise<void>;
}

export type AuthRemoteOptions = {
  useMockData: boolean;
  mockDelayMs?: number;
};

const responseEnvelopeSchema = z.record(z.unknown());

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseAuthResponse(raw: unknown, fallbackMessage: string): LoginResponse {
  const envelope = responseEnvelopeSchema.safeParse(raw);
  if (!envelope.success || Object.keys(envelope.data).length === 0) {
    throw new Error("Empty response received");
  }
  if (envelope.data.success === false) {
    const message = envelope.data.message;
    throw new Error(typeof message === "string" && message ? message : fallbackMessage);
  }
  return loginResponseSchema.parse(envelope.data);
}

export class AuthRemoteDataSourceImpl implements AuthRemoteDataSource {
  private readonly mockDelayMs: number;

  constructor(
    private readonly client: ApiClient,
    private readonly options: AuthRemoteOptions,
  ) {
    this.mockDelayMs = options.mockDelayMs ?? 500;
  }

  async login(params: LoginParams): Promise<LoginResponse> {
    if (this.options.useMockData) {
      await delay(this.mockDelayMs);
      return loginResponseSchema.parse({ ...mockLoginResponse, email: params.email });
    }
    const raw = await this.client.post(AppUrls.login, { email: params.email, password: params.password });
    return parseAuthResponse(raw, "Login failed");
  }

  async verifyOtp(params: VerifyOtpParams): Promise<LoginResponse> {
    if (this.options.useMockData) {
      await delay(this.mockDelayMs);
      if (params.otp !== MOCK_OTP_CODE) {
        throw new Error("Invalid verification code");
      }
      return loginResponseSchema.parse({ ...mockLoginResponse, email: params.email });
    }
    const raw = await this.client.post(AppUrls.verifyOtp, { email: params.email, otp: params.otp });
    return parseAuthResponse(raw, "Verification failed");
  }

  async logout(): Promise<void> {
    if (this.options.useMockData) {
      return;
    }
    await this.client.post(AppUrls.logout);
  }
}
