export type LoginParams = {
  email: string;
  password: string;
};

export type VerifyOtpParams = {
  email: string;
  otp: string;
};

export type LoginEntity = {
  token: string;
  userId: string;
  email: string;
  refreshToken?: string;
  expiresAt?: Date;
};
