"use client";

import { useRouter } from "next/navigation";
import { type FormEvent, useState } from "react";
import { useTranslation } from "react-i18next";
import { useStore } from "zustand";
import { Button } from "@/components/ui/button";
import { Card } from "@/components/ui/card";
import { Input } from "@/components/ui/input";
import { useService } from "@/core/di/locator-context";
import { isBusy } from "@/core/functional/state-status";
import { Validators } from "@/core/utils/validators";

type LoginClientProps = {
  callbackUrl?: string;
};

type FieldErrors = {
  email: string | null;
  password: string | null;
  otp: string | null;
};

const noErrors: FieldErrors = { email: null, password: null, otp: null };

export function LoginClient({ callbackUrl }: LoginClientProps) {
  const { t } = useTranslation();
  const router = useRouter();
  const authStore = useService("authStore");
  const loginStatus = useStore(authStore, (s) => s.loginStatus);
  const verifyOtpStatus = useStore(authStore, (s) => s.verifyOtpStatus);
  const errorMessage = useStore(authStore, (s) => s.errorMessage);

  const [phase, setPhase] = useState<"credentials" | "otp">("credentials");
  const [email, setEmail] = useState("");
  const [password, setPassword] = useState("");
  const [otp, setOtp] = useState("");
  const [fieldErrors, setFieldErrors] = useState<FieldErrors>(noErrors);

  const destination = callbackUrl && callbackUrl.startsWith("/") ? callbackUrl : "/dashboard";
  const submitting = isBusy(loginStatus) || isBusy(verifyOtpStatus);

  async function submitCredentials(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    const errors = { ...noErrors, email: Validators.email(email), password: Validators.password(password) };
    setFieldErrors(errors);
    if (errors.email || errors.password) {
      return;
    }
    if (await authStore.getState().loginUser({ email, password })) {
      setPhase("otp");
    }
  }

  async function submitOtp(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    const otpError = Validators.otp(otp);
    setFieldErrors({ ...noErrors, otp: otpError });
    if (otpError) {
      return;
    }
    if (await authStore.getState().verifyOtp({ email, otp })) {
      router.replace(destination);
    }
  }

  function startOver() {
    setPhase("credentials");
    setOtp("");
    setFieldErrors(noErrors);
    authStore.getState().reset();
  }

  return (
    <div className="mx-auto flex min-h-[calc(100vh-64px)] w-full max-w-md items-center px-4 py-8">
      <Card className="w-full p-6">
        <h1 className="text-2xl font-bold">{phase === "credentials" ? t("login.title") : t("login.otpTitle")}</h1>
        <p className="mt-2 text-sm text-ink/75 dark:text-cream/75">
          {phase === "credentials" ? t("login.subtitle") : t("login.otpHint")}
        </p>

        <form className="mt-4 space-y-3" noValidate onSubmit={phase === "credentials" ? submitCredentials : submitOtp}>
          <Input
            label={t("login.email")}
            name="email"
            type="email"
            value={email}
            onChange={(e) => setEmail(e.target.value)}
            autoComplete="username"
            disabled={phase === "otp"}
            error={fieldErrors.email}
          />

          {phase === "credentials" ? (
            <Input
              label={t("login.password")}
              name="password"
              type="password"
              value={password}
              onChange={(e) => setPassword(e.target.value)}
              autoComplete="current-password"
              error={fieldErrors.password}
            />
          ) : (
            <Input
              label={t("login.otpTitle")}
              name="otp"
              type="text"
              value={otp}
              onChange={(e) => setOtp(e.target.value)}
              inputMode="numeric"
              maxLength={6}
              autoComplete="one-time-code"
              error={fieldErrors.otp}
            />
          )}

          {errorMessage ? (
            <p role="alert" className="rounded-xl2 bg-coral/20 px-3 py-2 text-sm">
              {errorMessage}
            </p>
          ) : null}
          <Button type="submit" className="w-full" loading={submitting}>
            {submitting ? t("loading") : phase === "credentials" ? t("login.submit") : t("login.verify")}
          </Button>
          {phase === "otp" ? (
            <Button type="button" variant="ghost" className="w-full" onClick={startOver} disabled={submitting}>
              {t("login.startOver")}
            </Button>
          ) : null}
        </form>
      </Card>
    </div>
  );
}
