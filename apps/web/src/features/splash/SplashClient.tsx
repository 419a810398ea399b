"use client";

import { useRouter } from "next/navigation";
import { useEffect } from "react";
import { useTranslation } from "react-i18next";
import { useService } from "@/core/di/locator-context";

export const SPLASH_DELAY_MS = 2000;

export function SplashClient() {
  const { t } = useTranslation();
  const router = useRouter();
  const authStore = useService("authStore");
  const logger = useService("logger");

  useEffect(() => {
    const timer = setTimeout(() => {
      authStore
        .getState()
        .checkSession()
        .then((authenticated) => router.replace(authenticated ? "/dashboard" : "/login"))
        .catch((error: unknown) => {
          logger.error({ err: error }, "session check failed on splash");
          router.replace("/login");
        });
    }, SPLASH_DELAY_MS);
    return () => clearTimeout(timer);
  }, [authStore, logger, router]);

  return (
    <div className="flex min-h-[calc(100vh-64px)] flex-col items-center justify-center gap-3">
      <div className="h-14 w-14 animate-pulse rounded-2xl bg-ink dark:bg-cream" aria-hidden />
      <h1 className="text-xl font-bold">{t("appTitle")}</h1>
      <p className="text-sm text-ink/60 dark:text-cream/60">{t("loading")}</p>
    </div>
  );
}
