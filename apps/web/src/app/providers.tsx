"use client";

import { type PropsWithChildren, useEffect, useState } from "react";
import { I18nextProvider } from "react-i18next";
import { useStore } from "zustand";
import { initDependencies } from "@/core/di/container";
import { LocatorProvider } from "@/core/di/locator-context";
import { createI18n } from "@/core/l10n/i18n";
import { resolveTheme } from "@/core/theme/theme";
import { SessionGuard } from "@/features/auth/presentation/SessionGuard";

function prefersDark(): boolean {
  return typeof window !== "undefined" && window.matchMedia?.("(prefers-color-scheme: dark)").matches === true;
}

export function Providers({ children }: PropsWithChildren) {
  const [locator] = useState(() => initDependencies());
  const appStore = locator.get("appStore");
  const locale = useStore(appStore, (s) => s.locale);
  const themeMode = useStore(appStore, (s) => s.themeMode);
  const [i18n] = useState(() => createI18n(appStore.getState().locale));

  useEffect(() => {
    const localization = locator.get("localization");
    document.documentElement.lang = locale;
    document.documentElement.dir = localization.isRtl(locale) ? "rtl" : "ltr";
    i18n.changeLanguage(locale).catch((error: unknown) => locator.get("logger").warn({ err: error, locale }, "locale switch failed"));
  }, [i18n, locale, locator]);

  useEffect(() => {
    document.documentElement.classList.toggle("dark", resolveTheme(themeMode, prefersDark()) === "dark");
  }, [themeMode]);

  return (
    <LocatorProvider locator={locator}>
      <I18nextProvider i18n={i18n}>
        <SessionGuard />
        {children}
      </I18nextProvider>
    </LocatorProvider>
  );
}
