"use client";

import Link from "next/link";
import { useRouter } from "next/navigation";
import { useTranslation } from "react-i18next";
import { useStore } from "zustand";
import { Button } from "@/components/ui/button";
import { Card } from "@/components/ui/card";
import { useService } from "@/core/di/locator-context";
import { supportedLocales } from "@/core/l10n/localization-service";
import { themeModes, type ThemeMode } from "@/core/theme/theme";

const themeLabelKeys: Record<ThemeMode, string> = {
  light: "lightTheme",
  dark: "darkTheme",
  system: "systemTheme",
};

export function DashboardClient() {
  const { t } = useTranslation();
  const router = useRouter();
  const appStore = useService("appStore");
  const authStore = useService("authStore");
  const localization = useService("localization");
  const themeMode = useStore(appStore, (s) => s.themeMode);
  const locale = useStore(appStore, (s) => s.locale);
  const email = useStore(authStore, (s) => s.loginEntity?.email);

  async function logout() {
    await authStore.getState().logout();
    router.replace("/login");
  }

  return (
    <div className="mx-auto max-w-4xl space-y-4 px-4 py-6">
      <div className="flex items-center justify-between">
        <div>
          <h1 className="text-2xl font-bold">{t("dashboard")}</h1>
          <p className="text-sm text-ink/70 dark:text-cream/70">
            {t("welcome")}
            {email ? `, ${email}` : ""}
          </p>
        </div>
        <Button variant="danger" onClick={() => void logout()}>
          {t("logout")}
        </Button>
      </div>

      <div className="grid gap-4 md:grid-cols-2">
        <Card>
          <h2 className="font-semibold">{t("selectTheme")}</h2>
          <div className="mt-3 flex gap-2" role="radiogroup" aria-label={t("theme")}>
            {themeModes.map((mode) => (
              <Button
                key={mode}
                role="radio"
                aria-checked={themeMode === mode}
                variant={themeMode === mode ? "primary" : "ghost"}
                onClick={() => void appStore.getState().changeTheme(mode)}
              >
                {t(themeLabelKeys[mode])}
              </Button>
            ))}
          </div>
        </Card>

        <Card>
          <h2 className="font-semibold">{t("selectLanguage")}</h2>
          <div className="mt-3 flex gap-2" role="radiogroup" aria-label={t("language")}>
            {supportedLocales.map((code) => (
              <Button
                key={code}
                role="radio"
                aria-checked={locale === code}
                variant={locale === code ? "primary" : "ghost"}
                onClick={() => void appStore.getState().changeLocale(code)}
              >
                {localization.getLocaleName(code)}
              </Button>
            ))}
          </div>
        </Card>
      </div>

      <nav className="grid gap-3 sm:grid-cols-2">
        {[
          { href: "/products", label: t("products.title") },
          { href: "/examples", label: t("examples.title") },
        ].map((item) => (
          <Link
            key={item.href}
            href={item.href}
            className="rounded-[18px] border border-white/40 bg-mint/50 p-4 font-semibold hover:bg-mint dark:border-white/10 dark:bg-mint/20"
          >
            {item.label}
          </Link>
        ))}
      </nav>
    </div>
  );
}
