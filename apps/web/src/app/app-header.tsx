"use client";

import Link from "next/link";
import { useTranslation } from "react-i18next";
import { useService } from "@/core/di/locator-context";

export function AppHeader() {
  const { t } = useTranslation();
  const config = useService("config");

  return (
    <header className="sticky top-0 z-40 border-b border-white/30 bg-cream/80 backdrop-blur dark:border-white/10 dark:bg-ink/80">
      <div className="mx-auto flex max-w-7xl items-center justify-between px-4 py-3">
        <Link href="/dashboard" className="text-sm font-bold uppercase tracking-wider">
          {config.appName}
        </Link>
        <nav className="flex items-center gap-3 text-sm">
          <Link href="/dashboard" className="hover:underline">{t("dashboard")}</Link>
          <Link href="/products" className="hover:underline">{t("products.title")}</Link>
          <Link href="/examples" className="hover:underline">{t("examples.title")}</Link>
          {config.enableDebugFeatures ? (
            <span className="rounded-full bg-sky/40 px-2 py-0.5 text-xs">{config.flavor}</span>
          ) : null}
        </nav>
      </div>
    </header>
  );
}
