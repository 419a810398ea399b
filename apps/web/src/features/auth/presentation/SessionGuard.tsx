"use client";

import { usePathname, useRouter } from "next/navigation";
import { useEffect } from "react";
import { useService } from "@/core/di/locator-context";

const publicPaths = new Set(["/", "/login"]);

export function SessionGuard() {
  const router = useRouter();
  const pathname = usePathname();
  const authStore = useService("authStore");
  const logger = useService("logger");

  useEffect(() => {
    if (!pathname || publicPaths.has(pathname)) {
      return;
    }
    let cancelled = false;
    authStore
      .getState()
      .checkSession()
      .then((authenticated) => {
        if (authenticated || cancelled) {
          return;
        }
        const search = typeof window !== "undefined" ? window.location.search : "";
        const callbackUrl = search ? `${pathname}${search}` : pathname;
        router.replace(`/login?callbackUrl=${encodeURIComponent(callbackUrl)}`);
      })
      .catch((error: unknown) => logger.error({ err: error }, "session check failed"));
    return () => {
      cancelled = true;
    };
  }, [authStore, logger, pathname, router]);

  return null;
}
