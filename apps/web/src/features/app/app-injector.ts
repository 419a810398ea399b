import type { Locator } from "@/core/di/registry";
import { createLogger } from "@/core/logging/logger";
import { createAppStore } from "@/features/app/app-store";

export function initAppInjector(sl: Locator): void {
  sl.registerLazySingleton("appStore", () =>
    createAppStore(sl.get("appPref"), sl.get("localization"), createLogger(sl.get("logger"), "app")),
  );
}
