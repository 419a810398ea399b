import { loadAppConfig, type AppConfig } from "@/core/config/app-config";
import { BrowserConnectivityService, type ConnectivityService } from "@/core/connectivity/connectivity-service";
import { getDb, type AppDb } from "@/core/db/app-db";
import type { Locator, ServiceRegistry } from "@/core/di/registry";
import { ServiceLocator } from "@/core/di/service-locator";
import { LocalizationService } from "@/core/l10n/localization-service";
import { createLogger, createRootLogger, type Logger } from "@/core/logging/logger";
import { ApiClient } from "@/core/network/api-client";
import { createLoggingInterceptor } from "@/core/network/logging-interceptor";
import { AppPrefImpl } from "@/core/storage/app-pref-impl";
import { EncryptionService } from "@/core/storage/encryption-service";
import { createDefaultStorage, type KeyValueStorage } from "@/core/storage/key-value-storage";
import { initAppInjector } from "@/features/app/app-injector";
import { initAuthInjector } from "@/features/auth/auth-injector";
import { initNotesInjector } from "@/features/notes/notes-injector";
import { initProductsInjector } from "@/features/products/products-injector";
import { initTasksInjector } from "@/features/tasks/tasks-injector";

export type DependencyOverrides = {
  config?: AppConfig;
  logger?: Logger;
  storage?: KeyValueStorage;
  fetchImpl?: typeof fetch;
  connectivity?: ConnectivityService;
  db?: AppDb;
};

export const sl: Locator = new ServiceLocator<ServiceRegistry>();

function registerCore(locator: Locator, overrides: DependencyOverrides): void {
  const config = overrides.config ?? loadAppConfig();
  const logger = overrides.logger ?? createRootLogger(config);

  locator.registerSingleton("config", config);
  locator.registerSingleton("logger", logger);
  locator.registerLazySingleton("apiClient", () => {
    const client = new ApiClient({ baseUrl: config.apiBaseUrl, fetchImpl: overrides.fetchImpl });
    if (config.enableLogging) {
      client.addInterceptor(createLoggingInterceptor(createLogger(logger, "http")));
    }
    return client;
  });
  locator.registerLazySingleton("keyValueStorage", () => overrides.storage ?? createDefaultStorage());
  locator.registerLazySingleton("encryption", () => new EncryptionService(config.prefEncryptionKey));
  locator.registerLazySingleton(
    "appPref",
    () => new AppPrefImpl(locator.get("keyValueStorage"), locator.get("encryption"), createLogger(logger, "pref")),
  );
  locator.registerLazySingleton("db", () => overrides.db ?? getDb());
  locator.registerLazySingleton("connectivity", () => overrides.connectivity ?? new BrowserConnectivityService());
  locator.registerLazySingleton(
    "localization",
    () => new LocalizationService(locator.get("appPref"), createLogger(logger, "l10n")),
  );
}

/** Registers core services, then every feature. Calling it again is a no-op. */
export function initDependencies(overrides: DependencyOverrides = {}): Locator {
  if (sl.isRegistered("config")) {
    return sl;
  }
  registerCore(sl, overrides);
  initAuthInjector(sl);
  initProductsInjector(sl);
  initTasksInjector(sl);
  initNotesInjector(sl);
  initAppInjector(sl);
  sl.get("logger").debug({ flavor: sl.get("config").flavor }, "dependencies initialised");
  return sl;
}

export function resetDependencies(): void {
  sl.reset();
}
