export type AppFlavor = "development" | "staging" | "production";

export type AppConfig = {
  flavor: AppFlavor;
  appName: string;
  apiBaseUrl: string;
  enableLogging: boolean;
  enableDebugFeatures: boolean;
  useMockData: boolean;
  prefEncryptionKey: string;
};

type FlavorDefaults = Omit<AppConfig, "flavor" | "useMockData" | "prefEncryptionKey">;

const flavorDefaults: Record<AppFlavor, FlavorDefaults> = {
  development: {
    appName: "Sample Architecture (Dev)",
    apiBaseUrl: "http://localhost:8787",
    enableLogging: true,
    enableDebugFeatures: true,
  },
  staging: {
    appName: "Sample Architecture (Staging)",
    apiBaseUrl: "https://staging-api.example.com",
    enableLogging: true,
    enableDebugFeatures: false,
  },
  production: {
    appName: "Sample Architecture",
    apiBaseUrl: "https://api.example.com",
    enableLogging: false,
    enableDebugFeatures: false,
  },
};

export function resolveFlavor(raw: string | undefined): AppFlavor {
  const value = (raw ?? "development").trim().toLowerCase();
  if (value === "production" || value === "staging") {
    return value;
  }
  return "development";
}

type ConfigEnv = {
  NEXT_PUBLIC_APP_FLAVOR?: string;
  NEXT_PUBLIC_API_BASE_URL?: string;
  NEXT_PUBLIC_USE_MOCK_DATA?: string;
  NEXT_PUBLIC_PREF_KEY?: string;
};

// Next only inlines literal NEXT_PUBLIC_* reads.
function readPublicEnv(): ConfigEnv {
  return {
    NEXT_PUBLIC_APP_FLAVOR: process.env.NEXT_PUBLIC_APP_FLAVOR,
    NEXT_PUBLIC_API_BASE_URL: process.env.NEXT_PUBLIC_API_BASE_URL,
    NEXT_PUBLIC_USE_MOCK_DATA: process.env.NEXT_PUBLIC_USE_MOCK_DATA,
    NEXT_PUBLIC_PREF_KEY: process.env.NEXT_PUBLIC_PREF_KEY,
  };
}

export function loadAppConfig(env: ConfigEnv = readPublicEnv()): AppConfig {
  const flavor = resolveFlavor(env.NEXT_PUBLIC_APP_FLAVOR);
  const defaults = flavorDefaults[flavor];
  const baseUrlOverride = env.NEXT_PUBLIC_API_BASE_URL?.trim();
  return {
    flavor,
    ...defaults,
    apiBaseUrl: (baseUrlOverride || defaults.apiBaseUrl).replace(/\/+$/, ""),
    useMockData: env.NEXT_PUBLIC_USE_MOCK_DATA === "1",
    prefEncryptionKey: env.NEXT_PUBLIC_PREF_KEY?.trim() || "sample-architecture-pref",
  };
}
