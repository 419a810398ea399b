import pino, { type Logger } from "pino";
import type { AppConfig } from "@/core/config/app-config";

export type { Logger };

export function createRootLogger(config: Pick<AppConfig, "enableLogging" | "appName">): Logger {
  return pino({
    name: config.appName,
    level: config.enableLogging ? "debug" : "silent",
    browser: {
      asObject: true,
    },
  });
}

export function createLogger(root: Logger, scope: string): Logger {
  return root.child({ scope });
}
