"use client";

import { createContext, useContext, useState, type PropsWithChildren } from "react";
import type { Locator, ServiceRegistry } from "@/core/di/registry";

const LocatorContext = createContext<Locator | null>(null);

export function LocatorProvider({ locator, children }: PropsWithChildren<{ locator: Locator }>) {
  return <LocatorContext.Provider value={locator}>{children}</LocatorContext.Provider>;
}

export function useLocator(): Locator {
  const locator = useContext(LocatorContext);
  if (!locator) {
    throw new Error("useLocator must be used inside LocatorProvider");
  }
  return locator;
}

/** Resolves once per component instance, so factory registrations give each mount its own object. */
export function useService<K extends keyof ServiceRegistry>(key: K): ServiceRegistry[K] {
  const locator = useLocator();
  const [service] = useState(() => locator.get(key));
  return service;
}
