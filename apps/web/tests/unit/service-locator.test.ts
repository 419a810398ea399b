import { describe, expect, it, vi } from "vitest";
import { ServiceAlreadyRegisteredError, ServiceLocator, ServiceNotRegisteredError } from "@/core/di/service-locator";

type TestRegistry = {
  greeting: string;
  counter: { value: number };
  clock: () => number;
};

describe("service locator", () => {
  it("returns the registered singleton instance", () => {
    const locator = new ServiceLocator<TestRegistry>();
    locator.registerSingleton("greeting", "hello");
    expect(locator.get("greeting")).toBe("hello");
    expect(locator.isRegistered("greeting")).toBe(true);
    expect(locator.isRegistered("counter")).toBe(false);
  });

  it("creates lazy singletons once, on first get", () => {
    const locator = new ServiceLocator<TestRegistry>();
    const create = vi.fn(() => ({ value: 1 }));
    locator.registerLazySingleton("counter", create);
    expect(create).not.toHaveBeenCalled();

    const first = locator.get("counter");
    const second = locator.get("counter");
    expect(first).toBe(second);
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("creates a new instance per get for factories", () => {
    const locator = new ServiceLocator<TestRegistry>();
    locator.registerFactory("counter", () => ({ value: 0 }));
    expect(locator.get("counter")).not.toBe(locator.get("counter"));
  });

  it("throws for unknown and duplicate keys", () => {
    const locator = new ServiceLocator<TestRegistry>();
    expect(() => locator.get("greeting")).toThrow(ServiceNotRegisteredError);
    expect(() => locator.get("greeting")).toThrow('service "greeting" is not registered');

    locator.registerSingleton("greeting", "hi");
    expect(() => locator.registerFactory("greeting", () => "again")).toThrow(ServiceAlreadyRegisteredError);
  });

  it("unregisters and resets", () => {
    const locator = new ServiceLocator<TestRegistry>();
    locator.registerSingleton("greeting", "hi");
    locator.registerSingleton("clock", () => 42);
    locator.unregister("greeting");
    expect(locator.isRegistered("greeting")).toBe(false);
    expect(locator.get("clock")()).toBe(42);

    locator.reset();
    expect(locator.isRegistered("clock")).toBe(false);
    locator.registerSingleton("greeting", "back");
    expect(locator.get("greeting")).toBe("back");
  });
});
