type Registration<T> =
  | { kind: "singleton"; instance: T }
  | { kind: "lazySingleton"; create: () => T; cached: { value: T } | null }
  | { kind: "factory"; create: () => T };

type Registrations<R> = { [K in keyof R]?: Registration<R[K]> };

export class ServiceNotRegisteredError extends Error {
  constructor(readonly key: string) {
    super(`service "${key}" is not registered`);
    this.name = "ServiceNotRegisteredError";
  }
}

export class ServiceAlreadyRegisteredError extends Error {
  constructor(readonly key: string) {
    super(`service "${key}" is already registered`);
    this.name = "ServiceAlreadyRegisteredError";
  }
}

/**
 * Runtime registry keyed by the registry type `R`: each key resolves to the
 * type declared for it, so lookups need no casts.
 */
export class ServiceLocator<R extends object> {
  private registrations: Registrations<R> = {};

  registerSingleton<K extends keyof R>(key: K, instance: R[K]): void {
    this.assertNotRegistered(key);
    this.registrations[key] = { kind: "singleton", instance };
  }

  /** Created on the first `get`, then cached. */
  registerLazySingleton<K extends keyof R>(key: K, create: () => R[K]): void {
    this.assertNotRegistered(key);
    this.registrations[key] = { kind: "lazySingleton", create, cached: null };
  }

  /** A new instance per `get`. */
  registerFactory<K extends keyof R>(key: K, create: () => R[K]): void {
    this.assertNotRegistered(key);
    this.registrations[key] = { kind: "factory", create };
  }

  isRegistered<K extends keyof R>(key: K): boolean {
    return this.registrations[key] !== undefined;
  }

  get<K extends keyof R>(key: K): R[K] {
    const registration = this.registrations[key];
    if (!registration) {
      throw new ServiceNotRegisteredError(String(key));
    }
    switch (registration.kind) {
      case "singleton":
        return registration.instance;
      case "factory":
        return registration.create();
      case "lazySingleton":
        if (!registration.cached) {
          registration.cached = { value: registration.create() };
        }
        return registration.cached.value;
    }
  }

  unregister<K extends keyof R>(key: K): void {
    delete this.registrations[key];
  }

  reset(): void {
    this.registrations = {};
  }

  private assertNotRegistered<K extends keyof R>(key: K): void {
    if (this.isRegistered(key)) {
      throw new ServiceAlreadyRegisteredError(String(key));
    }
  }
}
