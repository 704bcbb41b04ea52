import type { ServiceLocator } from "./locator";

/**
 * What a registry does with a non-generic request that has no exact binding
 * but matches the erasure of one or more generic bindings.
 */
export type ErasedLookupPolicy = "unique" | "first" | "none";

export type RegistryConfig = {
  name: string;
  erasedLookup: ErasedLookupPolicy;
};

export type ClassBinding<T = unknown> = {
  useClass: new () => T;
};

export type FactoryBinding<T = unknown> = {
  useFactory: (locator: ServiceLocator) => T;
};

export type ValueBinding<T = unknown> = {
  useValue: T;
};

export type Binding<T = unknown> = ClassBinding<T> | FactoryBinding<T> | ValueBinding<T>;
