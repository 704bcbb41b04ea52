export type { Type, AbstractType, TypeKey } from "./common";

export type { TypeDescriptor, TypeCarrier } from "./descriptor";

export type { ServiceLocator, ServiceLookup } from "./locator";

export type {
  ErasedLookupPolicy,
  RegistryConfig,
  ClassBinding,
  FactoryBinding,
  ValueBinding,
  Binding,
} from "./registry";
