import "reflect-metadata";

// Descriptors
export { typeOf, internDescriptor, isTypeDescriptor, typeKeyToString } from "./descriptors/type-descriptor";
export { TypeReference } from "./descriptors/type-reference";
export { defineTypeArguments } from "./descriptors/type-arguments";
export { getDeclaredType, getErasedDeclaredType } from "./descriptors/declared-type";

// Decorators
export { TypeArguments } from "./decorators/type-arguments";

// Locator
export { BaseServiceLocator } from "./locator/service-locator";
export { RegistryServiceLocator, createServiceLocator } from "./locator/registry-locator";

// Registry
export { ServiceRegistry } from "./registry/service-registry";

// Config
export { readRegistryEnv } from "./config/env";

// Errors
export {
  LocatorError,
  InvalidArgumentError,
  MissingTypeParameterError,
  UnresolvedServiceError,
  AmbiguousServiceError,
  CircularDependencyError,
} from "./errors/locator-errors";

// Metadata constants (used by tooling that parameterizes its own carriers)
export { DESIGN_TYPE_METADATA, TYPE_ARGUMENTS_METADATA } from "./metadata/constants";

// Re-export key types from @locus-di/types
export type {
  Type,
  AbstractType,
  TypeKey,
  TypeDescriptor,
  TypeCarrier,
  ServiceLocator,
  ServiceLookup,
  ErasedLookupPolicy,
  RegistryConfig,
  Binding,
  ClassBinding,
  FactoryBinding,
  ValueBinding,
} from "@locus-di/types";

// Re-export types defined in core
export type { TypeArgument } from "./descriptors/type-descriptor";
export type { RegistryKey, RegistryOptions } from "./registry/service-registry";
export type { MissingTypeParameterReason } from "./errors/locator-errors";
