import type { AbstractType } from "./common";
import type { TypeCarrier, TypeDescriptor } from "./descriptor";

/**
 * Type-safe lookup protocol. One locator per composition root; pass it to
 * whatever needs to resolve services rather than reaching for a global.
 */
export interface ServiceLocator {
  /** Canonical lookup. Every other method projects its input onto a descriptor and calls this. */
  resolve<T>(descriptor: TypeDescriptor): T;

  /** Exact lookup by a captured type reference. The only path that never loses type arguments. */
  resolveReference<T>(reference: TypeCarrier<T> | null | undefined): T;

  /**
   * Lookup by the declared type of a decorated member, type arguments included.
   * Reads process-wide reflection metadata; see the implementation for the hazard.
   */
  resolveUnsafe<T>(target: object, propertyKey: string | symbol): T;

  /** Lookup by the erased declared type of a decorated member. Type arguments are dropped. */
  resolveErased<T>(target: object, propertyKey: string | symbol): T;

  /** Lookup by a class or interface token, treated as a non-generic type. */
  resolveClass<T>(clazz: AbstractType<T> | string | symbol): T;
}

/** The single capability the locator needs from a registry. */
export interface ServiceLookup {
  lookup(descriptor: TypeDescriptor, locator: ServiceLocator): unknown;
}
