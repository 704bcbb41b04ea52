import type { AbstractType, ServiceLocator, TypeCarrier, TypeDescriptor } from "@locus-di/types";
import { getDeclaredType, getErasedDeclaredType } from "../descriptors/declared-type";
import { typeOf } from "../descriptors/type-descriptor";
import { InvalidArgumentError } from "../errors/locator-errors";

/**
 * Implements every convenience lookup as a projection onto {@link resolve}.
 * Subclasses supply the canonical lookup and nothing else. No method here
 * caches, retries or falls back to a less precise projection.
 */
export abstract class BaseServiceLocator implements ServiceLocator {
  abstract resolve<T>(descriptor: TypeDescriptor): T;

  resolveReference<T>(reference: TypeCarrier<T> | null | undefined): T {
    if (reference === null || reference === undefined) {
      throw new InvalidArgumentError("Type reference can't be null");
    }
    return this.resolve<T>(reference.descriptor);
  }

  /**
   * Resolves the declared type of a decorated member, including type arguments
   * declared with @TypeArguments().
   *
   * Warning: not a stable lookup. The type is read from the reflect-metadata
   * registry, which is process-wide mutable state shared by every module and
   * every locator; any later `Reflect.defineMetadata` on the member, or on a
   * prototype it inherits from, changes the answer. Node evaluates this on a
   * single thread, so no lock is involved, but worker threads each load their
   * own registry. Where the result must not depend on global metadata, capture
   * a {@link TypeReference} and call {@link resolveReference} instead.
   */
  resolveUnsafe<T>(target: object, propertyKey: string | symbol): T {
    return this.resolve<T>(getDeclaredType(target, propertyKey));
  }

  /**
   * Resolves the erased declared type of a decorated member.
   * Warning: generic types are erased at compile time; `List<string>` and
   * `List<number>` produce the same request.
   */
  resolveErased<T>(target: object, propertyKey: string | symbol): T {
    return this.resolve<T>(getErasedDeclaredType(target, propertyKey));
  }

  resolveClass<T>(clazz: AbstractType<T> | string | symbol): T {
    if (clazz === null || clazz === undefined) {
      throw new InvalidArgumentError("Class can't be null");
    }
    return this.resolve<T>(typeOf(clazz));
  }
}
