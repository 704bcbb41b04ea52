import "reflect-metadata";
import type { AbstractType, TypeCarrier, TypeDescriptor } from "@locus-di/types";
import { MissingTypeParameterError } from "../errors/locator-errors";
import { TYPE_ARGUMENTS_METADATA } from "../metadata/constants";
import { defineTypeArguments } from "./type-arguments";
import { internDescriptor, isTypeDescriptor } from "./type-descriptor";

/**
 * Carrier for a fully-specified generic type, captured from the class that
 * constructs it. TypeScript erases `T`, so the type argument has to live in
 * runtime metadata on a parameterized base class, and the carrier has to be
 * an anonymous subclass of that base:
 *
 * ```ts
 * const ref = new (class extends TypeReference.of<List<string>>(typeOf(List, String)) {})();
 * locator.resolveReference(ref);
 * ```
 *
 * Constructing the base returned by `of()` directly, subclassing
 * `TypeReference` itself, or constructing a deeper subclass all fail with
 * {@link MissingTypeParameterError}.
 */
export abstract class TypeReference<T> implements TypeCarrier<T> {
  declare readonly _type?: T;

  /** Captured once at construction; never re-read. */
  readonly descriptor: TypeDescriptor;

  protected constructor() {
    this.descriptor = captureTypeArgument(new.target);
  }

  /** Returns a base class parameterized with `type`. Extend it, don't construct it. */
  static of<T>(type: AbstractType<T> | string | symbol | TypeDescriptor): new () => TypeReference<T> {
    class ParameterizedTypeReference extends TypeReference<T> {
      constructor() {
        super();
      }
    }
    defineTypeArguments(ParameterizedTypeReference, [type]);
    return ParameterizedTypeReference;
  }
}

function captureTypeArgument(carrier: object): TypeDescriptor {
  // Reached only when the abstract class is constructed reflectively or from plain JS.
  if (carrier === TypeReference) {
    throw new MissingTypeParameterError(TypeReference, "absent");
  }

  const superclass: unknown = Object.getPrototypeOf(carrier);
  const typeArguments: unknown =
    typeof superclass === "function"
      ? Reflect.getOwnMetadata(TYPE_ARGUMENTS_METADATA, superclass)
      : undefined;

  if (typeArguments === undefined) {
    throw new MissingTypeParameterError(superclass, "absent");
  }

  // Only the first argument is read; carriers are single-parameter.
  const first: unknown = Array.isArray(typeArguments) ? typeArguments[0] : undefined;
  if (!isTypeDescriptor(first)) {
    throw new MissingTypeParameterError(superclass, "empty");
  }
  return internDescriptor(first);
}
