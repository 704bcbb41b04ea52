import "reflect-metadata";
import { TYPE_ARGUMENTS_METADATA } from "../metadata/constants";
import { toTypeDescriptor, type TypeArgument } from "./type-descriptor";

/**
 * Records the type arguments a class (or one of its members) fixes.
 * Type references read them off their immediate superclass; declared-type
 * lookups read them off a decorated member.
 */
export function defineTypeArguments(
  target: object,
  typeArguments: readonly TypeArgument[],
  propertyKey?: string | symbol,
): void {
  const descriptors = Object.freeze(typeArguments.map(toTypeDescriptor));
  if (propertyKey === undefined) {
    Reflect.defineMetadata(TYPE_ARGUMENTS_METADATA, descriptors, target);
  } else {
    Reflect.defineMetadata(TYPE_ARGUMENTS_METADATA, descriptors, target, propertyKey);
  }
}
