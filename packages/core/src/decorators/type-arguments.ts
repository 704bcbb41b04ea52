import "reflect-metadata";
import { defineTypeArguments } from "../descriptors/type-arguments";
import type { TypeArgument } from "../descriptors/type-descriptor";

/**
 * Declares the generic arguments of a member's type, which the compiler erases
 * from `design:type`.
 *
 * ```ts
 * class Reports {
 *   @TypeArguments(String)
 *   titles!: List<string>;
 * }
 * ```
 */
export function TypeArguments(...typeArguments: TypeArgument[]) {
  return (target: object, propertyKey: string | symbol): void => {
    defineTypeArguments(target, typeArguments, propertyKey);
  };
}
