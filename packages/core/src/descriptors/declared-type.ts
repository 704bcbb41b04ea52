import "reflect-metadata";
import type { AbstractType, TypeDescriptor } from "@locus-di/types";
import { InvalidArgumentError } from "../errors/locator-errors";
import { DESIGN_TYPE_METADATA, TYPE_ARGUMENTS_METADATA } from "../metadata/constants";
import { isAbstractType, isTypeDescriptor, typeOf } from "./type-descriptor";

/**
 * Reads the declared type of a decorated member from reflect-metadata, with the
 * type arguments recorded by @TypeArguments() applied on top of the
 * compiler-emitted `design:type`.
 *
 * Both lookups walk the prototype chain, so a subclass member inherits the
 * arguments declared on its parent unless it declares its own.
 */
export function getDeclaredType(target: object, propertyKey: string | symbol): TypeDescriptor {
  const raw = getDesignType(target, propertyKey);
  const recorded: unknown = Reflect.getMetadata(TYPE_ARGUMENTS_METADATA, target, propertyKey);
  const typeArguments = Array.isArray(recorded) ? recorded.filter(isTypeDescriptor) : [];
  return typeOf(raw, ...typeArguments);
}

/** The compiler-emitted `design:type` alone. Generic arguments never survive this. */
export function getErasedDeclaredType(
  target: object,
  propertyKey: string | symbol,
): TypeDescriptor {
  return typeOf(getDesignType(target, propertyKey));
}

function getDesignType(target: object, propertyKey: string | symbol): AbstractType {
  const designType: unknown = Reflect.getMetadata(DESIGN_TYPE_METADATA, target, propertyKey);
  if (!isAbstractType(designType)) {
    throw new InvalidArgumentError(
      `No declared type metadata for ${memberName(target, propertyKey)}. ` +
        "Decorate the member and compile with emitDecoratorMetadata enabled.",
    );
  }
  return designType;
}

function memberName(target: object, propertyKey: string | symbol): string {
  // Null-prototype objects have no constructor to name.
  const owner: unknown = isAbstractType(target) ? target : Reflect.get(target, "constructor");
  const name = isAbstractType(owner) && owner.name ? owner.name : "<anonymous>";
  return `${name}.${String(propertyKey)}`;
}
