import createDebug from "debug";
import type { AbstractType, TypeDescriptor, TypeKey } from "@locus-di/types";
import { InvalidArgumentError } from "../errors/locator-errors";

const debug = createDebug("locus:core:types");

export type TypeArgument = TypeKey | TypeDescriptor;

type InternNode = {
  descriptor?: InternedTypeDescriptor;
  children: Map<TypeDescriptor, InternNode>;
};

// Descriptors are interned: a raw key, then one trie level per (interned) type argument.
// Class roots are weak, but child nodes hold their type-argument descriptors (and so
// those descriptors' classes) strongly, as does every string/symbol root.
const classRoots = new WeakMap<AbstractType, InternNode>();
const tokenRoots = new Map<string | symbol, InternNode>();

class InternedTypeDescriptor implements TypeDescriptor {
  readonly parameterized: boolean;

  constructor(
    readonly raw: TypeKey,
    readonly typeArguments: readonly TypeDescriptor[],
  ) {
    this.parameterized = typeArguments.length > 0;
    Object.freeze(this);
  }

  erasure(): TypeDescriptor {
    return this.parameterized ? typeOf(this.raw) : this;
  }

  equals(other: TypeDescriptor): boolean {
    return internDescriptor(other) === this;
  }

  toString(): string {
    const name = typeKeyToString(this.raw);
    if (!this.parameterized) return name;
    return `${name}<${this.typeArguments.map((arg) => arg.toString()).join(", ")}>`;
  }
}

export function isAbstractType(value: unknown): value is AbstractType {
  return typeof value === "function";
}

export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
  if (value instanceof InternedTypeDescriptor) return true;
  return (
    typeof value === "object" &&
    value !== null &&
    "raw" in value &&
    "typeArguments" in value &&
    Array.isArray(value.typeArguments)
  );
}

export function typeKeyToString(key: TypeKey): string {
  if (typeof key === "function") return key.name || "<anonymous class>";
  if (typeof key === "symbol") return key.description ?? "Symbol()";
  return key;
}

/**
 * Returns the descriptor for `raw` applied to `typeArguments`.
 *
 * ```ts
 * typeOf(Logger);                          // Logger
 * typeOf(Map, String, typeOf(Array, Number)); // Map<String, Array<Number>>
 * ```
 *
 * Equal inputs always return the same frozen instance.
 */
export function typeOf(raw: TypeKey, ...typeArguments: TypeArgument[]): TypeDescriptor {
  if (!isAbstractType(raw) && typeof raw !== "string" && typeof raw !== "symbol") {
    throw new InvalidArgumentError(`Type key must be a class, string or symbol. Found: ${String(raw)}`);
  }

  const args = typeArguments.map(toTypeDescriptor);
  let node = rootFor(raw);
  for (const arg of args) {
    let child = node.children.get(arg);
    if (!child) {
      child = { children: new Map() };
      node.children.set(arg, child);
    }
    node = child;
  }

  if (!node.descriptor) {
    node.descriptor = new InternedTypeDescriptor(raw, Object.freeze(args));
    debug("intern %s", node.descriptor.toString());
  }
  return node.descriptor;
}

/** Maps any structurally valid descriptor onto its interned instance. */
export function internDescriptor(descriptor: TypeDescriptor): TypeDescriptor {
  if (descriptor instanceof InternedTypeDescriptor) return descriptor;
  return typeOf(descriptor.raw, ...descriptor.typeArguments);
}

export function toTypeDescriptor(argument: TypeArgument): TypeDescriptor {
  return isTypeDescriptor(argument) ? internDescriptor(argument) : typeOf(argument);
}

function rootFor(raw: TypeKey): InternNode {
  if (isAbstractType(raw)) {
    let root = classRoots.get(raw);
    if (!root) {
      root = { children: new Map() };
      classRoots.set(raw, root);
    }
    return root;
  }

  let root = tokenRoots.get(raw);
  if (!root) {
    root = { children: new Map() };
    tokenRoots.set(raw, root);
  }
  return root;
}
