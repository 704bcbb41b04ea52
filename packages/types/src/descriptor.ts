import type { TypeKey } from "./common";

/**
 * Immutable key denoting a fully-specified type, generic arguments included.
 * `List<string>` and `List<number>` are different descriptors; both erase to `List`.
 */
export interface TypeDescriptor {
  readonly raw: TypeKey;
  readonly typeArguments: readonly TypeDescriptor[];
  /** True when at least one type argument is present. */
  readonly parameterized: boolean;

  /** The descriptor of `raw` alone, with every type argument dropped. */
  erasure(): TypeDescriptor;
  equals(other: TypeDescriptor): boolean;
  toString(): string;
}

/** A value that carries one captured descriptor for the static type `T`. */
export interface TypeCarrier<T> {
  readonly descriptor: TypeDescriptor;
  /** Compile-time only; never set at runtime. */
  readonly _type?: T;
}
