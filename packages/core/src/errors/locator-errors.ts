import type { TypeDescriptor } from "@locus-di/types";

export class LocatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LocatorError";
  }
}

export class InvalidArgumentError extends LocatorError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export type MissingTypeParameterReason = "absent" | "empty";

/**
 * A type reference was constructed without the anonymous specialization that
 * fixes its type argument. `found` is the superclass that was inspected.
 */
export class MissingTypeParameterError extends LocatorError {
  constructor(
    public readonly found: unknown,
    public readonly reason: MissingTypeParameterReason = "absent",
  ) {
    super(
      reason === "absent"
        ? `Missing type parameter. Found: ${describeFound(found)}`
        : `Missing type parameter. Found: ${describeFound(found)} with an empty type argument list`,
    );
    this.name = "MissingTypeParameterError";
  }
}

export class UnresolvedServiceError extends LocatorError {
  constructor(public readonly descriptor: TypeDescriptor) {
    super(`No service registered for ${descriptor.toString()}`);
    this.name = "UnresolvedServiceError";
  }
}

export class AmbiguousServiceError extends LocatorError {
  constructor(
    public readonly descriptor: TypeDescriptor,
    public readonly candidates: readonly TypeDescriptor[],
  ) {
    super(
      `Ambiguous service ${descriptor.toString()}: ${candidates.length} bindings match ` +
        `(${candidates.map((c) => c.toString()).join(", ")})`,
    );
    this.name = "AmbiguousServiceError";
  }
}

export class CircularDependencyError extends LocatorError {
  constructor(public readonly path: readonly TypeDescriptor[]) {
    super(`Circular dependency detected: ${path.map((d) => d.toString()).join(" → ")}`);
    this.name = "CircularDependencyError";
  }
}

function describeFound(found: unknown): string {
  if (typeof found === "function") return found.name || "<anonymous class>";
  return String(found);
}
