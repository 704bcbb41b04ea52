// Constructor type for DI — uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Abstract classes stand in for interfaces that need a runtime identity.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

// Raw lookup key — class reference, or a string/symbol token naming an interface
export type TypeKey = AbstractType | string | symbol;
