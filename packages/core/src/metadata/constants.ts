// Compiler-emitted declared type of a decorated member (emitDecoratorMetadata)
export const DESIGN_TYPE_METADATA = "design:type";

// Type arguments fixed by a parameterized base class or a decorated member
export const TYPE_ARGUMENTS_METADATA = "locus:type-arguments";
