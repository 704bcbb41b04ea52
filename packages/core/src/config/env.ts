import type { ErasedLookupPolicy, RegistryConfig } from "@locus-di/types";

const VALID_ERASED_LOOKUP = new Set<string>(["unique", "first", "none"]);

function isErasedLookupPolicy(value: string | undefined): value is ErasedLookupPolicy {
  return value !== undefined && VALID_ERASED_LOOKUP.has(value);
}

export function readRegistryEnv(): RegistryConfig {
  const rawPolicy = process.env.LOCUS_ERASED_LOOKUP;

  return {
    name: process.env.LOCUS_REGISTRY_NAME || "default",
    erasedLookup: isErasedLookupPolicy(rawPolicy) ? rawPolicy : "unique",
  };
}
