import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readRegistryEnv } from "../../src/config/env";

describe("readRegistryEnv", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.LOCUS_ERASED_LOOKUP;
    delete process.env.LOCUS_REGISTRY_NAME;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("should return defaults when no env vars are set", () => {
    const config = readRegistryEnv();

    expect(config.name).toBe("default");
    expect(config.erasedLookup).toBe("unique");
  });

  it("should read each valid erased lookup policy", () => {
    for (const policy of ["unique", "first", "none"] as const) {
      process.env.LOCUS_ERASED_LOOKUP = policy;
      expect(readRegistryEnv().erasedLookup).toBe(policy);
    }
  });

  it("should fall back to 'unique' for an unknown policy", () => {
    process.env.LOCUS_ERASED_LOOKUP = "newest";
    expect(readRegistryEnv().erasedLookup).toBe("unique");
  });

  it("should read the registry name", () => {
    process.env.LOCUS_REGISTRY_NAME = "billing";
    expect(readRegistryEnv().name).toBe("billing");
  });

  it("should ignore an empty registry name", () => {
    process.env.LOCUS_REGISTRY_NAME = "";
    expect(readRegistryEnv().name).toBe("default");
  });
});
