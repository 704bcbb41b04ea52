import createDebug from "debug";
import type { ServiceLocator, ServiceLookup, TypeDescriptor } from "@locus-di/types";
import { BaseServiceLocator } from "./service-locator";

const debug = createDebug("locus:core:locator");

/** Locator whose canonical lookup is a single call into a registry. */
export class RegistryServiceLocator extends BaseServiceLocator {
  constructor(private readonly registry: ServiceLookup) {
    super();
  }

  resolve<T>(descriptor: TypeDescriptor): T {
    debug("resolve %s", descriptor.toString());
    return this.registry.lookup(descriptor, this) as T;
  }
}

/**
 * Creates the locator for one composition root. Independent roots each
 * create their own and pass it to whatever needs it.
 */
export function createServiceLocator(registry: ServiceLookup): ServiceLocator {
  return new RegistryServiceLocator(registry);
}
