import createDebug from "debug";
import type {
  Binding,
  ClassBinding,
  FactoryBinding,
  RegistryConfig,
  ServiceLocator,
  ServiceLookup,
  TypeDescriptor,
  TypeKey,
  ValueBinding,
} from "@locus-di/types";
import { readRegistryEnv } from "../config/env";
import { internDescriptor, isTypeDescriptor, typeOf } from "../descriptors/type-descriptor";
import {
  AmbiguousServiceError,
  CircularDependencyError,
  InvalidArgumentError,
  UnresolvedServiceError,
} from "../errors/locator-errors";

const debug = createDebug("locus:core:registry");

export type RegistryKey = TypeDescriptor | TypeKey;

export type RegistryOptions = Partial<RegistryConfig>;

type BindingEntry = {
  descriptor: TypeDescriptor;
  binding: Binding;
};

function isClassBinding<T>(b: Binding<T>): b is ClassBinding<T> {
  return "useClass" in b;
}

function isFactoryBinding<T>(b: Binding<T>): b is FactoryBinding<T> {
  return "useFactory" in b;
}

function isValueBinding<T>(b: Binding<T>): b is ValueBinding<T> {
  return "useValue" in b;
}

function toDescriptor(key: RegistryKey): TypeDescriptor {
  return isTypeDescriptor(key) ? internDescriptor(key) : typeOf(key);
}

/**
 * In-memory binding table behind a locator. Keys are interned descriptors, so
 * `List<String>` and `List<Number>` are separate entries.
 *
 * Each binding yields a single instance, created on first lookup.
 */
export class ServiceRegistry implements ServiceLookup {
  readonly config: RegistryConfig;
  private bindings = new Map<TypeDescriptor, BindingEntry[]>();
  private instances = new Map<BindingEntry, unknown>();
  private resolving = new Set<TypeDescriptor>();

  constructor(options: RegistryOptions = {}) {
    const env = readRegistryEnv();
    this.config = {
      name: options.name ?? env.name,
      erasedLookup: options.erasedLookup ?? env.erasedLookup,
    };
  }

  /** Adds a binding. A second binding for the same descriptor makes that descriptor ambiguous. */
  register<T>(key: RegistryKey, binding: Binding<T>): void {
    const descriptor = toDescriptor(key);
    const type = isClassBinding(binding) ? "class" : isFactoryBinding(binding) ? "factory" : "value";
    debug("[%s] register %s (%s)", this.config.name, descriptor.toString(), type);

    const entries = this.bindings.get(descriptor);
    if (entries) {
      entries.push({ descriptor, binding });
    } else {
      this.bindings.set(descriptor, [{ descriptor, binding }]);
    }
  }

  registerValue<T>(key: RegistryKey, value: T): void {
    this.register(key, { useValue: value });
  }

  registerClass<T>(target: new () => T): void {
    this.register(target, { useClass: target });
  }

  has(key: RegistryKey): boolean {
    return this.bindings.has(toDescriptor(key));
  }

  /** Registered descriptors in registration order. */
  descriptors(): TypeDescriptor[] {
    return [...this.bindings.keys()];
  }

  lookup(descriptor: TypeDescriptor, locator: ServiceLocator): unknown {
    const entry = this.select(descriptor);
    return this.instantiate(entry, locator);
  }

  private select(requested: TypeDescriptor): BindingEntry {
    const key = internDescriptor(requested);
    const exact = this.bindings.get(key) ?? [];
    if (exact.length === 1) {
      return exact[0];
    }
    if (exact.length > 1) {
      throw new AmbiguousServiceError(requested, exact.map((e) => e.descriptor));
    }

    if (!key.parameterized && this.config.erasedLookup !== "none") {
      const candidates = [...this.bindings.entries()]
        .filter(([d]) => d.parameterized && d.erasure() === key)
        .flatMap(([, entries]) => entries);

      if (candidates.length === 1 || (candidates.length > 1 && this.config.erasedLookup === "first")) {
        debug(
          "[%s] %s matched by erasure → %s",
          this.config.name,
          key.toString(),
          candidates[0].descriptor.toString(),
        );
        return candidates[0];
      }
      if (candidates.length > 1) {
        throw new AmbiguousServiceError(requested, candidates.map((c) => c.descriptor));
      }
    }

    throw new UnresolvedServiceError(requested);
  }

  private instantiate(entry: BindingEntry, locator: ServiceLocator): unknown {
    const name = entry.descriptor.toString();
    if (this.instances.has(entry)) {
      debug("[%s] lookup %s → cached", this.config.name, name);
      return this.instances.get(entry);
    }

    if (this.resolving.has(entry.descriptor)) {
      throw new CircularDependencyError([...this.resolving, entry.descriptor]);
    }

    debug("[%s] lookup %s → constructing", this.config.name, name);
    this.resolving.add(entry.descriptor);
    try {
      const instance = this.createFromBinding(entry.binding, locator);
      this.instances.set(entry, instance);
      return instance;
    } finally {
      this.resolving.delete(entry.descriptor);
    }
  }

  private createFromBinding(binding: Binding, locator: ServiceLocator): unknown {
    if (isValueBinding(binding)) {
      return binding.useValue;
    }

    if (isClassBinding(binding)) {
      return new binding.useClass();
    }

    if (isFactoryBinding(binding)) {
      return binding.useFactory(locator);
    }

    throw new InvalidArgumentError("Invalid binding configuration");
  }
}
