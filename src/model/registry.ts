import { dnKey, splitDn } from '../dn.js';
import { ConfigurationError } from '../errors.js';
import type { Capability } from './capability.js';

function addTo<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key);
  if (list === undefined) index.set(key, [value]);
  else if (!list.includes(value)) list.push(value);
}

function removeFrom<K, V>(index: Map<K, V[]>, value: V): void {
  for (const [key, list] of index) {
    const remaining = list.filter((v) => v !== value);
    if (remaining.length === 0) index.delete(key);
    else index.set(key, remaining);
  }
}

/**
 * Capabilities indexed two ways: by required objectClass and by base DN.
 * Lookups return capabilities in registration order.
 */
export class CapabilityRegistry {
  private readonly byObjectClass = new Map<string, Capability[]>();
  private readonly byBase = new Map<string, Capability[]>();
  private readonly ordered: Capability[] = [];

  /** Registering the same capability twice is a no-op; another one with its name is an error. */
  register(capability: Capability): void {
    if (this.ordered.includes(capability)) return;
    if (this.ordered.some((c) => c.name === capability.name)) {
      throw new ConfigurationError(`A capability named "${capability.name}" is already registered`);
    }
    this.ordered.push(capability);
    for (const oc of capability.objectClasses) addTo(this.byObjectClass, oc.toLowerCase(), capability);
    for (const base of capability.bases) addTo(this.byBase, dnKey(base), capability);
  }

  /** Removes the capability from both indices. Returns false if it was not registered. */
  unregister(capability: Capability): boolean {
    const index = this.ordered.indexOf(capability);
    if (index === -1) return false;
    this.ordered.splice(index, 1);
    removeFrom(this.byObjectClass, capability);
    removeFrom(this.byBase, capability);
    return true;
  }

  has(capability: Capability): boolean {
    return this.ordered.includes(capability);
  }

  clear(): void {
    this.ordered.length = 0;
    this.byObjectClass.clear();
    this.byBase.clear();
  }

  capabilities(): readonly Capability[] {
    return [...this.ordered];
  }

  /**
   * Capabilities whose (non-empty) objectClass requirements are all among
   * `objectClasses`, compared case-insensitively.
   */
  mixinsForObjectClasses(objectClasses: Iterable<string>): Capability[] {
    const present = new Set([...objectClasses].map((oc) => oc.toLowerCase()));
    const candidates = new Set<Capability>();
    for (const oc of present) {
      for (const capability of this.byObjectClass.get(oc) ?? []) candidates.add(capability);
    }
    return this.ordered.filter(
      (c) => candidates.has(c) && c.objectClasses.every((oc) => present.has(oc.toLowerCase())),
    );
  }

  /** Capabilities with a base equal to `dn` or above it. */
  mixinsForDn(dn: string): Capability[] {
    const components = splitDn(dn);
    const matched = new Set<Capability>();
    for (let i = 0; i < components.length; i += 1) {
      const suffix = dnKey(components.slice(i).join(','));
      for (const capability of this.byBase.get(suffix) ?? []) matched.add(capability);
    }
    return this.ordered.filter((c) => matched.has(c));
  }
}
