import { assertValidDn, rdnPairs } from '../dn.js';
import type { Entry, EntryFactory } from '../entry/entry.js';
import type { QueryDescriptor } from '../query/descriptor.js';
import type { QueryUnion } from '../query/union.js';
import type { AttributeInput, Directory, Logger, RawAttributes } from '../types.js';
import type { Capability } from './capability.js';
import { ModelEntry } from './model-entry.js';
import { CapabilityRegistry } from './registry.js';
import { buildCapabilityQuery } from './search.js';

export interface ModelConfig {
  /** Identifies the model in a ModelCatalog. */
  name: string;
  directory: Directory;
  /** Defaults to a new, empty registry. */
  registry?: CapabilityRegistry;
  capabilities?: readonly Capability[];
  logger?: Logger;
}

function toRawValues(value: AttributeInput): string[] {
  return typeof value === 'object' ? value.map(String) : [String(value)];
}

function appendUnique(values: string[], additions: Iterable<string>, caseInsensitive = false): string[] {
  const fold = (v: string): string => (caseInsensitive ? v.toLowerCase() : v);
  const seen = new Set(values.map(fold));
  const result = [...values];
  for (const value of additions) {
    if (seen.has(fold(value))) continue;
    seen.add(fold(value));
    result.push(value);
  }
  return result;
}

/**
 * A model class: a directory plus the capabilities registered for it. Entries
 * it produces are ModelEntry instances that resolve their capabilities through
 * this model's registry.
 *
 * @example
 * const hosts = new Model({ name: 'hosts', directory });
 * hosts.register(ipHostCapability);
 * for await (const host of hosts.search(ipHostCapability)) {
 *   const ops = await host.capability(ipHostCapability);
 * }
 */
export class Model {
  readonly name: string;
  readonly directory: Directory;
  readonly registry: CapabilityRegistry;
  private readonly logger: Logger;

  constructor(config: ModelConfig) {
    this.name = config.name;
    this.directory = config.directory;
    this.registry = config.registry ?? new CapabilityRegistry();
    this.logger = config.logger ?? config.directory.logger ?? console;
    for (const capability of config.capabilities ?? []) this.register(capability);
  }

  register(...capabilities: Capability[]): this {
    for (const capability of capabilities) {
      this.logger.debug(`Registering capability "${capability.name}" with model "${this.name}"`);
      this.registry.register(capability);
    }
    return this;
  }

  unregister(capability: Capability): boolean {
    return this.registry.unregister(capability);
  }

  /** Every entry `capability` applies to, in `directory` (this model's by default). */
  search(capability: Capability, directory: Directory = this.directory): QueryDescriptor<ModelEntry> | QueryUnion<ModelEntry> {
    return buildCapabilityQuery(capability, directory, this.entryFactory());
  }

  /**
   * The registered capabilities that apply to `entry`: those whose
   * objectClasses it has, then those whose bases it sits under.
   */
  async mixinsFor(entry: Entry): Promise<Capability[]> {
    const objectClasses = (await entry.exists()) ? ((await entry.raw('objectClass')) ?? []) : [];
    const byClass = this.registry.mixinsForObjectClasses(objectClasses);
    const byDn = this.registry.mixinsForDn(entry.dn);
    return this.registry.capabilities().filter((c) => byClass.includes(c) || byDn.includes(c));
  }

  /** Re-wraps `entry` as a ModelEntry of this model. */
  async wrap(entry: Entry): Promise<ModelEntry> {
    const raw = (await entry.exists()) ? await entry.fetch() : null;
    return new ModelEntry(this, entry.directory, entry.dn, raw, {
      includeOperationalAttrs: entry.includeOperationalAttrs,
    });
  }

  entryFactory(): EntryFactory<ModelEntry> {
    return (directory, dn, raw) => new ModelEntry(this, directory, dn, raw);
  }

  /**
   * A new entry that is not in the directory yet. The capability's
   * objectClasses come first in its objectClass values, followed by any others
   * given, and every RDN attribute carries its RDN value. Store it with
   * `create()`.
   */
  build(capability: Capability, dn: string, attributes: Readonly<Record<string, AttributeInput>> = {}): ModelEntry {
    assertValidDn(dn);

    const raw: RawAttributes = {};
    const keyOf = (name: string): string =>
      Object.keys(raw).find((key) => key.toLowerCase() === name.toLowerCase()) ?? name;

    for (const [name, value] of Object.entries(attributes)) {
      if (name.toLowerCase() === 'objectclass') continue;
      raw[keyOf(name)] = appendUnique(raw[keyOf(name)] ?? [], toRawValues(value));
    }

    const given = Object.entries(attributes)
      .filter(([name]) => name.toLowerCase() === 'objectclass')
      .flatMap(([, value]) => toRawValues(value));
    const objectClasses = appendUnique([...capability.objectClasses], given, true);
    if (objectClasses.length > 0) raw['objectClass'] = objectClasses;

    for (const pair of rdnPairs(dn)) {
      const key = keyOf(pair.attribute);
      raw[key] = appendUnique(raw[key] ?? [], [pair.value]);
    }

    return new ModelEntry(this, this.directory, dn, { dn, attributes: raw });
  }
}
