import { Entry, type EntryFactory, type EntryOptions } from '../entry/entry.js';
import { ConfigurationError } from '../errors.js';
import { QueryDescriptor } from '../query/descriptor.js';
import type { Directory, RawEntry } from '../types.js';
import type { Capability } from './capability.js';
import type { Model } from './model.js';

/**
 * An entry that knows which of its model's capabilities apply to it, by its
 * objectClasses and by where it sits in the tree. Applicability is worked out
 * on each call, so it follows writes to objectClass and moves.
 */
export class ModelEntry extends Entry {
  constructor(
    readonly model: Model,
    directory: Directory,
    dn: string,
    raw: RawEntry | null = null,
    options: EntryOptions = {},
  ) {
    super(directory, dn, raw, options);
  }

  override entryFactory(): EntryFactory<ModelEntry> {
    const options: EntryOptions = { includeOperationalAttrs: this.includeOperationalAttrs };
    return (directory, dn, raw) => new ModelEntry(this.model, directory, dn, raw, options);
  }

  override query(): QueryDescriptor<ModelEntry> {
    return new QueryDescriptor(this, this.entryFactory());
  }

  async capabilities(): Promise<Capability[]> {
    return this.model.mixinsFor(this);
  }

  async hasCapability(capability: Capability): Promise<boolean> {
    return (await this.capabilities()).includes(capability);
  }

  /** The operations `capability` adds to this entry. */
  async capability<TOps extends object>(capability: Capability<TOps>): Promise<TOps> {
    if (!(await this.hasCapability(capability))) {
      throw new ConfigurationError(`Capability "${capability.name}" does not apply to ${this.dn}`);
    }
    if (capability.operations === undefined) {
      throw new ConfigurationError(`Capability "${capability.name}" defines no operations`);
    }
    return capability.operations(this);
  }
}
