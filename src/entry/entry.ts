import {
  assertValidDn,
  buildRdn,
  dnKey,
  parentDnOf,
  parseDn,
  rdnOf,
  rdnPairs,
  splitDn,
  toUfn,
  type RdnPair,
} from '../dn.js';
import { InvalidDnError, NotFoundError, UnknownAttributeError } from '../errors.js';
import { compileFilter, serializeFilter } from '../filter/compiler.js';
import type { FilterCriteria } from '../filter/types.js';
import { QueryDescriptor, resolveScope } from '../query/descriptor.js';
import type { QueryUnion } from '../query/union.js';
import { schemaFor } from '../schema/cache.js';
import type { AttributeType, ObjectClass } from '../schema/schema.js';
import type {
  AttributeChanges,
  AttributeDeletes,
  AttributeInput,
  DecodedValue,
  Directory,
  Logger,
  RawAttributes,
  RawEntry,
  SearchParams,
} from '../types.js';

/** Wraps a search result (or a bare DN) as an entry of a particular type. */
export type EntryFactory<E extends Entry = Entry> = (directory: Directory, dn: string, raw: RawEntry | null) => E;

export interface EntryOptions {
  /** Fetch operational attributes (createTimestamp, entryUUID, ...) as well. */
  includeOperationalAttrs?: boolean;
}

/** Skeleton values: '' for single-valued attributes, [] for the rest. */
export type AttributesHash = Record<string, '' | string[]>;

function findAttribute(attributes: RawAttributes, name: string): [key: string, values: string[]] | undefined {
  const wanted = name.toLowerCase();
  for (const [key, values] of Object.entries(attributes)) {
    if (key.toLowerCase() === wanted) return [key, values];
  }
  return undefined;
}

function toRawValues(value: AttributeInput): string[] {
  return typeof value === 'object' ? value.map(String) : [String(value)];
}

/**
 * A directory entry bound to a DN. Attribute values are fetched on first use
 * and decoded through the directory's schema; decoded values are cached until
 * a write through this entry invalidates them.
 *
 * @example
 * const people = new Entry(directory, 'ou=people,dc=acme,dc=com');
 * const alice = await people.child('uid', 'alice');
 * await alice.get('cn');          // ['Alice Smith']
 * await alice.set('mail', 'alice@acme.example');
 */
export class Entry {
  readonly includeOperationalAttrs: boolean;

  private currentDn: string;
  private rawEntry: RawEntry | null;
  private readonly values = new Map<string, DecodedValue | null>();

  constructor(
    readonly directory: Directory,
    dn: string,
    raw: RawEntry | null = null,
    options: EntryOptions = {},
  ) {
    this.currentDn = assertValidDn(dn);
    this.rawEntry = raw;
    this.includeOperationalAttrs = options.includeOperationalAttrs ?? false;
  }

  protected get logger(): Logger {
    return this.directory.logger ?? console;
  }

  /**
   * How results of queries rooted at this entry (and its parent, children and
   * copies) are wrapped. Subclasses override it to keep their own type.
   */
  entryFactory(): EntryFactory {
    const options: EntryOptions = { includeOperationalAttrs: this.includeOperationalAttrs };
    return (directory, dn, raw) => new Entry(directory, dn, raw, options);
  }

  // ---------------------------------------------------------------------------
  // DN
  // ---------------------------------------------------------------------------

  get dn(): string {
    return this.currentDn;
  }

  get rdn(): string {
    return rdnOf(this.currentDn);
  }

  /** The RDN's attribute/value pairs, values unescaped. */
  get rdnPairs(): RdnPair[] {
    return rdnPairs(this.currentDn);
  }

  get parentDn(): string {
    return parentDnOf(this.currentDn);
  }

  splitDn(limit = 0): string[] {
    return splitDn(this.currentDn, limit);
  }

  /** The entry one level up, or null for a top-level entry. */
  parent(): Entry | null {
    const parentDn = this.parentDn;
    return parentDn === '' ? null : this.entryFactory()(this.directory, parentDn, null);
  }

  /** Entries immediately below this one. */
  children(): QueryDescriptor {
    return this.query().scope('onelevel');
  }

  /**
   * The entry `attribute=value[+more...],<this dn>`. Nothing is read from or
   * written to the directory except the schema, which validates every
   * attribute name.
   */
  async child(attribute: string, value: string, additionalPairs: Readonly<Record<string, string>> = {}): Promise<Entry> {
    const pairs: RdnPair[] = [{ attribute, value }, ...Object.entries(additionalPairs).map(([a, v]) => ({ attribute: a, value: v }))];
    const schema = await schemaFor(this.directory);
    for (const pair of pairs) {
      if (schema.attributeType(pair.attribute) === undefined) throw new UnknownAttributeError(pair.attribute);
    }
    return this.entryFactory()(this.directory, `${buildRdn(pairs)},${this.currentDn}`, null);
  }

  toUfn(): string {
    return toUfn(this.currentDn);
  }

  toString(): string {
    return this.currentDn;
  }

  /** See compareEntries(). */
  compare(other: Entry): number | null {
    return compareEntries(this, other);
  }

  // ---------------------------------------------------------------------------
  // Attribute access
  // ---------------------------------------------------------------------------

  /** The raw entry, fetched on first use. Throws NotFoundError if it does not exist. */
  async fetch(): Promise<RawEntry> {
    if (this.rawEntry !== null) return this.rawEntry;
    const raw = this.includeOperationalAttrs
      ? await this.directory.getExtendedEntry(this.currentDn)
      : await this.directory.getEntry(this.currentDn);
    if (raw === null) throw new NotFoundError(this.currentDn);
    this.rawEntry = raw;
    return raw;
  }

  /** True when the directory has a non-empty entry at this DN. */
  async exists(): Promise<boolean> {
    try {
      const raw = await this.fetch();
      return Object.keys(raw.attributes).length > 0;
    } catch (err) {
      if (err instanceof NotFoundError) return false;
      throw err;
    }
  }

  private async fetchIfExists(): Promise<RawEntry | null> {
    try {
      return await this.fetch();
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  /** The undecoded values of `attribute`, or null if the entry has none. */
  async raw(attribute: string): Promise<string[] | null> {
    const raw = await this.fetch();
    return findAttribute(raw.attributes, attribute)?.[1] ?? null;
  }

  /**
   * The decoded value of `attribute`: a scalar for SINGLE-VALUE attribute
   * types, an array otherwise. Null when the entry has no such attribute or
   * the schema does not know it; use raw() for the latter.
   */
  async get(attribute: string): Promise<DecodedValue | null> {
    const key = attribute.toLowerCase();
    const cached = this.values.get(key);
    if (cached !== undefined) return cached;

    const schema = await schemaFor(this.directory);
    const type = schema.attributeType(attribute);
    if (type === undefined) {
      this.logger.info(`No attributeType for ${JSON.stringify(attribute)} on ${this.currentDn}`);
      return null;
    }

    const raw = await this.fetch();
    const found = findAttribute(raw.attributes, attribute);
    if (found === undefined) return null;

    const decoded = found[1].map((value) => this.directory.convertSyntaxValue(type.syntaxOid, value));
    const value: DecodedValue | null = type.singleValued ? (decoded[0] ?? null) : decoded;
    this.values.set(key, value);
    return value;
  }

  /** Replaces the values of one attribute. Other cached values are kept. */
  async set(attribute: string, value: AttributeInput): Promise<void> {
    this.logger.debug(`Modifying ${attribute} of ${this.currentDn}`);
    await this.directory.modify(this.currentDn, { [attribute]: value });

    this.values.delete(attribute.toLowerCase());
    if (this.rawEntry !== null) {
      const key = findAttribute(this.rawEntry.attributes, attribute)?.[0] ?? attribute;
      this.rawEntry = {
        dn: this.rawEntry.dn,
        attributes: { ...this.rawEntry.attributes, [key]: toRawValues(value) },
      };
    }
  }

  /** Replaces the values of several attributes at once. */
  async merge(attributes: AttributeChanges): Promise<void> {
    this.logger.debug(`Merging ${Object.keys(attributes).join(', ')} into ${this.currentDn}`);
    await this.directory.modify(this.currentDn, attributes);
    this.clearCaches();
  }

  /**
   * Without arguments, deletes the entry. Otherwise removes the named
   * attributes, or only the given values of them.
   */
  async delete(attributes?: AttributeDeletes): Promise<void> {
    if (attributes === undefined) {
      this.logger.debug(`Deleting ${this.currentDn}`);
      await this.directory.delete(this.currentDn);
    } else {
      await this.directory.deleteAttributes(this.currentDn, attributes);
    }
    this.clearCaches();
  }

  /**
   * Adds the entry to the directory, with the given attributes or, without
   * them, the attributes it was built with.
   */
  async create(attributes?: AttributeChanges): Promise<void> {
    const toCreate = attributes ?? this.rawEntry?.attributes ?? {};
    this.logger.debug(`Creating ${this.currentDn}`);
    await this.directory.create(this.currentDn, toCreate);
    this.clearCaches();
  }

  /** Copies the entry to `newDn`, overriding `attributes` on the copy. */
  async copy(newDn: string, attributes: AttributeChanges = {}): Promise<Entry> {
    assertValidDn(newDn);
    await this.directory.copy(this.currentDn, newDn, attributes);
    return this.entryFactory()(this.directory, newDn, null);
  }

  /** Renames the entry within its parent. This entry then refers to the new DN. */
  async move(newRdn: string, attributes: AttributeChanges = {}): Promise<this> {
    if (parseDn(newRdn).length !== 1) {
      throw new InvalidDnError(newRdn, `Invalid RDN ${JSON.stringify(newRdn)}: expected a single component`);
    }
    const newDn = await this.directory.move(this.currentDn, newRdn, attributes);
    this.currentDn = assertValidDn(newDn);
    this.clearCaches();
    return this;
  }

  private clearCaches(): void {
    this.values.clear();
    this.rawEntry = null;
  }

  // ---------------------------------------------------------------------------
  // Schema
  // ---------------------------------------------------------------------------

  /**
   * The schema objectClasses of this entry plus `extra`. An entry that does
   * not exist yet contributes none of its own.
   */
  async objectClasses(...extra: string[]): Promise<ObjectClass[]> {
    const schema = await schemaFor(this.directory);
    const raw = await this.fetchIfExists();
    const names = [...(raw === null ? [] : (findAttribute(raw.attributes, 'objectClass')?.[1] ?? [])), ...extra];

    const classes: ObjectClass[] = [];
    for (const name of names) {
      const oc = schema.objectClass(name);
      if (oc === undefined) {
        this.logger.debug(`No objectClass ${JSON.stringify(name)} in the schema`);
      } else if (!classes.includes(oc)) {
        classes.push(oc);
      }
    }
    return classes;
  }

  /** The effective MUST attribute names/OIDs, as the objectClasses declare them. */
  async mustOids(...extra: string[]): Promise<string[]> {
    return uniqueCaseInsensitive((await this.objectClasses(...extra)).flatMap((oc) => oc.must));
  }

  async mayOids(...extra: string[]): Promise<string[]> {
    return uniqueCaseInsensitive((await this.objectClasses(...extra)).flatMap((oc) => oc.may));
  }

  async validAttributeOids(...extra: string[]): Promise<string[]> {
    const classes = await this.objectClasses(...extra);
    return uniqueCaseInsensitive([...classes.flatMap((oc) => oc.must), ...classes.flatMap((oc) => oc.may)]);
  }

  async mustAttributeTypes(...extra: string[]): Promise<AttributeType[]> {
    return this.resolveAttributeTypes(await this.mustOids(...extra));
  }

  async mayAttributeTypes(...extra: string[]): Promise<AttributeType[]> {
    return this.resolveAttributeTypes(await this.mayOids(...extra));
  }

  async validAttributeTypes(...extra: string[]): Promise<AttributeType[]> {
    return this.resolveAttributeTypes(await this.validAttributeOids(...extra));
  }

  /** True if one of the entry's objectClasses allows `name`. */
  async isValidAttribute(name: string): Promise<boolean> {
    const wanted = name.toLowerCase();
    return (await this.validAttributeTypes()).some(
      (type) => type.oid.toLowerCase() === wanted || type.names.some((n) => n.toLowerCase() === wanted),
    );
  }

  async mustAttributesHash(...extra: string[]): Promise<AttributesHash> {
    return toAttributesHash(await this.mustAttributeTypes(...extra));
  }

  async mayAttributesHash(...extra: string[]): Promise<AttributesHash> {
    return toAttributesHash(await this.mayAttributeTypes(...extra));
  }

  async validAttributesHash(...extra: string[]): Promise<AttributesHash> {
    return {
      ...(await this.mayAttributesHash(...extra)),
      ...(await this.mustAttributesHash(...extra)),
    };
  }

  private async resolveAttributeTypes(names: readonly string[]): Promise<AttributeType[]> {
    const schema = await schemaFor(this.directory);
    const types: AttributeType[] = [];
    for (const name of names) {
      const type = schema.attributeType(name);
      if (type !== undefined && !types.includes(type)) types.push(type);
    }
    return types;
  }

  // ---------------------------------------------------------------------------
  // Queries rooted here
  // ---------------------------------------------------------------------------

  query(): QueryDescriptor {
    return new QueryDescriptor(this, this.entryFactory());
  }

  filter(criteria: FilterCriteria): QueryDescriptor {
    return this.query().filter(criteria);
  }

  scope(scope: string): QueryDescriptor {
    return this.query().scope(scope);
  }

  select(...attributes: string[]): QueryDescriptor {
    return this.query().select(...attributes);
  }

  combine(other: QueryDescriptor | Entry): QueryUnion {
    return this.query().combine(other);
  }

  /** One search below this entry, without building a descriptor. */
  async search(scope: string, criteria: FilterCriteria, params: Partial<SearchParams> = {}): Promise<Entry[]> {
    const results = await this.directory.search(this.currentDn, resolveScope(scope), serializeFilter(compileFilter(criteria)), {
      limit: 0,
      selectAttrs: [],
      timeout: 0,
      clientControls: [],
      serverControls: [],
      ...params,
    });
    const wrap = this.entryFactory();
    return results.map((raw) => wrap(this.directory, raw.dn, raw));
  }
}

function uniqueCaseInsensitive(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (seen.has(value.toLowerCase())) continue;
    seen.add(value.toLowerCase());
    result.push(value);
  }
  return result;
}

function toAttributesHash(types: readonly AttributeType[]): AttributesHash {
  const hash: AttributesHash = {};
  for (const type of types) {
    hash[type.names[0] ?? type.oid] = type.singleValued ? '' : [];
  }
  return hash;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders entries by tree position: DN components are compared pairwise from
 * the rightmost (least specific) end, and an ancestor sorts before its
 * descendants. Entries of different types are incomparable (null).
 */
export function compareEntries(a: Entry, b: Entry): number | null {
  if (a.constructor !== b.constructor) return null;
  if (dnKey(a.dn) === dnKey(b.dn)) return 0;

  const left = splitDn(dnKey(a.dn)).reverse();
  const right = splitDn(dnKey(b.dn)).reverse();
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i += 1) {
    const result = compareStrings(left[i] ?? '', right[i] ?? '');
    if (result !== 0) return result;
  }
  return Math.sign(left.length - right.length);
}
