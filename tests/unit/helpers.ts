import { readFileSync } from 'node:fs';
import { vi } from 'vitest';
import { dnKey, isAncestorOrSelf, parentDnOf, rdnPairs, splitDn } from '../../src/dn.js';
import { NotFoundError } from '../../src/errors.js';
import type { SearchControl } from '../../src/query/controls.js';
import { decodeSyntaxValue } from '../../src/schema/syntax.js';
import type { RawSchema } from '../../src/schema/types.js';
import type {
  AttributeChanges,
  AttributeDeletes,
  AttributeInput,
  AttributeValue,
  Directory,
  RawAttributes,
  RawEntry,
  SearchParams,
  SearchScope,
} from '../../src/types.js';

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export function loadRawSchema(): RawSchema {
  const parsed: unknown = JSON.parse(readFileSync(new URL('../fixtures/schema.json', import.meta.url), 'utf8'));
  if (typeof parsed !== 'object' || parsed === null) throw new Error('schema fixture is not an object');
  const schema: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isStringList(value)) throw new Error(`schema fixture: ${key} is not a list of strings`);
    schema[key] = value;
  }
  return schema;
}

export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function rawEntry(dn: string, attributes: RawAttributes): RawEntry {
  return { dn, attributes };
}

function toValues(value: AttributeInput): string[] {
  return typeof value === 'object' ? value.map(String) : [String(value)];
}

function isNameList(attributes: AttributeDeletes): attributes is readonly string[] {
  return Array.isArray(attributes);
}

function depth(dn: string): number {
  return splitDn(dn).length;
}

/**
 * An in-memory Directory. Searches honor base, scope and limit but ignore
 * the filter text; tests assert on the filter through a spy.
 */
export class FakeDirectory implements Directory {
  readonly baseDn: string;
  readonly logger = makeLogger();
  readonly entries = new Map<string, RawEntry>();
  /** Extra attributes only getExtendedEntry() returns, by DN key. */
  readonly operational = new Map<string, RawAttributes>();
  controls: SearchControl[] = [];
  rawSchema: RawSchema;

  constructor(baseDn = 'dc=acme,dc=com', rawSchema: RawSchema = loadRawSchema()) {
    this.baseDn = baseDn;
    this.rawSchema = rawSchema;
  }

  add(dn: string, attributes: RawAttributes): this {
    this.entries.set(dnKey(dn), rawEntry(dn, attributes));
    return this;
  }

  private require(dn: string): RawEntry {
    const entry = this.entries.get(dnKey(dn));
    if (entry === undefined) throw new NotFoundError(dn);
    return entry;
  }

  async search(base: string, scope: SearchScope, _filter: string, params: SearchParams): Promise<RawEntry[]> {
    const matches = [...this.entries.values()].filter((entry) => {
      if (!isAncestorOrSelf(base, entry.dn)) return false;
      const levels = depth(entry.dn) - depth(base);
      if (scope === 'base') return levels === 0;
      if (scope === 'onelevel') return levels === 1;
      return true;
    });
    return params.limit > 0 ? matches.slice(0, params.limit) : matches;
  }

  async getEntry(dn: string): Promise<RawEntry | null> {
    return this.entries.get(dnKey(dn)) ?? null;
  }

  async getExtendedEntry(dn: string): Promise<RawEntry | null> {
    const entry = this.entries.get(dnKey(dn));
    if (entry === undefined) return null;
    return rawEntry(entry.dn, { ...entry.attributes, ...this.operational.get(dnKey(dn)) });
  }

  async modify(dn: string, changes: AttributeChanges): Promise<void> {
    const entry = this.require(dn);
    const attributes = { ...entry.attributes };
    for (const [name, value] of Object.entries(changes)) attributes[name] = toValues(value);
    this.entries.set(dnKey(dn), rawEntry(entry.dn, attributes));
  }

  async create(dn: string, attributes: AttributeChanges): Promise<void> {
    const raw: RawAttributes = {};
    for (const [name, value] of Object.entries(attributes)) raw[name] = toValues(value);
    this.add(dn, raw);
  }

  async delete(dn: string): Promise<void> {
    this.require(dn);
    this.entries.delete(dnKey(dn));
  }

  async deleteAttributes(dn: string, attributes: AttributeDeletes): Promise<void> {
    const entry = this.require(dn);
    const remaining = { ...entry.attributes };
    if (isNameList(attributes)) {
      for (const name of attributes) delete remaining[name];
    } else {
      for (const [name, value] of Object.entries(attributes)) {
        const drop = toValues(value);
        remaining[name] = (remaining[name] ?? []).filter((v) => !drop.includes(v));
      }
    }
    this.entries.set(dnKey(dn), rawEntry(entry.dn, remaining));
  }

  async move(dn: string, newRdn: string, attributes: AttributeChanges): Promise<string> {
    const entry = this.require(dn);
    const parent = parentDnOf(dn);
    const newDn = parent === '' ? newRdn : `${newRdn},${parent}`;
    this.entries.delete(dnKey(dn));
    this.add(newDn, { ...entry.attributes });
    await this.modify(newDn, attributes);
    return newDn;
  }

  async copy(dn: string, newDn: string, attributes: AttributeChanges): Promise<void> {
    const entry = this.require(dn);
    const copied: RawAttributes = { ...entry.attributes };
    for (const pair of rdnPairs(newDn)) copied[pair.attribute] = [pair.value];
    this.add(newDn, copied);
    await this.modify(newDn, attributes);
  }

  async schema(): Promise<RawSchema> {
    return this.rawSchema;
  }

  registeredControls(): readonly SearchControl[] {
    return this.controls;
  }

  convertSyntaxValue(syntaxOid: string | null, raw: string): AttributeValue {
    return decodeSyntaxValue(syntaxOid, raw);
  }
}

/** A small tree: the base, two organizational units, three people and a host. */
export function makeDirectory(): FakeDirectory {
  return new FakeDirectory()
    .add('dc=acme,dc=com', { objectClass: ['top', 'dcObject'], dc: ['acme'] })
    .add('ou=people,dc=acme,dc=com', { objectClass: ['top', 'organizationalUnit'], ou: ['people'] })
    .add('ou=hosts,dc=acme,dc=com', { objectClass: ['top', 'organizationalUnit'], ou: ['hosts'] })
    .add('uid=alice,ou=people,dc=acme,dc=com', {
      objectClass: ['top', 'person', 'organizationalPerson', 'inetOrgPerson'],
      uid: ['alice'],
      cn: ['Alice Smith'],
      sn: ['Smith'],
      l: ['Portland'],
      displayName: ['Alice'],
    })
    .add('uid=bob,ou=people,dc=acme,dc=com', {
      objectClass: ['top', 'person', 'organizationalPerson', 'inetOrgPerson', 'posixAccount'],
      uid: ['bob'],
      cn: ['Bob Jones', 'Robert Jones'],
      sn: ['Jones'],
      l: ['Seattle'],
      uidNumber: ['1001'],
      gidNumber: ['100'],
      homeDirectory: ['/home/bob'],
      accountLocked: ['FALSE'],
    })
    .add('uid=carol,ou=people,dc=acme,dc=com', {
      objectClass: ['top', 'person', 'organizationalPerson', 'inetOrgPerson'],
      uid: ['carol'],
      cn: ['Carol White'],
      sn: ['White'],
      l: ['Portland'],
    })
    .add('cn=gateway,ou=hosts,dc=acme,dc=com', {
      objectClass: ['top', 'device', 'ipHost'],
      cn: ['gateway'],
      ipHostNumber: ['192.0.2.1'],
    });
}
