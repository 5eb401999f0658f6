import {
  Attribute,
  Change,
  Control as LdapControl,
  NoSuchObjectError,
  type Client,
  type Entry as LdapEntry,
  type SearchOptions,
} from 'ldapts';
import { parentDnOf, rdnPairs } from '../dn.js';
import { Entry } from '../entry/entry.js';
import { NotFoundError } from '../errors.js';
import type { Control, SearchControl } from '../query/controls.js';
import { DEFAULT_SYNTAX_DECODERS, decodeSyntaxValue, type SyntaxDecoders } from '../schema/syntax.js';
import type { RawSchema } from '../schema/types.js';
import type {
  AttributeChanges,
  AttributeDeletes,
  AttributeInput,
  AttributeValue,
  Directory,
  Logger,
  RawAttributes,
  RawEntry,
  SearchParams,
  SearchScope,
} from '../types.js';

export interface LdapDirectoryConfig {
  /** A connected client, already bound with the credentials to use. */
  client: Client;
  baseDn: string;
  /** Search controls every query against this directory offers. */
  controls?: readonly SearchControl[];
  /** Per-syntax-OID decoders, on top of the built-in ones. */
  syntaxDecoders?: SyntaxDecoders;
  logger?: Logger;
}

const LDAP_SCOPES: Readonly<Record<SearchScope, NonNullable<SearchOptions['scope']>>> = {
  base: 'base',
  onelevel: 'one',
  subtree: 'sub',
};

const ANY_OBJECT = '(objectClass=*)';
const DEFAULT_SUBSCHEMA_DN = 'cn=Subschema';

const SCHEMA_ATTRIBUTES = ['objectClasses', 'attributeTypes', 'ldapSyntaxes', 'matchingRules', 'matchingRuleUse'] as const;

function toStrings(value: LdapEntry[string]): string[] {
  const values: (string | Buffer)[] = Array.isArray(value) ? value : [value];
  return values.map((v) => (typeof v === 'string' ? v : v.toString('utf8')));
}

function toRawValues(value: AttributeInput): string[] {
  return typeof value === 'object' ? value.map(String) : [String(value)];
}

function toRawEntry(entry: LdapEntry): RawEntry {
  const attributes: RawAttributes = {};
  for (const [name, value] of Object.entries(entry)) {
    if (name === 'dn') continue;
    attributes[name] = toStrings(value);
  }
  return { dn: entry.dn, attributes };
}

function valuesOf(entry: RawEntry, name: string): string[] {
  const wanted = name.toLowerCase();
  return Object.entries(entry.attributes).find(([key]) => key.toLowerCase() === wanted)?.[1] ?? [];
}

function toLdapControl(control: Control): LdapControl {
  return new LdapControl(control.oid, {
    critical: control.critical,
    ...(control.value !== undefined ? { value: control.value } : {}),
  });
}

/**
 * A Directory over an ldapts Client. The client's connection and bind are
 * the caller's business; protocol errors propagate as ldapts raises them,
 * except that reading an entry that does not exist resolves to null.
 */
export class LdapDirectory implements Directory {
  readonly baseDn: string;
  readonly logger: Logger;
  private readonly client: Client;
  private readonly controls: readonly SearchControl[];
  private readonly decoders: SyntaxDecoders;

  constructor(config: LdapDirectoryConfig) {
    this.client = config.client;
    this.baseDn = config.baseDn;
    this.logger = config.logger ?? console;
    this.controls = [...(config.controls ?? [])];
    this.decoders = { ...DEFAULT_SYNTAX_DECODERS, ...config.syntaxDecoders };
  }

  /** The entry at the directory's base DN. */
  get base(): Entry {
    return new Entry(this, this.baseDn);
  }

  /**
   * Client controls have no wire form; only the server controls are sent.
   * A limit of 0 and a timeout of 0 mean none.
   */
  async search(base: string, scope: SearchScope, filter: string, params: SearchParams): Promise<RawEntry[]> {
    this.logger.debug(`Searching ${base} (${scope}) for ${filter}`);
    const options: SearchOptions = {
      scope: LDAP_SCOPES[scope],
      filter,
      ...(params.selectAttrs.length > 0 ? { attributes: params.selectAttrs } : {}),
      ...(params.limit > 0 ? { sizeLimit: params.limit } : {}),
      ...(params.timeout > 0 ? { timeLimit: Math.ceil(params.timeout) } : {}),
    };
    const { searchEntries } = await this.client.search(base, options, params.serverControls.map(toLdapControl));
    return searchEntries.map(toRawEntry);
  }

  getEntry(dn: string): Promise<RawEntry | null> {
    return this.readEntry(dn, ['*']);
  }

  getExtendedEntry(dn: string): Promise<RawEntry | null> {
    return this.readEntry(dn, ['*', '+']);
  }

  private async readEntry(dn: string, attributes: string[]): Promise<RawEntry | null> {
    try {
      const { searchEntries } = await this.client.search(dn, { scope: 'base', filter: ANY_OBJECT, attributes });
      const [entry] = searchEntries;
      return entry === undefined ? null : toRawEntry(entry);
    } catch (err) {
      if (err instanceof NoSuchObjectError) return null;
      throw err;
    }
  }

  async modify(dn: string, changes: AttributeChanges): Promise<void> {
    const ldapChanges = Object.entries(changes).map(
      ([type, value]) =>
        new Change({ operation: 'replace', modification: new Attribute({ type, values: toRawValues(value) }) }),
    );
    if (ldapChanges.length === 0) return;
    this.logger.debug(`Modifying ${dn}: ${Object.keys(changes).join(', ')}`);
    await this.client.modify(dn, ldapChanges);
  }

  async create(dn: string, attributes: AttributeChanges): Promise<void> {
    this.logger.debug(`Adding ${dn}`);
    await this.client.add(
      dn,
      Object.entries(attributes).map(([type, value]) => new Attribute({ type, values: toRawValues(value) })),
    );
  }

  async delete(dn: string): Promise<void> {
    this.logger.debug(`Deleting ${dn}`);
    await this.client.del(dn);
  }

  /** Names in an array lose every value; a record removes only the values given. */
  async deleteAttributes(dn: string, attributes: AttributeDeletes): Promise<void> {
    const removals: [string, string[]][] = isNameList(attributes)
      ? attributes.map((type): [string, string[]] => [type, []])
      : Object.entries(attributes).map(([type, value]): [string, string[]] => [type, toRawValues(value)]);
    if (removals.length === 0) return;
    this.logger.debug(`Removing ${removals.map(([type]) => type).join(', ')} from ${dn}`);
    await this.client.modify(
      dn,
      removals.map(([type, values]) => new Change({ operation: 'delete', modification: new Attribute({ type, values }) })),
    );
  }

  async move(dn: string, newRdn: string, attributes: AttributeChanges): Promise<string> {
    const parent = parentDnOf(dn);
    const newDn = parent === '' ? newRdn : `${newRdn},${parent}`;
    this.logger.debug(`Renaming ${dn} to ${newDn}`);
    await this.client.modifyDN(dn, newRdn);
    await this.modify(newDn, attributes);
    return newDn;
  }

  /**
   * Adds a copy of the entry at `dn` under `newDn`: its attributes, with the
   * new RDN's values and then `attributes` replacing the copied ones.
   */
  async copy(dn: string, newDn: string, attributes: AttributeChanges): Promise<void> {
    const source = await this.getEntry(dn);
    if (source === null) throw new NotFoundError(dn);

    const copied: Record<string, AttributeInput> = { ...source.attributes };
    for (const pair of rdnPairs(newDn)) {
      const key = Object.keys(copied).find((k) => k.toLowerCase() === pair.attribute.toLowerCase()) ?? pair.attribute;
      copied[key] = [pair.value];
    }
    await this.create(newDn, { ...copied, ...attributes });
  }

  /** Reads the subschema entry the root DSE points at. */
  async schema(): Promise<RawSchema> {
    const rootDse = await this.readEntry('', ['subschemaSubentry']);
    const subschemaDn = rootDse === null ? DEFAULT_SUBSCHEMA_DN : (valuesOf(rootDse, 'subschemaSubentry')[0] ?? DEFAULT_SUBSCHEMA_DN);
    this.logger.debug(`Loading schema from ${subschemaDn}`);

    const { searchEntries } = await this.client.search(subschemaDn, {
      scope: 'base',
      filter: '(objectClass=subschema)',
      attributes: [...SCHEMA_ATTRIBUTES],
    });
    const [entry] = searchEntries;
    if (entry === undefined) throw new NotFoundError(subschemaDn, `No subschema entry at ${subschemaDn}`);
    const raw = toRawEntry(entry);
    return {
      objectClasses: valuesOf(raw, 'objectClasses'),
      attributeTypes: valuesOf(raw, 'attributeTypes'),
      ldapSyntaxes: valuesOf(raw, 'ldapSyntaxes'),
      matchingRules: valuesOf(raw, 'matchingRules'),
      matchingRuleUse: valuesOf(raw, 'matchingRuleUse'),
    };
  }

  registeredControls(): readonly SearchControl[] {
    return this.controls;
  }

  convertSyntaxValue(syntaxOid: string | null, raw: string): AttributeValue {
    return decodeSyntaxValue(syntaxOid, raw, this.decoders);
  }
}

function isNameList(attributes: AttributeDeletes): attributes is readonly string[] {
  return Array.isArray(attributes);
}
