import type { Entry, EntryFactory } from '../entry/entry.js';
import { ConfigurationError, InvalidScopeError } from '../errors.js';
import { DEFAULT_FILTER, compileFilter, conjoin, serializeFilter } from '../filter/compiler.js';
import type { FilterCriteria, FilterNode } from '../filter/types.js';
import {
  isValueList,
  type AttributeValue,
  type DecodedValue,
  type RawAttributes,
  type RawEntry,
  type SearchParams,
  type SearchScope,
} from '../types.js';
import type { SearchControl } from './controls.js';
import { QueryUnion } from './union.js';

export interface QueryOptions {
  /** null means "no filter applied yet": searches use (objectClass=*). */
  filter: FilterNode | null;
  /** A SearchScope, or an unrecognized string kept as given. */
  scope: string;
  select: string[];
  limit: number;
  timeout: number;
  controlState: ReadonlyMap<string, unknown>;
}

export const DEFAULT_SCOPE: SearchScope = 'subtree';

export const DEFAULT_OPTIONS: Readonly<QueryOptions> = Object.freeze({
  filter: null,
  scope: DEFAULT_SCOPE,
  select: [],
  limit: 0,
  timeout: 0,
  controlState: new Map<string, unknown>(),
});

const SCOPE_SYNONYMS: Readonly<Record<string, SearchScope>> = {
  base: 'base',
  one: 'onelevel',
  onelevel: 'onelevel',
  sub: 'subtree',
  subtree: 'subtree',
};

/** Maps `one` / `sub` to their canonical names; anything unknown is returned as is. */
export function normalizeScope(scope: string): string {
  return SCOPE_SYNONYMS[scope.toLowerCase()] ?? scope;
}

export function resolveScope(scope: string): SearchScope {
  const resolved = SCOPE_SYNONYMS[scope.toLowerCase()];
  if (resolved === undefined) throw new InvalidScopeError(scope);
  return resolved;
}

function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * An immutable description of a directory search: base, filter, scope,
 * attribute selection, limit and timeout. Every refinement returns a new
 * descriptor; nothing touches the directory until the descriptor is
 * enumerated, and each enumeration is exactly one search.
 *
 * @example
 * const people = directory.base.query()
 *   .filter({ objectClass: 'inetOrgPerson', l: ['Portland', 'Seattle'] })
 *   .select('cn', 'mail')
 *   .limit(50);
 * for await (const person of people) console.log(await person.get('mail'));
 */
export class QueryDescriptor<E extends Entry = Entry> implements AsyncIterable<E> {
  private readonly opts: QueryOptions;
  private readonly controls: readonly SearchControl[];

  constructor(
    readonly base: Entry,
    private readonly factory: EntryFactory<E>,
    options: Partial<QueryOptions> = {},
  ) {
    this.opts = {
      ...DEFAULT_OPTIONS,
      ...options,
      select: [...(options.select ?? DEFAULT_OPTIONS.select)],
      controlState: new Map(options.controlState ?? DEFAULT_OPTIONS.controlState),
    };
    this.controls = base.directory.registeredControls();
  }

  private clone(changes: Partial<QueryOptions>): QueryDescriptor<E> {
    return new QueryDescriptor(this.base, this.factory, { ...this.opts, ...changes });
  }

  // ---------------------------------------------------------------------------
  // Readers
  // ---------------------------------------------------------------------------

  get baseDn(): string {
    return this.base.dn;
  }

  /** The effective filter, including the default when none was applied. */
  get filterNode(): FilterNode {
    return this.opts.filter ?? DEFAULT_FILTER;
  }

  get filterString(): string {
    return serializeFilter(this.filterNode);
  }

  get scopeValue(): string {
    return this.opts.scope;
  }

  get selectedAttributes(): readonly string[] {
    return this.opts.select;
  }

  get limitValue(): number {
    return this.opts.limit;
  }

  get timeoutValue(): number {
    return this.opts.timeout;
  }

  /** A copy of the descriptor's options; changing it does not affect the descriptor. */
  get options(): QueryOptions {
    return { ...this.opts, select: [...this.opts.select], controlState: new Map(this.opts.controlState) };
  }

  get registeredControls(): readonly SearchControl[] {
    return this.controls;
  }

  controlState(oid: string): unknown {
    return this.opts.controlState.get(oid);
  }

  // ---------------------------------------------------------------------------
  // Refinements
  // ---------------------------------------------------------------------------

  /** Conjoins the compiled criteria onto the current filter. */
  filter(criteria: FilterCriteria): QueryDescriptor<E> {
    return this.clone({ filter: conjoin(this.opts.filter, compileFilter(criteria)) });
  }

  /**
   * Accepts `base`, `one`/`onelevel` or `sub`/`subtree`. Other strings are
   * kept as given and rejected when the descriptor is searched.
   */
  scope(scope: string): QueryDescriptor<E> {
    return this.clone({ scope: normalizeScope(scope) });
  }

  select(...attributes: string[]): QueryDescriptor<E> {
    return this.clone({ select: uniqueInOrder(attributes) });
  }

  selectAll(): QueryDescriptor<E> {
    return this.clone({ select: [] });
  }

  selectMore(...attributes: string[]): QueryDescriptor<E> {
    return this.clone({ select: uniqueInOrder([...this.opts.select, ...attributes]) });
  }

  /**
   * Caps the number of results. Which entries come back is up to the
   * directory; without server-side sorting the cap picks an arbitrary subset.
   */
  limit(limit: number): QueryDescriptor<E> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }
    return this.clone({ limit });
  }

  withoutLimit(): QueryDescriptor<E> {
    return this.clone({ limit: 0 });
  }

  /** Seconds the directory may spend on the search; 0 means no limit. */
  timeout(seconds: number): QueryDescriptor<E> {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RangeError(`timeout must be a non-negative number of seconds, got ${seconds}`);
    }
    return this.clone({ timeout: seconds });
  }

  withoutTimeout(): QueryDescriptor<E> {
    return this.clone({ timeout: 0 });
  }

  /** Wraps results with a different entry type. */
  as<F extends Entry>(factory: EntryFactory<F>): QueryDescriptor<F> {
    return new QueryDescriptor(this.base, factory, this.opts);
  }

  /** Sets (or, with undefined, clears) the per-query state of a control. */
  withControlState(oid: string, state: unknown): QueryDescriptor<E> {
    const controlState = new Map(this.opts.controlState);
    if (state === undefined) controlState.delete(oid);
    else controlState.set(oid, state);
    return this.clone({ controlState });
  }

  /** The operations a registered control contributes to this descriptor. */
  extension<TOps extends object>(control: SearchControl<TOps>): TOps {
    if (!this.controls.some((c) => c.oid === control.oid)) {
      throw new ConfigurationError(`Control ${control.oid} is not registered with the directory`);
    }
    if (control.operations === undefined) {
      throw new ConfigurationError(`Control ${control.oid} contributes no operations`);
    }
    return control.operations(this);
  }

  combine(other: QueryDescriptor | Entry): QueryUnion {
    const otherQuery = other instanceof QueryDescriptor ? other : other.query();
    return new QueryUnion([this, otherQuery]);
  }

  // ---------------------------------------------------------------------------
  // Enumeration
  // ---------------------------------------------------------------------------

  /** The parameters handed to the directory's search. */
  searchParams(limit: number = this.opts.limit): SearchParams {
    return {
      limit,
      selectAttrs: [...this.opts.select],
      timeout: this.opts.timeout,
      clientControls: this.controls.flatMap((c) => c.clientControls(this)),
      serverControls: this.controls.flatMap((c) => c.serverControls(this)),
    };
  }

  private async search(limit?: number): Promise<RawEntry[]> {
    const scope = resolveScope(this.opts.scope);
    const params = this.searchParams(limit);
    return this.base.directory.search(this.base.dn, scope, this.filterString, params);
  }

  private wrap(raw: RawEntry): E {
    return this.factory(this.base.directory, raw.dn, raw);
  }

  async all(): Promise<E[]> {
    const results = await this.search();
    return results.map((raw) => this.wrap(raw));
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<E> {
    const results = await this.search();
    for (const raw of results) {
      yield this.wrap(raw);
    }
  }

  async first(): Promise<E | null> {
    const [raw] = await this.search(1);
    return raw === undefined ? null : this.wrap(raw);
  }

  async isEmpty(): Promise<boolean> {
    const results = await this.search(1);
    return results.length === 0;
  }

  /** The decoded value(s) of `attribute` for every matching entry. */
  async map(attribute: string): Promise<(DecodedValue | null)[]> {
    const values: (DecodedValue | null)[] = [];
    for (const entry of await this.all()) {
      values.push(await entry.get(attribute));
    }
    return values;
  }

  /**
   * Indexes matching entries by the first value of `keyAttribute`: to each
   * entry's raw attributes, or with `valueAttribute` to the first decoded value
   * of that attribute. Entries without the key attribute are skipped; the
   * first entry for a key wins.
   */
  toMap(keyAttribute: string): Promise<Map<string, RawAttributes>>;
  toMap(keyAttribute: string, valueAttribute: string): Promise<Map<string, AttributeValue | null>>;
  async toMap(
    keyAttribute: string,
    valueAttribute?: string,
  ): Promise<Map<string, RawAttributes> | Map<string, AttributeValue | null>> {
    const entries = await this.all();
    if (valueAttribute === undefined) {
      const result = new Map<string, RawAttributes>();
      for (const entry of entries) {
        const key = (await entry.raw(keyAttribute))?.[0];
        if (key !== undefined && !result.has(key)) result.set(key, (await entry.fetch()).attributes);
      }
      return result;
    }
    const result = new Map<string, AttributeValue | null>();
    for (const entry of entries) {
      const key = (await entry.raw(keyAttribute))?.[0];
      if (key === undefined || result.has(key)) continue;
      const value = await entry.get(valueAttribute);
      result.set(key, firstValue(value));
    }
    return result;
  }
}

function firstValue(value: DecodedValue | null): AttributeValue | null {
  if (value === null) return null;
  return isValueList(value) ? (value[0] ?? null) : value;
}
