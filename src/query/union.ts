import type { Entry } from '../entry/entry.js';
import type { FilterCriteria } from '../filter/types.js';
import type { DecodedValue } from '../types.js';
import type { QueryDescriptor } from './descriptor.js';

/**
 * Several descriptors enumerated one after another, in the order given.
 * Results are concatenated, not merged: an entry matched by two members
 * appears twice.
 */
export class QueryUnion<E extends Entry = Entry> implements AsyncIterable<E> {
  readonly descriptors: readonly QueryDescriptor<E>[];

  constructor(descriptors: readonly QueryDescriptor<E>[]) {
    this.descriptors = [...descriptors];
  }

  get baseDns(): string[] {
    return this.descriptors.map((d) => d.baseDn);
  }

  /** Applies the same criteria to every member. */
  filter(criteria: FilterCriteria): QueryUnion<E> {
    return new QueryUnion(this.descriptors.map((d) => d.filter(criteria)));
  }

  scope(scope: string): QueryUnion<E> {
    return new QueryUnion(this.descriptors.map((d) => d.scope(scope)));
  }

  select(...attributes: string[]): QueryUnion<E> {
    return new QueryUnion(this.descriptors.map((d) => d.select(...attributes)));
  }

  combine(other: QueryDescriptor<E> | QueryUnion<E>): QueryUnion<E> {
    const more = other instanceof QueryUnion ? other.descriptors : [other];
    return new QueryUnion([...this.descriptors, ...more]);
  }

  async all(): Promise<E[]> {
    const results: E[] = [];
    for (const descriptor of this.descriptors) {
      results.push(...(await descriptor.all()));
    }
    return results;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<E> {
    for (const descriptor of this.descriptors) {
      yield* descriptor;
    }
  }

  async first(): Promise<E | null> {
    for (const descriptor of this.descriptors) {
      const entry = await descriptor.first();
      if (entry !== null) return entry;
    }
    return null;
  }

  async isEmpty(): Promise<boolean> {
    for (const descriptor of this.descriptors) {
      if (!(await descriptor.isEmpty())) return false;
    }
    return true;
  }

  async map(attribute: string): Promise<(DecodedValue | null)[]> {
    const values: (DecodedValue | null)[] = [];
    for (const descriptor of this.descriptors) {
      values.push(...(await descriptor.map(attribute)));
    }
    return values;
  }
}
