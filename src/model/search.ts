import { Entry, type EntryFactory } from '../entry/entry.js';
import { ConfigurationError } from '../errors.js';
import { and, equality } from '../filter/compiler.js';
import type { FilterNode } from '../filter/types.js';
import type { QueryDescriptor } from '../query/descriptor.js';
import { QueryUnion } from '../query/union.js';
import type { Directory } from '../types.js';
import type { Capability } from './capability.js';

/** `(objectClass=x)` for one class, an AND of them for several, null for none. */
export function capabilityFilter(capability: Capability): FilterNode | null {
  const [only, ...rest] = capability.objectClasses;
  if (only === undefined) return null;
  if (rest.length === 0) return equality('objectClass', only);
  return and(...capability.objectClasses.map((oc) => equality('objectClass', oc)));
}

/**
 * A query for every entry the capability applies to: one descriptor per base
 * (a union when there are several), rooted at the directory's base DN when the
 * capability declares none.
 */
export function buildCapabilityQuery<E extends Entry>(
  capability: Capability,
  directory: Directory,
  factory: EntryFactory<E>,
): QueryDescriptor<E> | QueryUnion<E> {
  if (capability.objectClasses.length === 0 && capability.bases.length === 0) {
    throw new ConfigurationError(`Capability "${capability.name}" has no search criteria defined`);
  }

  const filter = capabilityFilter(capability);
  const bases = capability.bases.length > 0 ? capability.bases : [directory.baseDn];
  const descriptors = bases.map((base) => {
    const query = new Entry(directory, base).query().as(factory);
    return filter === null ? query : query.filter(filter);
  });

  const [single] = descriptors;
  if (single !== undefined && descriptors.length === 1) return single;
  return new QueryUnion(descriptors);
}
