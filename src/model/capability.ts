import { InvalidDnError } from '../errors.js';
import { normalizeDn } from '../dn.js';
import type { ModelEntry } from './model-entry.js';

/**
 * Builds the operations a capability adds to an entry it applies to.
 * Called each time the operations are requested.
 */
export type CapabilityOperations<TOps extends object> = (entry: ModelEntry) => TOps;

export interface CapabilityDefinition<TOps extends object = object> {
  /**
   * Stable identifier, unique within a catalog.
   * Convention: /^[a-zA-Z][a-zA-Z0-9\-_]{0,127}$/
   */
  readonly name: string;

  /** Every one of these objectClasses must be present for the capability to apply. */
  readonly objectClasses?: readonly string[];

  /** The capability applies to entries at or below any of these DNs. */
  readonly bases?: readonly string[];

  readonly operations?: CapabilityOperations<TOps>;
}

/** A validated capability. Use defineCapability() to create one. */
export interface Capability<TOps extends object = object> {
  readonly name: string;
  readonly objectClasses: readonly string[];
  /** Normalized base DNs. */
  readonly bases: readonly string[];
  readonly operations?: CapabilityOperations<TOps>;
}

const CAPABILITY_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9\-_]{0,127}$/;

/**
 * Validates a capability definition and returns it normalized.
 * Throws if the name does not follow the naming convention or a base is not
 * a valid DN. A capability without objectClasses and bases is accepted here;
 * asking for its query fails instead.
 */
export function defineCapability<TOps extends object = object>(def: CapabilityDefinition<TOps>): Capability<TOps> {
  if (!def.name || def.name.trim() === '') {
    throw new Error('defineCapability: name must be a non-empty string');
  }
  if (!CAPABILITY_NAME_PATTERN.test(def.name)) {
    throw new Error(`defineCapability: name "${def.name}" must match /^[a-zA-Z][a-zA-Z0-9\\-_]{0,127}$/`);
  }

  const bases = (def.bases ?? []).map((base) => {
    try {
      return normalizeDn(base);
    } catch (err) {
      if (err instanceof InvalidDnError) {
        throw new Error(`defineCapability: "${def.name}" has an invalid base ${JSON.stringify(base)}`, { cause: err });
      }
      throw err;
    }
  });

  return Object.freeze({
    name: def.name,
    objectClasses: Object.freeze([...(def.objectClasses ?? [])]),
    bases: Object.freeze(bases),
    ...(def.operations !== undefined ? { operations: def.operations } : {}),
  });
}
