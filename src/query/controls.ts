import type { QueryDescriptor } from './descriptor.js';

/** A protocol control sent along with a search. */
export interface Control {
  oid: string;
  critical: boolean;
  value?: Buffer;
}

/**
 * A search control a directory registers. Every QueryDescriptor built against
 * that directory exposes the control's operations through `extension()` and
 * sends its payloads with each search.
 *
 * Controls keep their per-query state in the descriptor
 * (`withControlState()` / `controlState()`), so descriptors stay immutable.
 */
export interface SearchControl<TOps extends object = object> {
  readonly oid: string;
  clientControls(query: QueryDescriptor): Control[];
  serverControls(query: QueryDescriptor): Control[];
  operations?(query: QueryDescriptor): TOps;
}

export const MANAGE_DSA_IT_OID = '2.16.840.1.113730.3.4.2';

export interface ManageDsaItOperations {
  readonly manageDsaIT: boolean;
  /** Treat referral objects as ordinary entries (RFC 3296). */
  withManageDsaIT(): QueryDescriptor;
  withoutManageDsaIT(): QueryDescriptor;
}

export const manageDsaItControl: SearchControl<ManageDsaItOperations> = {
  oid: MANAGE_DSA_IT_OID,
  clientControls: () => [],
  serverControls: (query) =>
    query.controlState(MANAGE_DSA_IT_OID) === true ? [{ oid: MANAGE_DSA_IT_OID, critical: false }] : [],
  operations: (query) => ({
    manageDsaIT: query.controlState(MANAGE_DSA_IT_OID) === true,
    withManageDsaIT: () => query.withControlState(MANAGE_DSA_IT_OID, true),
    withoutManageDsaIT: () => query.withControlState(MANAGE_DSA_IT_OID, undefined),
  }),
};
