import type { SearchControl, Control } from './query/controls.js';
import type { RawSchema } from './schema/types.js';

export type SearchScope = 'base' | 'onelevel' | 'subtree';

/** Attribute name → raw string values, as the directory returns them. */
export type RawAttributes = Record<string, string[]>;

export interface RawEntry {
  dn: string;
  attributes: RawAttributes;
}

/** A value after syntax decoding. */
export type AttributeValue = string | number | boolean | Date;

/** What `Entry.get()` yields: a scalar for SINGLE-VALUE attributes, an array otherwise. */
export type DecodedValue = AttributeValue | readonly AttributeValue[];

export function isValueList(value: DecodedValue): value is readonly AttributeValue[] {
  return Array.isArray(value);
}

/** Values accepted by write operations. */
export type AttributeInput = string | number | boolean | readonly (string | number | boolean)[];

export type AttributeChanges = Readonly<Record<string, AttributeInput>>;

/** Attribute names to remove entirely, or name → the specific values to remove. */
export type AttributeDeletes = readonly string[] | Readonly<Record<string, AttributeInput>>;

export interface SearchParams {
  limit: number;
  selectAttrs: string[];
  timeout: number;
  clientControls: Control[];
  serverControls: Control[];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * The directory collaborator every Entry and QueryDescriptor talks to.
 * Connection handling and authentication are the implementation's concern.
 */
export interface Directory {
  /** DN searches are rooted at when nothing more specific is given. */
  readonly baseDn: string;
  readonly logger?: Logger;

  search(base: string, scope: SearchScope, filter: string, params: SearchParams): Promise<RawEntry[]>;
  /** Resolves to null when the directory has no such entry. */
  getEntry(dn: string): Promise<RawEntry | null>;
  /** Like getEntry(), including operational attributes. */
  getExtendedEntry(dn: string): Promise<RawEntry | null>;

  /** Replaces each named attribute with the given values. */
  modify(dn: string, changes: AttributeChanges): Promise<void>;
  create(dn: string, attributes: AttributeChanges): Promise<void>;
  delete(dn: string): Promise<void>;
  deleteAttributes(dn: string, attributes: AttributeDeletes): Promise<void>;
  /** Renames the entry within its parent; resolves to the new DN. */
  move(dn: string, newRdn: string, attributes: AttributeChanges): Promise<string>;
  copy(dn: string, newDn: string, attributes: AttributeChanges): Promise<void>;

  schema(): Promise<RawSchema>;
  registeredControls(): readonly SearchControl[];
  convertSyntaxValue(syntaxOid: string | null, raw: string): AttributeValue;
}
