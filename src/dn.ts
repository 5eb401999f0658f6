import { InvalidDnError } from './errors.js';

export interface RdnPair {
  attribute: string;
  value: string;
}

const ATTRIBUTE_TYPE_PATTERN = /^(?:[A-Za-z][A-Za-z0-9-]*|\d+(?:\.\d+)*)$/;

/**
 * Splits `text` on every `separator` that is not escaped with a backslash.
 * Returns the raw, untrimmed pieces.
 */
function splitUnescaped(text: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charAt(i);
    if (ch === '\\' && i + 1 < text.length) {
      current += ch + text.charAt(i + 1);
      i += 1;
      continue;
    }
    if (ch === separator) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}

function indexOfUnescaped(text: string, target: string): number {
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charAt(i);
    if (ch === '\\') {
      i += 1;
      continue;
    }
    if (ch === target) return i;
  }
  return -1;
}

function parsePair(dn: string, text: string): RdnPair {
  const eq = indexOfUnescaped(text, '=');
  if (eq === -1) {
    throw new InvalidDnError(dn, `Invalid distinguished name ${JSON.stringify(dn)}: "${text.trim()}" is not an attribute=value pair`);
  }
  const attribute = text.slice(0, eq).trim();
  if (!ATTRIBUTE_TYPE_PATTERN.test(attribute)) {
    throw new InvalidDnError(dn, `Invalid distinguished name ${JSON.stringify(dn)}: bad attribute type "${attribute}"`);
  }
  return { attribute, value: text.slice(eq + 1).trim() };
}

/**
 * Parses a DN into its RDN components, most specific first. Each component
 * holds one or more attribute/value pairs (values stay escaped).
 * Throws InvalidDnError when the text does not follow the DN grammar.
 */
export function parseDn(dn: string): RdnPair[][] {
  if (dn.trim() === '') {
    throw new InvalidDnError(dn, 'Invalid distinguished name: empty DN');
  }
  return splitUnescaped(dn, ',').map((component) =>
    splitUnescaped(component, '+').map((pair) => parsePair(dn, pair)),
  );
}

export function isValidDn(dn: string): boolean {
  try {
    parseDn(dn);
    return true;
  } catch (err) {
    if (err instanceof InvalidDnError) return false;
    throw err;
  }
}

export function assertValidDn(dn: string): string {
  parseDn(dn);
  return dn;
}

function formatComponent(pairs: readonly RdnPair[]): string {
  return pairs.map((p) => `${p.attribute}=${p.value}`).join('+');
}

/** Drops the whitespace around separators: `ou=phones, dc=acme` → `ou=phones,dc=acme`. */
export function normalizeDn(dn: string): string {
  return parseDn(dn).map(formatComponent).join(',');
}

/** A component compared without regard to case or to the order of its pairs. */
function componentKey(pairs: readonly RdnPair[]): string {
  return pairs
    .map((p) => `${p.attribute}=${p.value}`.toLowerCase())
    .sort()
    .join('+');
}

/**
 * Case-folded normal form, for use as a lookup key. The pairs of a
 * multi-valued RDN are sorted, so `cn=a+sn=b` and `sn=b+cn=a` share a key.
 */
export function dnKey(dn: string): string {
  return parseDn(dn).map(componentKey).join(',');
}

/**
 * Splits a DN into its components. When `limit` is positive, at most `limit`
 * pieces are returned and the remainder is left unsplit in the last one.
 */
export function splitDn(dn: string, limit = 0): string[] {
  const parts = splitUnescaped(dn, ',');
  if (limit > 0 && parts.length > limit) {
    const head = parts.slice(0, limit - 1);
    const rest = parts.slice(limit - 1).join(',');
    return [...head.map((p) => p.trim()), rest.trim()];
  }
  return parts.map((p) => p.trim());
}

export function rdnOf(dn: string): string {
  return splitDn(dn, 2)[0] ?? '';
}

/** The DN of the parent entry, or '' for a top-level DN. */
export function parentDnOf(dn: string): string {
  return splitDn(dn, 2)[1] ?? '';
}

/** True if `ancestor` names the same entry as `dn` or one above it. */
export function isAncestorOrSelf(ancestor: string, dn: string): boolean {
  const a = parseDn(ancestor).map(componentKey);
  const d = parseDn(dn).map(componentKey);
  if (a.length > d.length) return false;
  const offset = d.length - a.length;
  return a.every((component, i) => component === d[offset + i]);
}

/** Escapes an attribute value for use inside an RDN (RFC 4514). */
export function escapeDnValue(value: string): string {
  let escaped = value.replace(/["+,;<>\\]/g, (ch) => `\\${ch}`);
  if (escaped.startsWith('#') || escaped.startsWith(' ')) escaped = `\\${escaped}`;
  if (escaped.endsWith(' ') && !escaped.endsWith('\\ ')) escaped = `${escaped.slice(0, -1)}\\ `;
  return escaped;
}

/** Reverses escapeDnValue. A run of `\XX` escapes is read as UTF-8 bytes. */
export function unescapeDnValue(value: string): string {
  return value.replace(/(?:\\[0-9a-fA-F]{2})+|\\(.)/g, (match: string, ch: string | undefined) =>
    ch ?? Buffer.from(match.replace(/\\/g, ''), 'hex').toString('utf8'),
  );
}

/** Builds `attr=value[+attr2=value2...]` with the values escaped. */
export function buildRdn(pairs: readonly RdnPair[]): string {
  return pairs.map((p) => `${p.attribute}=${escapeDnValue(p.value)}`).join('+');
}

/** The RDN's attribute/value pairs with values unescaped. */
export function rdnPairs(dn: string): RdnPair[] {
  const first = parseDn(dn)[0] ?? [];
  return first.map((p) => ({ attribute: p.attribute, value: unescapeDnValue(p.value) }));
}

/** RFC 1781 user-friendly name: values only, most specific first. */
export function toUfn(dn: string): string {
  return parseDn(dn)
    .map((component) => component.map((p) => unescapeDnValue(p.value)).join(' + '))
    .join(', ');
}
