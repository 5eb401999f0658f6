import { InvalidFilterError } from '../errors.js';
import type { FilterCriteria, FilterNode, FilterScalar } from './types.js';

// Nodes made by the constructors below. A mapping shaped like a node is
// still attribute criteria.
const constructed = new WeakSet<object>();

function node<N extends FilterNode>(n: N): N {
  constructed.add(n);
  return n;
}

// ---------------------------------------------------------------------------
// Node constructors
// ---------------------------------------------------------------------------

export function presence(attribute: string): FilterNode {
  return node({ kind: 'presence', attribute });
}

export function equality(attribute: string, value: FilterScalar): FilterNode {
  return node({ kind: 'equality', attribute, value: renderScalar(value) });
}

export function substring(attribute: string, pattern: string): FilterNode {
  return node({ kind: 'substring', attribute, pattern });
}

export function greaterOrEqual(attribute: string, value: FilterScalar): FilterNode {
  return node({ kind: 'greaterOrEqual', attribute, value: renderScalar(value) });
}

export function lessOrEqual(attribute: string, value: FilterScalar): FilterNode {
  return node({ kind: 'lessOrEqual', attribute, value: renderScalar(value) });
}

export function approx(attribute: string, value: FilterScalar): FilterNode {
  return node({ kind: 'approx', attribute, value: renderScalar(value) });
}

export function and(...filters: FilterNode[]): FilterNode {
  return node({ kind: 'and', filters });
}

export function or(...filters: FilterNode[]): FilterNode {
  return node({ kind: 'or', filters });
}

export function not(filter: FilterNode): FilterNode {
  return node({ kind: 'not', filter });
}

export function raw(text: string): FilterNode {
  return node({ kind: 'raw', text });
}

/** What a descriptor searches with when no filter has been applied. */
export const DEFAULT_FILTER: FilterNode = presence('objectClass');

// ---------------------------------------------------------------------------
// Criteria → FilterNode
// ---------------------------------------------------------------------------

function renderScalar(value: FilterScalar): string {
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  return String(value);
}

function isScalar(value: unknown): value is FilterScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFilterNode(value: unknown): value is FilterNode {
  return typeof value === 'object' && value !== null && constructed.has(value);
}

/**
 * A single value for an attribute: `*` alone tests presence, a value with
 * wildcards becomes a substring match, anything else an equality match.
 */
function compileScalar(attribute: string, value: FilterScalar): FilterNode {
  if (typeof value === 'string') {
    if (value === '*') return presence(attribute);
    if (value.includes('*')) return substring(attribute, value);
  }
  return equality(attribute, value);
}

/** An attribute's value or values; several values are alternatives (OR). */
function compileAttributeValue(attribute: string, value: unknown): FilterNode {
  if (isScalar(value)) return compileScalar(attribute, value);
  if (Array.isArray(value)) {
    const values: unknown[] = value;
    if (values.length === 0) {
      throw new InvalidFilterError(`No values given for attribute "${attribute}"`);
    }
    const nodes = values.map((v) => {
      if (!isScalar(v)) {
        throw new InvalidFilterError(`Unsupported value for attribute "${attribute}": ${String(v)}`);
      }
      return compileScalar(attribute, v);
    });
    return nodes.length === 1 ? (nodes[0] as FilterNode) : or(...nodes);
  }
  throw new InvalidFilterError(`Unsupported value for attribute "${attribute}": ${String(value)}`);
}

function compileComparison(attribute: string, operator: string, value: unknown): FilterNode {
  if (!isScalar(value)) {
    throw new InvalidFilterError(`Unsupported value for attribute "${attribute}": ${String(value)}`);
  }
  switch (operator) {
    case '=':
      return compileScalar(attribute, value);
    case '~=':
      return approx(attribute, value);
    case '>=':
      return greaterOrEqual(attribute, value);
    case '<=':
      return lessOrEqual(attribute, value);
    default:
      throw new InvalidFilterError(`Unknown comparison operator "${operator}"`);
  }
}

function compileSequence(items: readonly unknown[]): FilterNode {
  const [head, ...rest] = items;
  if (head === 'and' || head === 'or') {
    if (rest.length === 0) {
      throw new InvalidFilterError(`"${head}" needs at least one sub-filter`);
    }
    const filters = rest.map(compileInput);
    return head === 'and' ? and(...filters) : or(...filters);
  }
  if (head === 'not') {
    if (rest.length !== 1) {
      throw new InvalidFilterError(`"not" takes exactly one sub-filter, got ${rest.length}`);
    }
    return not(compileInput(rest[0]));
  }
  if (typeof head !== 'string') {
    throw new InvalidFilterError(`Expected an attribute name or boolean operator, got ${String(head)}`);
  }
  if (rest.length === 1) return compileAttributeValue(head, rest[0]);
  if (rest.length === 2 && typeof rest[0] === 'string') {
    return compileComparison(head, rest[0], rest[1]);
  }
  throw new InvalidFilterError(`Cannot compile filter sequence starting with "${head}"`);
}

function compileInput(input: unknown): FilterNode {
  if (typeof input === 'string') {
    const text = input.trim();
    if (text === '') throw new InvalidFilterError('Empty filter');
    return text.startsWith('(') ? raw(text) : presence(text);
  }
  if (Array.isArray(input)) {
    const items: unknown[] = input;
    return compileSequence(items);
  }
  if (isFilterNode(input)) return input;
  if (isRecord(input)) {
    const entries = Object.entries(input);
    if (entries.length === 0) throw new InvalidFilterError('Empty attribute mapping');
    const nodes = entries.map(([attribute, value]) => compileAttributeValue(attribute, value));
    return nodes.length === 1 ? (nodes[0] as FilterNode) : and(...nodes);
  }
  throw new InvalidFilterError(`Unsupported filter criteria: ${String(input)}`);
}

/** Compiles structured criteria into a FilterNode. Order is preserved throughout. */
export function compileFilter(criteria: FilterCriteria): FilterNode {
  return compileInput(criteria);
}

/**
 * Conjoins `next` onto an existing filter. A null filter is replaced;
 * an existing AND node is extended flat instead of nested.
 */
export function conjoin(existing: FilterNode | null, next: FilterNode): FilterNode {
  if (existing === null) return next;
  if (existing.kind === 'and') return and(...existing.filters, next);
  return and(existing, next);
}

// ---------------------------------------------------------------------------
// FilterNode → text
// ---------------------------------------------------------------------------

const VALUE_ESCAPES: Record<string, string> = {
  '\0': '\\00',
  '(': '\\28',
  ')': '\\29',
  '*': '\\2a',
  '\\': '\\5c',
};

export function escapeFilterValue(value: string): string {
  return value.replace(/[\0()*\\]/g, (ch) => VALUE_ESCAPES[ch] ?? ch);
}

function escapeSubstringPattern(pattern: string): string {
  return pattern.split('*').map(escapeFilterValue).join('*');
}

/** Canonical, fully parenthesized filter text. */
export function serializeFilter(node: FilterNode): string {
  switch (node.kind) {
    case 'presence':
      return `(${node.attribute}=*)`;
    case 'equality':
      return `(${node.attribute}=${escapeFilterValue(node.value)})`;
    case 'substring':
      return `(${node.attribute}=${escapeSubstringPattern(node.pattern)})`;
    case 'greaterOrEqual':
      return `(${node.attribute}>=${escapeFilterValue(node.value)})`;
    case 'lessOrEqual':
      return `(${node.attribute}<=${escapeFilterValue(node.value)})`;
    case 'approx':
      return `(${node.attribute}~=${escapeFilterValue(node.value)})`;
    case 'and':
      return `(&${node.filters.map(serializeFilter).join('')})`;
    case 'or':
      return `(|${node.filters.map(serializeFilter).join('')})`;
    case 'not':
      return `(!${serializeFilter(node.filter)})`;
    case 'raw':
      return node.text;
  }
}
