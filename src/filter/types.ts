export type FilterNode =
  | { kind: 'presence'; attribute: string }
  | { kind: 'equality'; attribute: string; value: string }
  | { kind: 'substring'; attribute: string; pattern: string }
  | { kind: 'greaterOrEqual'; attribute: string; value: string }
  | { kind: 'lessOrEqual'; attribute: string; value: string }
  | { kind: 'approx'; attribute: string; value: string }
  | { kind: 'and'; filters: FilterNode[] }
  | { kind: 'or'; filters: FilterNode[] }
  | { kind: 'not'; filter: FilterNode }
  | { kind: 'raw'; text: string };

export type FilterKind = FilterNode['kind'];

export type FilterScalar = string | number | boolean;

export type FilterValue = FilterScalar | readonly FilterScalar[];

export type BooleanOperator = 'and' | 'or' | 'not';

export type ComparisonOperator = '=' | '~=' | '>=' | '<=';

/** attribute → value, or attribute → values (matched with OR). */
export type AttributeCriteria = Readonly<Record<string, FilterValue>>;

/**
 * Everything `filter()` accepts:
 *
 * - `'(cn=x)'` a pre-formed filter, used verbatim
 * - `'mail'` an attribute name, matched for presence
 * - `{ givenName: 'Michael', sn: 'Granger' }` AND of equality matches
 * - `['and' | 'or', ...criteria]`, `['not', criteria]`
 * - `['sn', 'Granger']`, `['uidNumber', '>=', 1000]`
 * - a FilterNode built with the node constructors
 */
export type FilterCriteria =
  | string
  | FilterNode
  | AttributeCriteria
  | readonly [BooleanOperator, ...FilterCriteria[]]
  | readonly [string, FilterValue]
  | readonly [string, ComparisonOperator, FilterScalar];
