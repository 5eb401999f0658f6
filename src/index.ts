export {
  presence,
  equality,
  substring,
  greaterOrEqual,
  lessOrEqual,
  approx,
  and,
  or,
  not,
  raw,
  DEFAULT_FILTER,
  isFilterNode,
  compileFilter,
  conjoin,
  escapeFilterValue,
  serializeFilter,
} from './filter/compiler.js';
export type {
  FilterNode,
  FilterKind,
  FilterScalar,
  FilterValue,
  FilterCriteria,
  AttributeCriteria,
  BooleanOperator,
  ComparisonOperator,
} from './filter/types.js';

export {
  parseDn,
  isValidDn,
  assertValidDn,
  normalizeDn,
  dnKey,
  splitDn,
  rdnOf,
  parentDnOf,
  isAncestorOrSelf,
  escapeDnValue,
  unescapeDnValue,
  buildRdn,
  rdnPairs,
  toUfn,
} from './dn.js';
export type { RdnPair } from './dn.js';

export { Schema, DescriptorTable, parseSchema } from './schema/schema.js';
export type { ObjectClass, AttributeType, SchemaOptions } from './schema/schema.js';
export { schemaFor, forgetSchema } from './schema/cache.js';
export {
  SYNTAX_OIDS,
  DEFAULT_SYNTAX_DECODERS,
  decodeSyntaxValue,
  decodeBoolean,
  decodeInteger,
  decodeGeneralizedTime,
} from './schema/syntax.js';
export type { SyntaxDecoder, SyntaxDecoders } from './schema/syntax.js';
export {
  parseObjectClass,
  parseAttributeType,
  parseLdapSyntax,
  parseMatchingRule,
  parseMatchingRuleUse,
} from './schema/parser.js';
export type {
  RawSchema,
  ObjectClassKind,
  AttributeUsage,
  ObjectClassDefinition,
  AttributeTypeDefinition,
  LdapSyntaxDefinition,
  MatchingRuleDefinition,
  MatchingRuleUseDefinition,
} from './schema/types.js';

export { Entry, compareEntries } from './entry/entry.js';
export type { EntryFactory, EntryOptions, AttributesHash } from './entry/entry.js';

export { QueryDescriptor, DEFAULT_OPTIONS, DEFAULT_SCOPE, normalizeScope, resolveScope } from './query/descriptor.js';
export type { QueryOptions } from './query/descriptor.js';
export { QueryUnion } from './query/union.js';
export { MANAGE_DSA_IT_OID, manageDsaItControl } from './query/controls.js';
export type { Control, SearchControl, ManageDsaItOperations } from './query/controls.js';

export { LdapDirectory } from './directory/ldap-directory.js';
export type { LdapDirectoryConfig } from './directory/ldap-directory.js';

export { isValueList } from './types.js';
export type {
  SearchScope,
  RawAttributes,
  RawEntry,
  AttributeValue,
  DecodedValue,
  AttributeInput,
  AttributeChanges,
  AttributeDeletes,
  SearchParams,
  Logger,
  Directory,
} from './types.js';

export {
  InvalidDnError,
  NotFoundError,
  UnknownAttributeError,
  SchemaCycleError,
  SchemaParseError,
  ConfigurationError,
  InvalidScopeError,
  InvalidFilterError,
} from './errors.js';
