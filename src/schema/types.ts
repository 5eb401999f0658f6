/**
 * The subschema subentry's definition strings, as read from the directory.
 * Missing collections are treated as empty.
 */
export interface RawSchema {
  objectClasses?: readonly string[];
  attributeTypes?: readonly string[];
  ldapSyntaxes?: readonly string[];
  matchingRules?: readonly string[];
  matchingRuleUse?: readonly string[];
}

export type ObjectClassKind = 'abstract' | 'structural' | 'auxiliary';

export type AttributeUsage =
  | 'userApplications'
  | 'directoryOperation'
  | 'distributedOperation'
  | 'dSAOperation';

/** X-* extension name → its values. */
export type SchemaExtensions = Readonly<Record<string, readonly string[]>>;

export interface ObjectClassDefinition {
  oid: string;
  names: string[];
  desc: string | null;
  obsolete: boolean;
  sup: string[];
  kind: ObjectClassKind;
  must: string[];
  may: string[];
  extensions: SchemaExtensions;
}

export interface AttributeTypeDefinition {
  oid: string;
  names: string[];
  desc: string | null;
  obsolete: boolean;
  sup: string | null;
  equality: string | null;
  ordering: string | null;
  substr: string | null;
  syntaxOid: string | null;
  syntaxLength: number | null;
  singleValued: boolean;
  collective: boolean;
  noUserModification: boolean;
  usage: AttributeUsage;
  extensions: SchemaExtensions;
}

export interface LdapSyntaxDefinition {
  oid: string;
  desc: string | null;
  extensions: SchemaExtensions;
}

export interface MatchingRuleDefinition {
  oid: string;
  names: string[];
  desc: string | null;
  obsolete: boolean;
  syntaxOid: string | null;
  extensions: SchemaExtensions;
}

export interface MatchingRuleUseDefinition {
  oid: string;
  names: string[];
  desc: string | null;
  obsolete: boolean;
  applies: string[];
  extensions: SchemaExtensions;
}
