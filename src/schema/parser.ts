import { SchemaParseError } from '../errors.js';
import type {
  AttributeTypeDefinition,
  AttributeUsage,
  LdapSyntaxDefinition,
  MatchingRuleDefinition,
  MatchingRuleUseDefinition,
  ObjectClassDefinition,
  ObjectClassKind,
  SchemaExtensions,
} from './types.js';

type Token =
  | { type: 'open' }
  | { type: 'close' }
  | { type: 'dollar' }
  | { type: 'word'; text: string }
  | { type: 'quoted'; text: string };

const FLAG_KEYWORDS: ReadonlySet<string> = new Set([
  'OBSOLETE',
  'ABSTRACT',
  'STRUCTURAL',
  'AUXILIARY',
  'SINGLE-VALUE',
  'COLLECTIVE',
  'NO-USER-MODIFICATION',
]);

const USAGES: ReadonlySet<string> = new Set<AttributeUsage>([
  'userApplications',
  'directoryOperation',
  'distributedOperation',
  'dSAOperation',
]);

function isUsage(value: string): value is AttributeUsage {
  return USAGES.has(value);
}

function tokenize(definition: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < definition.length) {
    const ch = definition.charAt(i);
    if (/\s/.test(ch)) {
      i += 1;
    } else if (ch === '(') {
      tokens.push({ type: 'open' });
      i += 1;
    } else if (ch === ')') {
      tokens.push({ type: 'close' });
      i += 1;
    } else if (ch === '$') {
      tokens.push({ type: 'dollar' });
      i += 1;
    } else if (ch === "'") {
      const end = definition.indexOf("'", i + 1);
      if (end === -1) throw new SchemaParseError(definition, 'Unterminated quoted string');
      tokens.push({ type: 'quoted', text: unescapeQdString(definition.slice(i + 1, end)) });
      i = end + 1;
    } else {
      let end = i;
      while (end < definition.length && !/[\s()$']/.test(definition.charAt(end))) end += 1;
      tokens.push({ type: 'word', text: definition.slice(i, end) });
      i = end;
    }
  }
  return tokens;
}

/** RFC 4512 qdstring escapes: \27 for a quote, \5C for a backslash. */
function unescapeQdString(text: string): string {
  return text.replace(/\\27/gi, "'").replace(/\\5c/gi, '\\');
}

interface ParsedDefinition {
  oid: string;
  fields: Map<string, string[] | true>;
}

function parseDefinition(definition: string): ParsedDefinition {
  const tokens = tokenize(definition);
  let pos = 0;
  const next = (): Token | undefined => tokens[pos++];

  if (next()?.type !== 'open') {
    throw new SchemaParseError(definition, 'Expected "("');
  }
  const oidToken = next();
  if (oidToken === undefined || (oidToken.type !== 'word' && oidToken.type !== 'quoted')) {
    throw new SchemaParseError(definition, 'Expected an OID');
  }

  const fields = new Map<string, string[] | true>();
  for (;;) {
    const token = next();
    if (token === undefined) throw new SchemaParseError(definition, 'Missing closing ")"');
    if (token.type === 'close') break;
    if (token.type !== 'word') {
      throw new SchemaParseError(definition, `Unexpected token "${tokenText(token)}"`);
    }
    const keyword = token.text.toUpperCase();
    if (FLAG_KEYWORDS.has(keyword)) {
      fields.set(keyword, true);
      continue;
    }

    const value = next();
    if (value === undefined) throw new SchemaParseError(definition, `Missing value for ${keyword}`);
    if (value.type === 'word' || value.type === 'quoted') {
      fields.set(keyword, [value.text]);
      continue;
    }
    if (value.type !== 'open') {
      throw new SchemaParseError(definition, `Unexpected token "${tokenText(value)}" after ${keyword}`);
    }
    const items: string[] = [];
    for (;;) {
      const item = next();
      if (item === undefined) throw new SchemaParseError(definition, `Unterminated list for ${keyword}`);
      if (item.type === 'close') break;
      if (item.type === 'dollar') continue;
      if (item.type === 'open') {
        throw new SchemaParseError(definition, `Nested list in ${keyword}`);
      }
      items.push(item.text);
    }
    fields.set(keyword, items);
  }

  if (pos < tokens.length) {
    throw new SchemaParseError(definition, 'Trailing text after closing ")"');
  }
  return { oid: oidToken.text, fields };
}

function tokenText(token: Token): string {
  switch (token.type) {
    case 'open':
      return '(';
    case 'close':
      return ')';
    case 'dollar':
      return '$';
    default:
      return token.text;
  }
}

function list(fields: Map<string, string[] | true>, key: string): string[] {
  const value = fields.get(key);
  return Array.isArray(value) ? value : [];
}

function single(fields: Map<string, string[] | true>, key: string): string | null {
  return list(fields, key)[0] ?? null;
}

function flag(fields: Map<string, string[] | true>, key: string): boolean {
  return fields.get(key) === true;
}

function extensions(fields: Map<string, string[] | true>): SchemaExtensions {
  const result: Record<string, readonly string[]> = {};
  for (const [key, value] of fields) {
    if (key.startsWith('X-') && value !== true) result[key] = value;
  }
  return result;
}

export function parseObjectClass(definition: string): ObjectClassDefinition {
  const { oid, fields } = parseDefinition(definition);
  let kind: ObjectClassKind = 'structural';
  if (flag(fields, 'ABSTRACT')) kind = 'abstract';
  else if (flag(fields, 'AUXILIARY')) kind = 'auxiliary';

  return {
    oid,
    names: list(fields, 'NAME'),
    desc: single(fields, 'DESC'),
    obsolete: flag(fields, 'OBSOLETE'),
    sup: list(fields, 'SUP'),
    kind,
    must: list(fields, 'MUST'),
    may: list(fields, 'MAY'),
    extensions: extensions(fields),
  };
}

export function parseAttributeType(definition: string): AttributeTypeDefinition {
  const { oid, fields } = parseDefinition(definition);

  let syntaxOid: string | null = null;
  let syntaxLength: number | null = null;
  const syntax = single(fields, 'SYNTAX');
  if (syntax !== null) {
    const match = /^([^{]+)(?:\{(\d+)\})?$/.exec(syntax);
    if (match === null) throw new SchemaParseError(definition, `Malformed SYNTAX "${syntax}"`);
    syntaxOid = match[1] ?? null;
    syntaxLength = match[2] !== undefined ? Number(match[2]) : null;
  }

  const usage = single(fields, 'USAGE') ?? 'userApplications';
  if (!isUsage(usage)) {
    throw new SchemaParseError(definition, `Unknown USAGE "${usage}"`);
  }

  return {
    oid,
    names: list(fields, 'NAME'),
    desc: single(fields, 'DESC'),
    obsolete: flag(fields, 'OBSOLETE'),
    sup: single(fields, 'SUP'),
    equality: single(fields, 'EQUALITY'),
    ordering: single(fields, 'ORDERING'),
    substr: single(fields, 'SUBSTR'),
    syntaxOid,
    syntaxLength,
    singleValued: flag(fields, 'SINGLE-VALUE'),
    collective: flag(fields, 'COLLECTIVE'),
    noUserModification: flag(fields, 'NO-USER-MODIFICATION'),
    usage,
    extensions: extensions(fields),
  };
}

export function parseLdapSyntax(definition: string): LdapSyntaxDefinition {
  const { oid, fields } = parseDefinition(definition);
  return { oid, desc: single(fields, 'DESC'), extensions: extensions(fields) };
}

export function parseMatchingRule(definition: string): MatchingRuleDefinition {
  const { oid, fields } = parseDefinition(definition);
  return {
    oid,
    names: list(fields, 'NAME'),
    desc: single(fields, 'DESC'),
    obsolete: flag(fields, 'OBSOLETE'),
    syntaxOid: single(fields, 'SYNTAX'),
    extensions: extensions(fields),
  };
}

export function parseMatchingRuleUse(definition: string): MatchingRuleUseDefinition {
  const { oid, fields } = parseDefinition(definition);
  return {
    oid,
    names: list(fields, 'NAME'),
    desc: single(fields, 'DESC'),
    obsolete: flag(fields, 'OBSOLETE'),
    applies: list(fields, 'APPLIES'),
    extensions: extensions(fields),
  };
}
