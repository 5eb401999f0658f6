import { SchemaCycleError } from '../errors.js';
import type { Logger } from '../types.js';
import {
  parseAttributeType,
  parseLdapSyntax,
  parseMatchingRule,
  parseMatchingRuleUse,
  parseObjectClass,
} from './parser.js';
import type {
  AttributeTypeDefinition,
  LdapSyntaxDefinition,
  MatchingRuleDefinition,
  MatchingRuleUseDefinition,
  ObjectClassDefinition,
  RawSchema,
} from './types.js';

/** An objectClass with its MUST/MAY sets resolved through the SUP chain. */
export interface ObjectClass extends ObjectClassDefinition {
  /** Own MUST attributes, as declared. */
  readonly ownMust: readonly string[];
  /** Own MAY attributes, as declared. */
  readonly ownMay: readonly string[];
  /** Effective MUST: every superior's, then the class's own, without duplicates. */
  readonly must: string[];
  /** Effective MAY, resolved the same way as `must`. */
  readonly may: string[];
  readonly structural: boolean;
}

/** An attributeType with its syntax resolved through the SUP chain. */
export interface AttributeType extends AttributeTypeDefinition {
  /** The SYNTAX as declared, before inheritance. */
  readonly ownSyntaxOid: string | null;
}

export interface SchemaOptions {
  logger?: Logger;
}

/**
 * Case-insensitive lookup table keyed by numeric OID and every NAME.
 */
export class DescriptorTable<T extends { oid: string }> {
  private readonly byKey = new Map<string, T>();
  private readonly ordered: T[] = [];

  add(descriptor: T, names: readonly string[]): void {
    this.ordered.push(descriptor);
    this.byKey.set(descriptor.oid.toLowerCase(), descriptor);
    for (const name of names) this.byKey.set(name.toLowerCase(), descriptor);
  }

  get(key: string): T | undefined {
    return this.byKey.get(key.toLowerCase());
  }

  has(key: string): boolean {
    return this.byKey.has(key.toLowerCase());
  }

  values(): readonly T[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }
}

function uniqueCaseInsensitive(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}

/**
 * A parsed directory schema. Construction parses every definition and
 * resolves inheritance up front, so a cycle aborts the whole load.
 */
export class Schema {
  readonly objectClasses = new DescriptorTable<ObjectClass>();
  readonly attributeTypes = new DescriptorTable<AttributeType>();
  readonly ldapSyntaxes = new DescriptorTable<LdapSyntaxDefinition>();
  readonly matchingRules = new DescriptorTable<MatchingRuleDefinition>();
  readonly matchingRuleUse = new DescriptorTable<MatchingRuleUseDefinition>();

  private readonly logger: Logger;

  constructor(raw: RawSchema, options: SchemaOptions = {}) {
    this.logger = options.logger ?? console;

    const classDefs = (raw.objectClasses ?? []).map(parseObjectClass);
    const attributeDefs = (raw.attributeTypes ?? []).map(parseAttributeType);

    for (const def of (raw.ldapSyntaxes ?? []).map(parseLdapSyntax)) {
      this.ldapSyntaxes.add(def, []);
    }
    for (const def of (raw.matchingRules ?? []).map(parseMatchingRule)) {
      this.matchingRules.add(def, def.names);
    }
    for (const def of (raw.matchingRuleUse ?? []).map(parseMatchingRuleUse)) {
      this.matchingRuleUse.add(def, def.names);
    }

    for (const attr of this.resolveAttributeTypes(attributeDefs)) {
      this.attributeTypes.add(attr, attr.names);
    }
    for (const oc of this.resolveObjectClasses(classDefs)) {
      this.objectClasses.add(oc, oc.names);
    }
  }

  objectClass(nameOrOid: string): ObjectClass | undefined {
    return this.objectClasses.get(nameOrOid);
  }

  attributeType(nameOrOid: string): AttributeType | undefined {
    return this.attributeTypes.get(nameOrOid);
  }

  /** Effective MUST attribute names of the given class. */
  effectiveMust(nameOrOid: string): string[] {
    return this.objectClass(nameOrOid)?.must ?? [];
  }

  /** Effective MAY attribute names of the given class. */
  effectiveMay(nameOrOid: string): string[] {
    return this.objectClass(nameOrOid)?.may ?? [];
  }

  // -------------------------------------------------------------------------
  // Inheritance resolution
  // -------------------------------------------------------------------------

  private resolveObjectClasses(defs: readonly ObjectClassDefinition[]): ObjectClass[] {
    const byKey = new Map<string, ObjectClassDefinition>();
    for (const def of defs) {
      byKey.set(def.oid.toLowerCase(), def);
      for (const name of def.names) byKey.set(name.toLowerCase(), def);
    }

    const resolved = new Map<ObjectClassDefinition, { must: string[]; may: string[] }>();

    const resolve = (def: ObjectClassDefinition, path: string[]): { must: string[]; may: string[] } => {
      const done = resolved.get(def);
      if (done !== undefined) return done;

      const label = def.names[0] ?? def.oid;
      if (path.includes(label)) throw new SchemaCycleError([...path, label]);

      const must: string[] = [];
      const may: string[] = [];
      for (const supName of def.sup) {
        const sup = byKey.get(supName.toLowerCase());
        if (sup === undefined) {
          this.logger.warn(`objectClass ${label}: superior ${supName} is not defined; ignoring it`);
          continue;
        }
        const inherited = resolve(sup, [...path, label]);
        must.push(...inherited.must);
        may.push(...inherited.may);
      }
      const result = {
        must: uniqueCaseInsensitive([...must, ...def.must]),
        may: uniqueCaseInsensitive([...may, ...def.may]),
      };
      resolved.set(def, result);
      return result;
    };

    return defs.map((def) => {
      const { must, may } = resolve(def, []);
      return {
        ...def,
        ownMust: def.must,
        ownMay: def.may,
        must,
        may,
        structural: def.kind === 'structural',
      };
    });
  }

  private resolveAttributeTypes(defs: readonly AttributeTypeDefinition[]): AttributeType[] {
    const byKey = new Map<string, AttributeTypeDefinition>();
    for (const def of defs) {
      byKey.set(def.oid.toLowerCase(), def);
      for (const name of def.names) byKey.set(name.toLowerCase(), def);
    }

    const syntaxes = new Map<AttributeTypeDefinition, string | null>();

    const resolveSyntax = (def: AttributeTypeDefinition, path: string[]): string | null => {
      if (syntaxes.has(def)) return syntaxes.get(def) ?? null;
      const label = def.names[0] ?? def.oid;
      if (path.includes(label)) throw new SchemaCycleError([...path, label]);

      let syntax = def.syntaxOid;
      if (def.sup !== null) {
        const sup = byKey.get(def.sup.toLowerCase());
        if (sup === undefined) {
          this.logger.warn(`attributeType ${label}: superior ${def.sup} is not defined; ignoring it`);
        } else {
          const inherited = resolveSyntax(sup, [...path, label]);
          syntax ??= inherited;
        }
      }
      syntaxes.set(def, syntax);
      return syntax;
    };

    return defs.map((def) => ({
      ...def,
      ownSyntaxOid: def.syntaxOid,
      syntaxOid: resolveSyntax(def, []),
    }));
  }
}

/** Parses a raw schema dump. Throws SchemaCycleError or SchemaParseError. */
export function parseSchema(raw: RawSchema, options: SchemaOptions = {}): Schema {
  return new Schema(raw, options);
}
