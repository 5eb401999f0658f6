import type { AttributeValue } from '../types.js';

export const SYNTAX_OIDS = {
  BOOLEAN: '1.3.6.1.4.1.1466.115.121.1.7',
  DIRECTORY_STRING: '1.3.6.1.4.1.1466.115.121.1.15',
  DN: '1.3.6.1.4.1.1466.115.121.1.12',
  GENERALIZED_TIME: '1.3.6.1.4.1.1466.115.121.1.24',
  IA5_STRING: '1.3.6.1.4.1.1466.115.121.1.26',
  INTEGER: '1.3.6.1.4.1.1466.115.121.1.27',
  OID: '1.3.6.1.4.1.1466.115.121.1.38',
} as const;

export type SyntaxDecoder = (raw: string) => AttributeValue;

/** syntax OID → decoder. */
export type SyntaxDecoders = Readonly<Record<string, SyntaxDecoder>>;

const GENERALIZED_TIME = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})?(\d{2})?(?:[.,](\d+))?(Z|[+-]\d{2}(?:\d{2})?)?$/;

/**
 * Parses an RFC 4517 GeneralizedTime such as `20240131235959Z` or
 * `202401312359.5+0100`. A fraction belongs to the last unit given, so
 * `.5` after the minute is thirty seconds. Returns the raw string when it
 * does not parse.
 */
export function decodeGeneralizedTime(raw: string): AttributeValue {
  const match = GENERALIZED_TIME.exec(raw.trim());
  if (match === null) return raw;
  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const whole = new Date(
    `${year}-${month}-${day}T${hour}:${minute ?? '00'}:${second ?? '00'}` +
      (zone === undefined || zone === 'Z' ? 'Z' : `${zone.slice(0, 3)}:${zone.slice(3, 5) || '00'}`),
  );
  if (Number.isNaN(whole.getTime())) return raw;
  if (fraction === undefined) return whole;
  const unitMs = second !== undefined ? 1000 : minute !== undefined ? 60 * 1000 : 60 * 60 * 1000;
  return new Date(whole.getTime() + Math.round(Number(`0.${fraction}`) * unitMs));
}

export function decodeBoolean(raw: string): AttributeValue {
  if (raw === 'TRUE') return true;
  if (raw === 'FALSE') return false;
  return raw;
}

export function decodeInteger(raw: string): AttributeValue {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) return raw;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : raw;
}

export const DEFAULT_SYNTAX_DECODERS: SyntaxDecoders = {
  [SYNTAX_OIDS.BOOLEAN]: decodeBoolean,
  [SYNTAX_OIDS.INTEGER]: decodeInteger,
  [SYNTAX_OIDS.GENERALIZED_TIME]: decodeGeneralizedTime,
};

/**
 * Decodes a raw value by its attribute's syntax. Values of syntaxes with no
 * decoder are returned unchanged.
 */
export function decodeSyntaxValue(
  syntaxOid: string | null,
  raw: string,
  decoders: SyntaxDecoders = DEFAULT_SYNTAX_DECODERS,
): AttributeValue {
  if (syntaxOid === null) return raw;
  const decoder = decoders[syntaxOid];
  return decoder === undefined ? raw : decoder(raw);
}
