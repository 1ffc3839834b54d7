/**
 * Type and Property Name Normalization
 *
 * Maps the type tokens used in the documentation (OData `Edm.*` names and
 * plain spellings) onto the four canonical property types, and documented
 * identifiers onto field names.
 */

import type { PropertyType } from '../types/api-resource.js';

/**
 * Documented type token (lower-cased) to canonical type.
 * Dates are kept as strings.
 */
const TYPE_TOKENS: Readonly<Record<string, PropertyType>> = {
  'edm.guid': 'string',
  guid: 'string',
  uuid: 'string',
  'edm.int16': 'int',
  'edm.int32': 'int',
  int: 'int',
  integer: 'int',
  'edm.double': 'float',
  'edm.decimal': 'float',
  double: 'float',
  decimal: 'float',
  float: 'float',
  'edm.boolean': 'bool',
  bool: 'bool',
  boolean: 'bool',
  'edm.datetime': 'string',
  'edm.datetimeoffset': 'string',
  datetime: 'string',
  date: 'string',
  'edm.string': 'string',
  string: 'string',
  'edm.byte': 'int',
  byte: 'int',
};

/**
 * Identifiers that become fully lower-case field names when a name is exactly the acronym
 */
export const KNOWN_ACRONYMS = ['ID', 'URL', 'API', 'JSON', 'XML', 'HTML', 'HTTP', 'HTTPS', 'SQL'] as const;

const WORD_SEPARATORS = /[ _-]+/;

/**
 * Normalize a documented type token. Unknown tokens become `string`.
 */
export function normalizeType(rawToken: string): PropertyType {
  const token = rawToken.trim().toLowerCase();
  return Object.hasOwn(TYPE_TOKENS, token) ? TYPE_TOKENS[token] : 'string';
}

function upperFirst(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

/**
 * Convert a documented identifier into a field name.
 *
 * @example
 * propertyNameFrom('ID')          // 'id'
 * propertyNameFrom('IsActive')    // 'isActive'
 * propertyNameFrom('account_name') // 'accountName'
 */
export function propertyNameFrom(rawName: string): string {
  const name = rawName.trim();
  const acronym = KNOWN_ACRONYMS.find((candidate) => candidate === name.toUpperCase());
  if (acronym) {
    return acronym.toLowerCase();
  }

  const words = name.split(WORD_SEPARATORS).filter(Boolean);
  return lowerFirst(words.map(upperFirst).join(''));
}

export { upperFirst, lowerFirst };
