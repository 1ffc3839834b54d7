/**
 * Resource Model
 *
 * Immutable in-memory representation of documented API resources and their
 * properties, plus the naming derived from them. Values are created once and
 * replaced through `withOverrides`, never mutated.
 */

import { propertyNameFrom, upperFirst } from '../core/type-normalizer.js';
import { ModelInvariantError } from '../utils/errors.js';

export const PROPERTY_TYPES = ['string', 'int', 'float', 'bool'] as const;

/**
 * Canonical property type
 */
export type PropertyType = (typeof PROPERTY_TYPES)[number];

/**
 * One documented field of a resource
 */
export interface ApiProperty {
  /** Identifier exactly as documented (e.g. `ID`, `IsActive`) */
  readonly name: string;
  readonly type: PropertyType;
  readonly description: string;
  readonly isRequired: boolean;
  readonly isNullable: boolean;
}

/**
 * One documented API entity
 */
export interface ApiResource {
  readonly name: string;
  readonly endpoint: string;
  readonly description: string;
  readonly properties: readonly ApiProperty[];
  readonly service?: string;
  readonly resourceUri?: string;
  readonly supportedMethods?: string;
  readonly hasWebhook?: boolean;
  readonly scope?: string;
  readonly detailUrl?: string;
}

export interface ApiPropertyInit {
  name: string;
  type: PropertyType;
  description?: string;
  isRequired?: boolean;
  isNullable?: boolean;
}

export type ApiResourceInit = Omit<ApiResource, 'properties' | 'description'> & {
  description?: string;
  properties?: readonly ApiProperty[];
};

/**
 * Fields that may be replaced when producing a new resource from an existing one
 */
export type ResourceOverrides = Partial<Omit<ApiResource, 'properties'>> & {
  properties?: readonly ApiProperty[];
};

// ============================================
// CONSTRUCTION
// ============================================

/**
 * Build a property. Defaults to required and non-nullable.
 *
 * @throws ModelInvariantError when the property would be both required and nullable
 */
export function createProperty(init: ApiPropertyInit): ApiProperty {
  const isRequired = init.isRequired ?? true;
  const isNullable = init.isNullable ?? false;

  if (isRequired && isNullable) {
    throw new ModelInvariantError(`Property "${init.name}" cannot be both required and nullable`);
  }

  return Object.freeze({
    name: init.name,
    type: init.type,
    description: init.description ?? '',
    isRequired,
    isNullable,
  });
}

/**
 * Build a property for a key field. Key fields are always required and never nullable.
 */
export function createKeyProperty(init: Omit<ApiPropertyInit, 'isRequired' | 'isNullable'>): ApiProperty {
  return createProperty({ ...init, isRequired: true, isNullable: false });
}

export function createResource(init: ApiResourceInit): ApiResource {
  const resource: ApiResource = {
    ...init,
    description: init.description ?? '',
    properties: Object.freeze([...(init.properties ?? [])]),
  };
  return Object.freeze(resource);
}

/**
 * Produce a new resource from `base` with the given fields replaced
 */
export function withOverrides(base: ApiResource, overrides: ResourceOverrides): ApiResource {
  return createResource({ ...base, ...overrides });
}

// ============================================
// DERIVED NAMING
// ============================================

/**
 * Field name used in generated code
 */
export function propertyFieldName(property: ApiProperty): string {
  return propertyNameFrom(property.name);
}

/**
 * `isX` for booleans, `getX` for everything else
 */
export function propertyAccessorName(property: ApiProperty): string {
  const prefix = property.type === 'bool' ? 'is' : 'get';
  return prefix + upperFirst(propertyFieldName(property));
}

/**
 * Class name: non-alphanumerics split words, each word gets an upper-case first letter.
 *
 * @example
 * resourceClassName({ name: 'Test Account', ... }) // 'TestAccount'
 */
export function resourceClassName(resource: Pick<ApiResource, 'name'>): string {
  return resource.name
    .replace(/[^a-zA-Z0-9]/g, ' ')
    .split(' ')
    .filter(Boolean)
    .map(upperFirst)
    .join('');
}

const ENDPOINT_GROUP_PATTERN = /\/api\/v1\/\{?division\}?\/([^/]+)/;

function groupName(raw: string): string {
  return upperFirst(raw.trim().toLowerCase()).replace(/[^a-zA-Z0-9]/g, '');
}

/**
 * Grouping key for generated files: the service when known, else the
 * endpoint's service segment, else `null` for the default group.
 */
export function resourceGroup(resource: Pick<ApiResource, 'service' | 'endpoint'>): string | null {
  if (resource.service && resource.service.trim()) {
    return groupName(resource.service) || null;
  }

  const match = ENDPOINT_GROUP_PATTERN.exec(resource.endpoint);
  if (match) {
    return groupName(match[1]) || null;
  }

  return null;
}
