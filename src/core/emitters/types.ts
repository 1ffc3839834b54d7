/**
 * Model Emitter Types
 *
 * Common types and helpers for turning a resource into model source code.
 * Each target language has one emitter implementing `ModelEmitter`.
 */

import {
  propertyAccessorName,
  propertyFieldName,
  resourceClassName,
  resourceGroup,
  type ApiProperty,
  type ApiResource,
} from '../../types/api-resource.js';
import { GenerationError } from '../../utils/errors.js';

/**
 * Emits the source of one model class per resource
 */
export interface ModelEmitter {
  /** Short target name used on the command line */
  readonly target: string;
  /** File extension including the dot */
  readonly fileExtension: string;
  /** Output path relative to the output directory, using `/` separators */
  relativePath(resource: ApiResource): string;
  /**
   * Render the model class.
   *
   * @throws GenerationError when the resource cannot be expressed in the target language
   */
  emit(resource: ApiResource): string;
}

/**
 * A property prepared for emission
 */
export interface ModelField {
  readonly property: ApiProperty;
  /** Member name in the generated class */
  readonly fieldName: string;
  readonly accessorName: string;
  /** Key used in untyped maps: the documented name */
  readonly sourceKey: string;
  /** Constructor parameter defaults to absence */
  readonly optional: boolean;
}

export const DEFAULT_ROOT_SEGMENT = 'Models';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Members every generated class defines
 */
const GENERATED_MEMBERS = new Set(['constructor', 'fromMap', 'toMap', 'toJSON', 'fromArray', 'toArray', 'jsonSerialize']);

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Class name for a resource, validated as an identifier
 */
export function modelClassName(resource: ApiResource): string {
  const className = resourceClassName(resource);
  if (!isValidIdentifier(className)) {
    throw new GenerationError(
      `Resource "${resource.name}" does not produce a valid class name ("${className}")`,
      resource.name
    );
  }
  return className;
}

/**
 * Prepare every property of a resource, in declaration order.
 *
 * @throws GenerationError for names that are not identifiers or that clash
 */
export function modelFields(resource: ApiResource): ModelField[] {
  const seen = new Map<string, string>();

  const fields = resource.properties.map((property) => {
    const fieldName = propertyFieldName(property);

    if (!isValidIdentifier(fieldName)) {
      throw new GenerationError(
        `Property "${property.name}" of "${resource.name}" does not produce a valid field name ("${fieldName}")`,
        resource.name
      );
    }

    if (GENERATED_MEMBERS.has(fieldName)) {
      throw new GenerationError(
        `Property "${property.name}" of "${resource.name}" maps to the generated member "${fieldName}"`,
        resource.name
      );
    }

    const previous = seen.get(fieldName);
    if (previous !== undefined) {
      throw new GenerationError(
        `Properties "${previous}" and "${property.name}" of "${resource.name}" both map to field "${fieldName}"`,
        resource.name
      );
    }
    seen.set(fieldName, property.name);

    return {
      property,
      fieldName,
      accessorName: propertyAccessorName(property),
      sourceKey: property.name,
      optional: property.isNullable && !property.isRequired,
    };
  });

  // Accessors share the class namespace with fields
  for (const field of fields) {
    const owner = seen.get(field.accessorName);
    if (owner !== undefined) {
      throw new GenerationError(
        `Accessor "${field.accessorName}" for "${field.property.name}" of "${resource.name}" clashes with field of "${owner}"`,
        resource.name
      );
    }
  }

  return fields;
}

/**
 * Fields in constructor parameter order: required parameters first, then the
 * ones that default to absence, each group in declaration order
 */
export function constructorOrder(fields: readonly ModelField[]): ModelField[] {
  return [...fields.filter((field) => !field.optional), ...fields.filter((field) => field.optional)];
}

/**
 * Directory segments for a resource: the root segment plus its group, if any
 */
export function groupSegments(resource: ApiResource, rootSegment: string = DEFAULT_ROOT_SEGMENT): string[] {
  const group = resourceGroup(resource);
  return group ? [rootSegment, group] : [rootSegment];
}

/**
 * Single-quoted string literal (valid in both TypeScript and PHP)
 */
export function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Text safe to place inside a block comment, on one line
 */
export function commentText(value: string): string {
  return value.replace(/\s+/g, ' ').replace(/\*\//g, '*\\/').trim();
}
