/**
 * PHP Model Emitter
 *
 * Renders a resource as a PSR-12 style `final readonly` PHP class using
 * constructor promotion, `fromArray`/`toArray`, `JsonSerializable` and
 * one getter per property.
 */

import type { ApiResource, PropertyType } from '../../types/api-resource.js';
import { GenerationError } from '../../utils/errors.js';
import {
  commentText,
  constructorOrder,
  groupSegments,
  modelClassName,
  modelFields,
  quote,
  DEFAULT_ROOT_SEGMENT,
  type ModelEmitter,
  type ModelField,
} from './types.js';

export interface PhpEmitterOptions {
  /** Root namespace and first directory segment (default: Models) */
  rootNamespace?: string;
}

const PHP_CASTS: Record<PropertyType, { cast: string; fallback: string }> = {
  string: { cast: '(string)', fallback: "''" },
  int: { cast: '(int)', fallback: '0' },
  float: { cast: '(float)', fallback: '0.0' },
  bool: { cast: '(bool)', fallback: 'false' },
};

const INDENT = '    ';

export class PhpEmitter implements ModelEmitter {
  readonly target = 'php';
  readonly fileExtension = '.php';

  private readonly rootNamespace: string;

  constructor(options: PhpEmitterOptions = {}) {
    this.rootNamespace = options.rootNamespace ?? DEFAULT_ROOT_SEGMENT;
  }

  relativePath(resource: ApiResource): string {
    const segments = groupSegments(resource, this.rootNamespace);
    return [...segments, `${modelClassName(resource)}${this.fileExtension}`].join('/');
  }

  namespaceOf(resource: ApiResource): string {
    return groupSegments(resource, this.rootNamespace).join('\\');
  }

  emit(resource: ApiResource): string {
    const className = modelClassName(resource);
    const fields = modelFields(resource);

    // $this cannot be a promoted parameter
    const self = fields.find((field) => field.fieldName === 'this');
    if (self) {
      throw new GenerationError(
        `Property "${self.property.name}" of "${resource.name}" maps to the reserved variable $this`,
        resource.name
      );
    }

    const methods = [
      this.renderConstructor(fields),
      this.renderFromArray(fields),
      this.renderToArray(fields),
      this.renderJsonSerialize(),
      ...fields.map((field) => this.renderGetter(field)),
    ];

    return [
      '<?php',
      '',
      'declare(strict_types=1);',
      '',
      `namespace ${this.namespaceOf(resource)};`,
      '',
      'use JsonSerializable;',
      '',
      '/**',
      ` * ${commentText(resource.description || `Model for ${resource.name}`)}`,
      ' *',
      ` * Generated from: ${commentText(resource.endpoint)}`,
      ' */',
      `final readonly class ${className} implements JsonSerializable`,
      '{',
      methods.join('\n\n'),
      '}',
      '',
    ].join('\n');
  }

  private typeOf(field: ModelField): string {
    const base = field.property.type;
    return field.property.isNullable ? `?${base}` : base;
  }

  /**
   * Promoted constructor. Optional parameters go last; `fromArray` passes named arguments.
   */
  private renderConstructor(fields: ModelField[]): string {
    if (fields.length === 0) {
      return `${INDENT}public function __construct()\n${INDENT}{\n${INDENT}}`;
    }

    const params: string[] = [];
    for (const field of constructorOrder(fields)) {
      if (field.property.description) {
        params.push(`${INDENT}${INDENT}/** ${commentText(field.property.description)} */`);
      }
      const declaration = `public ${this.typeOf(field)} $${field.fieldName}`;
      params.push(`${INDENT}${INDENT}${field.optional ? `${declaration} = null` : declaration},`);
    }

    return [
      `${INDENT}public function __construct(`,
      ...params,
      `${INDENT}) {`,
      `${INDENT}}`,
    ].join('\n');
  }

  private readExpression(field: ModelField): string {
    const value = `$data[${quote(field.sourceKey)}]`;
    if (field.property.isNullable) {
      return `${value} ?? null`;
    }
    const { cast, fallback } = PHP_CASTS[field.property.type];
    return `${cast} (${value} ?? ${fallback})`;
  }

  private renderFromArray(fields: ModelField[]): string {
    const args = fields.length === 0
      ? [`${INDENT}${INDENT}return new self();`]
      : [
          `${INDENT}${INDENT}return new self(`,
          ...fields.map((field) => `${INDENT}${INDENT}${INDENT}${field.fieldName}: ${this.readExpression(field)},`),
          `${INDENT}${INDENT});`,
        ];

    return [
      `${INDENT}/**`,
      `${INDENT} * Create instance from array data`,
      `${INDENT} *`,
      `${INDENT} * @param array<string, mixed> $data`,
      `${INDENT} */`,
      `${INDENT}public static function fromArray(array $data): self`,
      `${INDENT}{`,
      ...args,
      `${INDENT}}`,
    ].join('\n');
  }

  private renderToArray(fields: ModelField[]): string {
    const body = fields.length === 0
      ? [`${INDENT}${INDENT}return [];`]
      : [
          `${INDENT}${INDENT}return [`,
          ...fields.map((field) => `${INDENT}${INDENT}${INDENT}${quote(field.sourceKey)} => $this->${field.fieldName},`),
          `${INDENT}${INDENT}];`,
        ];

    return [
      `${INDENT}/**`,
      `${INDENT} * @return array<string, mixed>`,
      `${INDENT} */`,
      `${INDENT}public function toArray(): array`,
      `${INDENT}{`,
      ...body,
      `${INDENT}}`,
    ].join('\n');
  }

  private renderJsonSerialize(): string {
    return [
      `${INDENT}/**`,
      `${INDENT} * @return array<string, mixed>`,
      `${INDENT} */`,
      `${INDENT}public function jsonSerialize(): array`,
      `${INDENT}{`,
      `${INDENT}${INDENT}return $this->toArray();`,
      `${INDENT}}`,
    ].join('\n');
  }

  private renderGetter(field: ModelField): string {
    return [
      `${INDENT}public function ${field.accessorName}(): ${this.typeOf(field)}`,
      `${INDENT}{`,
      `${INDENT}${INDENT}return $this->${field.fieldName};`,
      `${INDENT}}`,
    ].join('\n');
  }
}
