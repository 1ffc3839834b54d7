/**
 * TypeScript Model Emitter
 *
 * Renders a resource as a self-contained TypeScript class with readonly
 * fields, a positional constructor with optional parameters last,
 * `fromMap`/`toMap` conversion keyed by the documented property names,
 * `toJSON`, and one accessor per property.
 */

import type { ApiResource, PropertyType } from '../../types/api-resource.js';
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

export interface TypeScriptEmitterOptions {
  /** First directory segment of every generated path (default: Models) */
  rootSegment?: string;
  /** Indentation unit (default: two spaces) */
  indent?: string;
}

const TS_TYPES: Record<PropertyType, string> = {
  string: 'string',
  int: 'number',
  float: 'number',
  bool: 'boolean',
};

/**
 * Words that cannot name a constructor parameter
 */
const RESERVED_WORDS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete',
  'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if',
  'implements', 'import', 'in', 'instanceof', 'interface', 'let', 'new', 'null', 'package',
  'private', 'protected', 'public', 'return', 'static', 'super', 'switch', 'this', 'throw',
  'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield', 'await', 'arguments', 'eval',
]);

export class TypeScriptEmitter implements ModelEmitter {
  readonly target = 'ts';
  readonly fileExtension = '.ts';

  private readonly rootSegment: string;
  private readonly indent: string;

  constructor(options: TypeScriptEmitterOptions = {}) {
    this.rootSegment = options.rootSegment ?? DEFAULT_ROOT_SEGMENT;
    this.indent = options.indent ?? '  ';
  }

  relativePath(resource: ApiResource): string {
    const segments = groupSegments(resource, this.rootSegment);
    return [...segments, `${modelClassName(resource)}${this.fileExtension}`].join('/');
  }

  emit(resource: ApiResource): string {
    const className = modelClassName(resource);
    const fields = modelFields(resource);

    const members = [
      this.renderFields(fields),
      this.renderConstructor(fields),
      this.renderFromMap(className, fields),
      this.renderToMap(fields),
      this.renderToJson(),
      ...fields.map((field) => this.renderAccessor(field)),
    ].filter((block) => block.length > 0);

    return [
      '/**',
      ` * ${commentText(resource.description || `Model for ${resource.name}`)}`,
      ' *',
      ` * Generated from: ${commentText(resource.endpoint)}`,
      ' */',
      `export class ${className} {`,
      members.join('\n\n'),
      '}',
      '',
    ].join('\n');
  }

  private typeOf(field: ModelField): string {
    const base = TS_TYPES[field.property.type];
    return field.property.isNullable ? `${base} | null` : base;
  }

  private parameterName(field: ModelField): string {
    return RESERVED_WORDS.has(field.fieldName) ? `${field.fieldName}_` : field.fieldName;
  }

  private renderFields(fields: ModelField[]): string {
    const i = this.indent;
    const lines: string[] = [];
    for (const field of fields) {
      if (field.property.description) {
        lines.push(`${i}/** ${commentText(field.property.description)} */`);
      }
      lines.push(`${i}readonly ${field.fieldName}: ${this.typeOf(field)};`);
    }
    return lines.join('\n');
  }

  private renderConstructor(fields: ModelField[]): string {
    const i = this.indent;
    if (fields.length === 0) {
      return `${i}constructor() {}`;
    }

    const params = constructorOrder(fields).map((field) => {
      const declaration = `${this.parameterName(field)}: ${this.typeOf(field)}`;
      return `${i}${i}${field.optional ? `${declaration} = null` : declaration},`;
    });
    const assignments = fields.map(
      (field) => `${i}${i}this.${field.fieldName} = ${this.parameterName(field)};`
    );

    return [`${i}constructor(`, ...params, `${i}) {`, ...assignments, `${i}}`].join('\n');
  }

  /**
   * Read expression for one field from `data`
   */
  private readExpression(field: ModelField): string {
    const value = `data[${quote(field.sourceKey)}]`;

    if (field.property.isNullable) {
      return `(${value} ?? null) as ${this.typeOf(field)}`;
    }

    switch (field.property.type) {
      case 'int':
        return `Math.trunc(Number(${value} ?? 0)) || 0`;
      case 'float':
        return `Number(${value} ?? 0) || 0`;
      case 'bool':
        return `Boolean(${value} ?? false)`;
      default:
        return `String(${value} ?? '')`;
    }
  }

  private renderFromMap(className: string, fields: ModelField[]): string {
    const i = this.indent;
    const signature = `${i}static fromMap(data: Record<string, unknown>): ${className} {`;

    if (fields.length === 0) {
      return [signature, `${i}${i}return new ${className}();`, `${i}}`].join('\n');
    }

    return [
      signature,
      `${i}${i}return new ${className}(`,
      ...constructorOrder(fields).map((field) => `${i}${i}${i}${this.readExpression(field)},`),
      `${i}${i});`,
      `${i}}`,
    ].join('\n');
  }

  private renderToMap(fields: ModelField[]): string {
    const i = this.indent;
    const signature = `${i}toMap(): Record<string, unknown> {`;

    if (fields.length === 0) {
      return [signature, `${i}${i}return {};`, `${i}}`].join('\n');
    }

    return [
      signature,
      `${i}${i}return {`,
      ...fields.map((field) => `${i}${i}${i}${quote(field.sourceKey)}: this.${field.fieldName},`),
      `${i}${i}};`,
      `${i}}`,
    ].join('\n');
  }

  private renderToJson(): string {
    const i = this.indent;
    return [
      `${i}toJSON(): Record<string, unknown> {`,
      `${i}${i}return this.toMap();`,
      `${i}}`,
    ].join('\n');
  }

  private renderAccessor(field: ModelField): string {
    const i = this.indent;
    const lines: string[] = [];
    if (field.property.description) {
      lines.push(`${i}/** ${commentText(field.property.description)} */`);
    }
    lines.push(
      `${i}${field.accessorName}(): ${this.typeOf(field)} {`,
      `${i}${i}return this.${field.fieldName};`,
      `${i}}`
    );
    return lines.join('\n');
  }
}
