/**
 * Tests for shared emitter helpers
 */

import { describe, it, expect } from 'vitest';
import {
  commentText,
  createEmitter,
  groupSegments,
  isValidIdentifier,
  modelFields,
  quote,
  PhpEmitter,
  TypeScriptEmitter,
} from '../../src/core/emitters/index.js';
import { createProperty, createResource } from '../../src/types/api-resource.js';

describe('quote', () => {
  it('escapes backslashes and single quotes', () => {
    expect(quote('plain')).toBe("'plain'");
    expect(quote("Owner's")).toBe("'Owner\\'s'");
    expect(quote('a\\b')).toBe("'a\\\\b'");
  });
});

describe('commentText', () => {
  it('collapses whitespace onto one line', () => {
    expect(commentText('  first\n  second\tthird ')).toBe('first second third');
  });
});

describe('isValidIdentifier', () => {
  it('accepts letters, digits and underscores not starting with a digit', () => {
    expect(isValidIdentifier('_id2')).toBe(true);
    expect(isValidIdentifier('2id')).toBe(false);
    expect(isValidIdentifier('a-b')).toBe(false);
    expect(isValidIdentifier('')).toBe(false);
  });
});

describe('modelFields', () => {
  it('marks nullable non-required properties as optional', () => {
    const resource = createResource({
      name: 'Items',
      endpoint: '',
      properties: [
        createProperty({ name: 'ID', type: 'string' }),
        createProperty({ name: 'Notes', type: 'string', isRequired: false, isNullable: true }),
      ],
    });

    expect(
      modelFields(resource).map((f) => ({
        fieldName: f.fieldName,
        accessorName: f.accessorName,
        sourceKey: f.sourceKey,
        optional: f.optional,
      }))
    ).toEqual([
      { fieldName: 'id', accessorName: 'getId', sourceKey: 'ID', optional: false },
      { fieldName: 'notes', accessorName: 'getNotes', sourceKey: 'Notes', optional: true },
    ]);
  });
});

describe('groupSegments', () => {
  it('prefixes the group with the root segment', () => {
    expect(groupSegments(createResource({ name: 'A', endpoint: '', service: 'CRM' }))).toEqual(['Models', 'Crm']);
    expect(groupSegments(createResource({ name: 'A', endpoint: '' }), 'Out')).toEqual(['Out']);
  });
});

describe('createEmitter', () => {
  it('returns the emitter for a target name', () => {
    expect(createEmitter('ts')).toBeInstanceOf(TypeScriptEmitter);
    expect(createEmitter('php')).toBeInstanceOf(PhpEmitter);
    expect(createEmitter('php').fileExtension).toBe('.php');
  });
});
