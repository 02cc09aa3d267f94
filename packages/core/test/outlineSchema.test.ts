import { describe, expect, it } from 'vitest';
import { mapForest } from '../src/entities/Tree.js';
import { OutlineParseError } from '../src/errors/service.js';
import {
  outlineItemSchema,
  outlineKey,
  parseOutlineForest,
  parseOutlineJson,
} from '../src/schemas/outline.js';
import { show } from './fixtures.js';

const outline = [
  {
    value: { id: 'goals', title: 'Goals' },
    children: [
      { value: { id: 'health', title: 'Health' }, children: [] },
      { value: { id: 'money', title: 'Money' }, children: [] },
    ],
  },
  { value: { id: 'inbox', title: 'Inbox' }, children: [] },
];

describe('Outline schemas', () => {
  it('validates a single outline item', () => {
    expect(outlineItemSchema.parse({ id: 'a', title: 'Alpha' })).toEqual({ id: 'a', title: 'Alpha' });
    expect(outlineKey({ id: 'a', title: 'Alpha' })).toBe('a');
  });

  it('parses a nested outline into a forest', () => {
    const result = parseOutlineForest(outline);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(show(mapForest(result.data, outlineKey))).toBe(
        'goals(health money) inbox'
      );
    }
  });

  it('reports the path of a missing field', () => {
    const result = parseOutlineForest([
      { value: { id: 'a', title: 'A' }, children: [{ value: { id: 'b' }, children: [] }] },
    ]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(OutlineParseError);
      expect(result.error.validationErrors).toEqual([
        { field: '0.children.0.value.title', message: 'Required', code: 'invalid_type' },
      ]);
      expect(result.error.message).toBe('Invalid outline: 0.children.0.value.title: Required');
    }
  });

  it('rejects empty ids', () => {
    const result = parseOutlineForest([{ value: { id: '', title: 'Nameless' }, children: [] }]);

    expect(!result.success && result.error.validationErrors).toEqual([
      { field: '0.value.id', message: 'Outline item id must not be empty', code: 'too_small' },
    ]);
  });

  it('parses outline JSON text', () => {
    const result = parseOutlineJson(JSON.stringify(outline));

    expect(result.success && result.data).toEqual(outline);
  });

  it('reports malformed JSON', () => {
    const result = parseOutlineJson('[{"value": ');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toMatch(/^Outline is not valid JSON: /);
      expect(result.error.validationErrors).toEqual([]);
      expect(result.error.module).toBe('service.outline');
    }
  });
});
