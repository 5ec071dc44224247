import { describe, it, expect } from 'vitest';
import type { AnnotationSchema } from '@curate/shared-types';
import { parseAnnotation, validateAnnotation } from '../src/parsing/validator.js';
import { ParseError, ValidationError } from '../src/errors.js';

const schema: AnnotationSchema = {
  name: 'publication',
  fields: [
    { name: 'title', type: 'string' },
    { name: 'category', type: 'enum', values: ['news', 'research'] },
    { name: 'peerReviewed', type: 'boolean', required: false },
    {
      name: 'authors',
      type: 'list',
      required: false,
      items: { name: 'author', fields: [{ name: 'name', type: 'string' }] },
    },
  ],
};

describe('validateAnnotation', () => {
  it('accepts a complete value and drops unknown fields', () => {
    const result = validateAnnotation(
      { title: 'A', category: 'news', peerReviewed: true, authors: [{ name: 'Ada', extra: 1 }], score: 9 },
      schema,
    );
    expect(result).toEqual({
      ok: true,
      value: { title: 'A', category: 'news', peerReviewed: true, authors: [{ name: 'Ada' }] },
    });
  });

  it('leaves absent optional fields out of the value', () => {
    expect(validateAnnotation({ title: 'A', category: 'research' }, schema)).toEqual({
      ok: true,
      value: { title: 'A', category: 'research' },
    });
  });

  it('collects every issue with its path', () => {
    const result = validateAnnotation(
      { title: null, category: 'blog', peerReviewed: 'yes', authors: [{ name: 'Ada' }, { name: 3 }] },
      schema,
    );
    expect(result).toEqual({
      ok: false,
      issues: [
        { path: 'title', message: 'required field is missing' },
        { path: 'category', message: 'expected one of [news, research], got "blog"' },
        { path: 'peerReviewed', message: 'expected boolean, got string' },
        { path: 'authors[1].name', message: 'expected string, got number' },
      ],
    });
  });

  it('rejects a list that is not an array', () => {
    const result = validateAnnotation({ title: 'A', category: 'news', authors: { name: 'Ada' } }, schema);
    expect(result).toEqual({ ok: false, issues: [{ path: 'authors', message: 'expected list, got object' }] });
  });

  it('rejects non-object roots', () => {
    expect(validateAnnotation([1, 2], schema)).toEqual({
      ok: false,
      issues: [{ path: '', message: 'expected object, got array' }],
    });
    expect(validateAnnotation(null, schema)).toEqual({
      ok: false,
      issues: [{ path: '', message: 'expected object, got null' }],
    });
  });

  it('reports a non-string enum value by type', () => {
    const result = validateAnnotation({ title: 'A', category: 4 }, schema);
    expect(result).toEqual({
      ok: false,
      issues: [{ path: 'category', message: 'expected one of [news, research], got number' }],
    });
  });
});

describe('parseAnnotation', () => {
  it('stores a field named __proto__ as an own key instead of the prototype', () => {
    const odd: AnnotationSchema = { name: 'odd', fields: [{ name: '__proto__', type: 'string' }] };

    const result = parseAnnotation('{"__proto__":"x"}', odd);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.keys(result.value)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(result.value, '__proto__')?.value).toBe('x');
    expect(Object.getPrototypeOf(result.value)).toBe(Object.prototype);
  });

  it('reports a missing __proto__ field instead of accepting an empty value', () => {
    const odd: AnnotationSchema = { name: 'odd', fields: [{ name: '__proto__', type: 'string' }] };

    const result = parseAnnotation('{}', odd);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual([{ path: '__proto__', message: 'required field is missing' }]);
  });

  it('returns the typed value with the strategy used', () => {
    const text = 'Sure:\n```json\n{"title": "A", "category": "news",}\n```';
    expect(parseAnnotation(text, schema)).toEqual({
      ok: true,
      value: { title: 'A', category: 'news' },
      strategy: 'fenced',
      repaired: true,
    });
  });

  it('turns non-JSON text into a ParseError that is also a ValidationError', () => {
    const result = parseAnnotation('I cannot help with that.', schema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe('Response is not JSON and contains no fenced block');
    expect(result.error.rawPreview).toBe('I cannot help with that.');
  });

  it('summarizes schema mismatches in the error message', () => {
    const result = parseAnnotation('{"category": "blog"}', schema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).not.toBeInstanceOf(ParseError);
    expect(result.error.message).toBe(
      'Output does not match schema "publication": title: required field is missing (+1 more)',
    );
    expect(result.error.issues).toHaveLength(2);
  });

  it('omits the path prefix for root-level mismatches', () => {
    const result = parseAnnotation('[{"title": "A"}]', schema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Output does not match schema "publication": expected object, got array');
  });

  it('truncates the raw preview to 200 characters with newlines flattened', () => {
    const text = `line one\n${'x'.repeat(300)}`;
    const result = parseAnnotation(text, schema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.rawPreview).toBe(`line one ${'x'.repeat(191)}...`);
  });
});
