import { describe, it, expect } from 'vitest';
import type {
  AnnotationSchema,
  PersistedEntry,
  RecordStatus,
  RunStage,
} from '../src/index.js';

describe('shared-types', () => {
  it('AnnotationSchema supports nested list fields', () => {
    const schema: AnnotationSchema = {
      name: 'publication',
      fields: [
        { name: 'title', type: 'string' },
        { name: 'category', type: 'enum', values: ['news', 'research'] },
        {
          name: 'authors',
          type: 'list',
          required: false,
          items: { name: 'author', fields: [{ name: 'name', type: 'string' }] },
        },
      ],
    };
    const authors = schema.fields[2];
    expect(authors?.type).toBe('list');
    if (authors?.type === 'list') {
      expect(authors.items.fields).toHaveLength(1);
    }
  });

  it('PersistedEntry only carries terminal statuses', () => {
    const entry: PersistedEntry = {
      id: 'pub_001',
      identityKey: 'https://example.com/a',
      sourceLocator: 'https://example.com/a',
      status: 'annotated',
      annotation: { title: 'A' },
      attempts: 1,
      lastError: null,
      metadata: {},
      createdAt: new Date('2026-01-01T00:00:00Z'),
      updatedAt: new Date('2026-01-01T00:00:00Z'),
    };
    const statuses: RecordStatus[] = ['new', 'annotated', 'failed', 'exhausted', 'skipped'];
    expect(statuses).toContain(entry.status);
  });

  it('RunStage includes both terminal failure stages', () => {
    const stages: RunStage[] = ['completed', 'failed', 'cancelled'];
    expect(stages).toHaveLength(3);
  });
});
