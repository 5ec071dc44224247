import { describe, it, expect } from 'vitest';
import { assertStageTransition, isFinalStage } from '../src/pipeline/stages.js';
import { arraySource, drainSource } from '../src/pipeline/sources.js';

describe('run stages', () => {
  it('starts at loading only', () => {
    expect(() => assertStageTransition('run_1', null, 'loading')).not.toThrow();
    expect(() => assertStageTransition('run_1', null, 'annotating')).toThrow(
      'Illegal transition for run run_1: idle -> annotating',
    );
  });

  it('moves forward one stage at a time', () => {
    expect(() => assertStageTransition('run_1', 'filtering', 'annotating')).not.toThrow();
    expect(() => assertStageTransition('run_1', 'loading', 'annotating')).toThrow(
      'Illegal transition for run run_1: loading -> annotating',
    );
  });

  it('can fail or be cancelled from any running stage', () => {
    expect(() => assertStageTransition('run_1', 'persisting', 'failed')).not.toThrow();
    expect(() => assertStageTransition('run_1', 'deduplicating', 'cancelled')).not.toThrow();
  });

  it('final stages go nowhere', () => {
    expect(isFinalStage('completed')).toBe(true);
    expect(isFinalStage('cancelled')).toBe(true);
    expect(isFinalStage('persisting')).toBe(false);
    expect(() => assertStageTransition('run_1', 'completed', 'failed')).toThrow();
  });
});

describe('arraySource', () => {
  it('yields copies, the same sequence every time', async () => {
    const raws = [{ identityKey: 'k', rawPayload: 'p', sourceLocator: 'l' }];
    const source = arraySource(raws, 'fixture');

    const first = await drainSource(source);
    const second = await drainSource(source);

    expect(first).toEqual(raws);
    expect(second).toEqual(raws);
    expect(first[0]).not.toBe(raws[0]);
    expect(source.describe?.()).toBe('fixture');
  });
});
