/**
 * Unit Tests: Dedup/Merge Engine
 *
 * Covers the classification thresholds, the local duplicate check, failing
 * open on collaborator errors and the sentence diff helpers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FakeCollaborator } from '../helpers';
import { DedupEngine, diffSentences, formatDiff, normalizeText, splitSentences } from '../../src/core/dedup';
import type { Fact } from '../../src/core/models';

const created = new Date('2024-03-01T09:00:00Z');

function fact(content: string, overrides: Partial<Fact> = {}): Fact {
  return {
    id: 'fact_variance_1',
    conceptKey: 'variance',
    content,
    version: 1,
    supersededBy: null,
    changeSummary: null,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}

const EXISTING = fact('Variance is the average squared deviation from the mean.');

describe('DedupEngine', () => {
  let collaborator: FakeCollaborator;
  let engine: DedupEngine;

  beforeEach(() => {
    collaborator = new FakeCollaborator();
    engine = new DedupEngine(collaborator);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('classifies a candidate with no existing fact as new', async () => {
    const result = await engine.classify('Variance measures spread.', 'variance', null);

    expect(result).toEqual({ kind: 'new', degraded: false });
    expect(collaborator.calls.similarity).toBe(0);
  });

  it('treats an existing fact of another concept as absent', async () => {
    const result = await engine.classify(EXISTING.content, 'standard_deviation', EXISTING);

    expect(result).toEqual({ kind: 'new', degraded: false });
  });

  it('detects a repeat locally, ignoring case, spacing and final punctuation', async () => {
    const result = await engine.classify(
      '  variance is the average  squared deviation from the MEAN ',
      'variance',
      EXISTING
    );

    expect(result).toEqual({ kind: 'duplicate', factId: 'fact_variance_1' });
    expect(collaborator.calls.similarity).toBe(0);
    expect(collaborator.calls.contradiction).toBe(0);
  });

  it('classifies the same candidate the same way twice', async () => {
    collaborator.similarity = () => 0.7;

    const first = await engine.classify('Variance is never negative.', 'variance', EXISTING);
    const second = await engine.classify('Variance is never negative.', 'variance', EXISTING);

    expect(second).toEqual(first);
  });

  it('classifies low similarity as new without asking about contradiction', async () => {
    collaborator.similarity = () => 0.49;

    const result = await engine.classify('Variance is in squared units.', 'variance', EXISTING);

    expect(result).toEqual({ kind: 'new', degraded: false });
    expect(collaborator.calls.contradiction).toBe(0);
  });

  it('asks about contradiction once similarity reaches the new threshold', async () => {
    collaborator.similarity = () => 0.5;

    const result = await engine.classify('Variance is in squared units.', 'variance', EXISTING);

    expect(result).toEqual({ kind: 'new', degraded: false });
    expect(collaborator.calls.contradiction).toBe(1);
  });

  it('classifies high similarity as duplicate', async () => {
    collaborator.similarity = () => 0.9;

    const result = await engine.classify(
      'The variance is the mean of the squared deviations from the mean.',
      'variance',
      EXISTING
    );

    expect(result).toEqual({ kind: 'duplicate', factId: 'fact_variance_1' });
  });

  it('classifies a contradiction as an update with a sentence diff', async () => {
    collaborator.similarity = () => 0.95;
    collaborator.contradicts = () => true;

    const result = await engine.classify(
      'Variance is the average absolute deviation from the mean.',
      'variance',
      EXISTING
    );

    expect(result).toEqual({
      kind: 'update',
      factId: 'fact_variance_1',
      diff: {
        removed: ['Variance is the average squared deviation from the mean.'],
        added: ['Variance is the average absolute deviation from the mean.'],
      },
    });
  });

  it('honours custom thresholds', async () => {
    const strict = new DedupEngine(collaborator, { newThreshold: 0.2, duplicateThreshold: 0.6 });
    collaborator.similarity = () => 0.6;

    const result = await strict.classify('Variance is in squared units.', 'variance', EXISTING);

    expect(result).toEqual({ kind: 'duplicate', factId: 'fact_variance_1' });
  });

  it('rejects a new threshold above the duplicate threshold', () => {
    expect(() => new DedupEngine(collaborator, { newThreshold: 0.8, duplicateThreshold: 0.7 })).toThrow(
      RangeError
    );
  });

  it('keeps the candidate as new when the collaborator is unavailable', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    collaborator.failing.add('contradiction');
    collaborator.similarity = () => 0.8;

    const result = await engine.classify('Variance is in squared units.', 'variance', EXISTING);

    expect(result).toEqual({ kind: 'new', degraded: true });
    expect(warn).toHaveBeenCalledWith(
      "[DedupEngine] contradiction unavailable for 'variance', keeping candidate as new: simulated outage"
    );
  });

  it('propagates errors that are not collaborator failures', async () => {
    collaborator.similarity = () => {
      throw new TypeError('bad score');
    };

    await expect(engine.classify('Variance is in squared units.', 'variance', EXISTING)).rejects.toThrow(
      TypeError
    );
  });
});

describe('diff helpers', () => {
  it('normalizes text for comparison', () => {
    expect(normalizeText('  The Mean\tIS   the average!! ')).toBe('the mean is the average');
  });

  it('splits text into sentences', () => {
    expect(splitSentences('The mean is 4. The median is 3!  Is that odd?')).toEqual([
      'The mean is 4.',
      'The median is 3!',
      'Is that odd?',
    ]);
  });

  it('reports only the sentences that changed', () => {
    const diff = diffSentences(
      'The mean is 4. The median is 3.',
      'The mean is 4. The median is 5.'
    );

    expect(diff).toEqual({ removed: ['The median is 3.'], added: ['The median is 5.'] });
  });

  it('formats a diff as one line per sentence', () => {
    expect(formatDiff({ removed: ['The median is 3.'], added: ['The median is 5.'] })).toBe(
      '- The median is 3.\n+ The median is 5.'
    );
  });

  it('marks a rewording with no sentence-level change', () => {
    expect(formatDiff(diffSentences('The mean is 4.', 'the mean is 4'))).toBe('(reworded)');
  });
});
