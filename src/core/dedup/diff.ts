/**
 * Sentence-level comparison of two versions of a fact.
 */

import type { FactDiff } from './types';

/**
 * Canonical form used for equality checks: case, surrounding whitespace,
 * inner whitespace runs and trailing sentence punctuation are ignored.
 */
export function normalizeText(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[.!?]+$/, '');
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Sentences present only in `before` (removed) and only in `after` (added).
 */
export function diffSentences(before: string, after: string): FactDiff {
  const beforeSentences = splitSentences(before);
  const afterSentences = splitSentences(after);
  const beforeKeys = new Set(beforeSentences.map(normalizeText));
  const afterKeys = new Set(afterSentences.map(normalizeText));

  return {
    removed: beforeSentences.filter((sentence) => !afterKeys.has(normalizeText(sentence))),
    added: afterSentences.filter((sentence) => !beforeKeys.has(normalizeText(sentence))),
  };
}

/**
 * One line per changed sentence, '-' for removed and '+' for added.
 * Stored as the change summary of the superseding fact.
 */
export function formatDiff(diff: FactDiff): string {
  const lines = [
    ...diff.removed.map((sentence) => `- ${sentence}`),
    ...diff.added.map((sentence) => `+ ${sentence}`),
  ];
  return lines.length > 0 ? lines.join('\n') : '(reworded)';
}
