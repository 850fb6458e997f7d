/**
 * Dedup Module - Barrel Export
 */

export { DedupEngine } from './dedup-engine';
export { diffSentences, formatDiff, normalizeText, splitSentences } from './diff';
export {
  DEFAULT_DEDUP_CONFIG,
  type Classification,
  type ClassificationKind,
  type DedupConfig,
  type FactDiff,
} from './types';
