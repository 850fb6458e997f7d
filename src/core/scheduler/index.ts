/**
 * Scheduler Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { Scheduler, ReviewQueue } from '@/core/scheduler';
 * ```
 */

export { Scheduler } from './scheduler';
export { ReviewQueue } from './review-queue';
export {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
  type ReviewSummary,
} from './types';
