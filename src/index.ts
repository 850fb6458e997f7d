/**
 * Statistics Tutor - Library Entry Point
 *
 * A statistics tutor with a local spaced-repetition memory engine: facts
 * learned in conversation are stored as versioned records, deduplicated
 * against what is already known and scheduled for quizzing.
 *
 * For interactive use, see the CLI in src/cli/index.ts.
 *
 * @example
 * ```typescript
 * import { openDatabase, createTutorSession, AnthropicClient, AnthropicCollaborator } from 'stats-tutor';
 *
 * const { db } = openDatabase();
 * const session = createTutorSession(db, new AnthropicCollaborator(new AnthropicClient()));
 * const turn = await session.teach('What is a confidence interval?');
 * ```
 */

export * from './core/models';
export * from './core/errors';
export { generateId } from './core/ids';
export * from './core/scheduler';
export * from './core/dedup';
export * from './core/session';
export * from './storage';
export * from './llm';
export { config, parseConfig, validateConfig, ConfigValidationError, type Config } from './config';
