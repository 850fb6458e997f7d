/**
 * Session Module - Barrel Export
 */

export { TutorSession } from './tutor-session';
export { createTutorSession } from './factory';
export type {
  AnswerResult,
  FactChange,
  QuestionResult,
  SessionEvent,
  SessionEventListener,
  SessionEventType,
  TeachResult,
  TurnResult,
  TutorSessionConfig,
  TutorSessionDependencies,
} from './types';
