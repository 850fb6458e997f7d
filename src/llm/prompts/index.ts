/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt builders and tolerant response parsers for the collaborator tasks:
 *
 * 1. **Tutoring**: conversational replies in learn mode.
 * 2. **Fact extraction**: statistical facts established by an exchange.
 * 3. **Fact comparison**: similarity and contradiction between two facts.
 * 4. **Quizzing**: question generation and answer grading in test mode.
 *
 * Parsers return null when a reply is unusable; the collaborator turns that
 * into a `CollaboratorError`.
 */

export { buildTutorSystemPrompt, buildTutorMessages, TUTOR_HISTORY_LIMIT } from './tutor';

export { buildFactExtractorPrompt, parseFactExtractionResponse } from './fact-extractor';

export {
  buildSimilarityPrompt,
  parseSimilarityResponse,
  buildContradictionPrompt,
  parseContradictionResponse,
} from './fact-comparison';

export {
  buildQuestionPrompt,
  parseQuestionResponse,
  buildGradingPrompt,
  parseGradingResponse,
} from './quiz';

export { extractJson, sanitizeInput, normalizeScore } from './shared';
