/**
 * Fact Comparison Prompt Builders
 *
 * Two narrow judgements the dedup engine asks for when a candidate fact
 * meets an existing fact for the same concept: how similar the statements
 * are, and whether the candidate contradicts the existing one.
 */

import { z } from 'zod';
import { extractJson, normalizeScore, sanitizeInput } from './shared';

const DELIMITERS = ['existing', 'candidate'] as const;

const similaritySchema = z.object({ similarity: z.unknown() });
const contradictionSchema = z.object({ contradicts: z.boolean() });

function statements(existing: string, candidate: string): string {
  return `<existing>
${sanitizeInput(existing, DELIMITERS)}
</existing>

<candidate>
${sanitizeInput(candidate, DELIMITERS)}
</candidate>`;
}

export function buildSimilarityPrompt(existing: string, candidate: string): string {
  return `Rate how similar in meaning these two statements about statistics are.

${statements(existing, candidate)}

- 1.0: they say the same thing, possibly in different words
- 0.7-0.9: mostly the same claim, one adds or changes a detail
- 0.4-0.6: same concept, different aspects of it
- 0.0-0.3: different claims

Respond with ONLY a JSON object: { "similarity": number }`;
}

/**
 * @returns A score in [0, 1], or null when the reply holds no usable score
 */
export function parseSimilarityResponse(response: string): number | null {
  const result = similaritySchema.safeParse(extractJson(response));
  if (!result.success) {
    return null;
  }
  return normalizeScore(result.data.similarity);
}

export function buildContradictionPrompt(existing: string, candidate: string): string {
  return `Decide whether the candidate statement contradicts the existing statement.

${statements(existing, candidate)}

A contradiction means both cannot be true at once: a changed definition, value, formula, condition or conclusion. A statement that only adds detail or rephrases is not a contradiction.

Respond with ONLY a JSON object: { "contradicts": boolean }`;
}

/**
 * @returns The verdict, or null when the reply holds no boolean verdict
 */
export function parseContradictionResponse(response: string): boolean | null {
  const result = contradictionSchema.safeParse(extractJson(response));
  return result.success ? result.data.contradicts : null;
}
