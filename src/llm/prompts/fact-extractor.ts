/**
 * Fact Extractor Prompt Builder
 *
 * After each learn-mode exchange the collaborator is asked which statistical
 * facts the exchange established. Each fact is labelled with a short
 * concept name that becomes its concept key, so a later statement about the
 * same concept lands on the same key and can be compared with it.
 */

import { z } from 'zod';
import { normalizeConceptKey } from '../../core/models';
import type { CandidateFact, Exchange } from '../types';
import { extractJson, sanitizeInput } from './shared';

const DELIMITERS = ['learner', 'tutor'] as const;

const extractionSchema = z.object({
  facts: z.array(
    z.object({
      concept: z.string(),
      content: z.string(),
    })
  ),
});

/**
 * Builds the extraction prompt for one exchange.
 *
 * @example
 * ```typescript
 * const prompt = buildFactExtractorPrompt({
 *   learnerText: 'What is the median?',
 *   tutorText: 'The median is the middle value of sorted data...',
 * });
 * ```
 */
export function buildFactExtractorPrompt(exchange: Exchange): string {
  const learner = sanitizeInput(exchange.learnerText, DELIMITERS);
  const tutor = sanitizeInput(exchange.tutorText, DELIMITERS);

  return `You maintain a learner's notes for a statistics course. Read one exchange between the learner and the tutor and list the statistical facts it establishes.

<learner>
${learner || '[empty]'}
</learner>

<tutor>
${tutor || '[empty]'}
</tutor>

## Rules

- Only include facts that are correct and that the tutor stated or confirmed.
- Write each fact as one or two self-contained sentences.
- Label each fact with the name of the single concept it is about, in lower case, e.g. "standard deviation", "p-value", "central limit theorem". Reuse the most common name of the concept.
- Skip greetings, questions, encouragement and worked arithmetic that does not state a general fact.
- If the exchange establishes no facts, return an empty list.

## Response Format

Respond with ONLY a JSON object:

\`\`\`json
{ "facts": [ { "concept": "string", "content": "string" } ] }
\`\`\``;
}

/**
 * Parses the extractor's reply. Facts with an empty concept or content are
 * dropped; concept labels are normalized to concept keys.
 *
 * @returns The candidate facts, or null when the reply is not in the
 *          expected shape
 */
export function parseFactExtractionResponse(response: string): CandidateFact[] | null {
  const result = extractionSchema.safeParse(extractJson(response));
  if (!result.success) {
    return null;
  }

  return result.data.facts
    .map((fact) => ({
      conceptKey: normalizeConceptKey(fact.concept),
      content: fact.content.trim(),
    }))
    .filter((fact) => fact.conceptKey.length > 0 && fact.content.length > 0);
}
