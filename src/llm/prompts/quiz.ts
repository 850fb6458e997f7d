/**
 * Quiz Prompt Builders
 *
 * Test mode asks the collaborator for a question that checks one stored
 * fact, then grades the learner's answer against that fact.
 *
 * Grading accepts paraphrases and judges the statistical substance of the
 * answer, not its wording. Replies are JSON; a reply that instead opens
 * with CORRECT or INCORRECT followed by an explanation is also accepted.
 */

import { z } from 'zod';
import type { Fact } from '../../core/models';
import type { GradeResult } from '../types';
import { extractJson, sanitizeInput } from './shared';

const DELIMITERS = ['fact', 'question', 'answer'] as const;

const questionSchema = z.object({ question: z.string().trim().min(1) });

const gradeSchema = z.object({
  correct: z.boolean(),
  feedback: z.string().optional(),
});

function conceptLabel(conceptKey: string): string {
  return conceptKey.replace(/_/g, ' ');
}

export function buildQuestionPrompt(fact: Fact): string {
  return `Write one quiz question that checks whether a learner remembers this statistics fact about "${conceptLabel(fact.conceptKey)}".

<fact>
${sanitizeInput(fact.content, DELIMITERS)}
</fact>

- Ask for the idea, not the exact wording.
- Do not reveal the answer in the question.
- One sentence; no multiple choice.

Respond with ONLY a JSON object: { "question": "string" }`;
}

/**
 * @returns The question text, or null when the reply holds no question
 */
export function parseQuestionResponse(response: string): string | null {
  const result = questionSchema.safeParse(extractJson(response));
  return result.success ? result.data.question : null;
}

export function buildGradingPrompt(fact: Fact, question: string, answer: string): string {
  return `Grade a learner's answer to a statistics quiz question.

<fact>
${sanitizeInput(fact.content, DELIMITERS)}
</fact>

<question>
${sanitizeInput(question, DELIMITERS)}
</question>

<answer>
${sanitizeInput(answer, DELIMITERS) || '[no answer]'}
</answer>

The answer is correct if it states the substance of the fact, in any wording. It is incorrect if it is wrong, missing the key point, or only restates the question.

Respond with ONLY a JSON object: { "correct": boolean, "feedback": "one or two sentences for the learner" }`;
}

/**
 * @returns The grade, or null when the reply can be read neither as JSON
 *          nor as a CORRECT/INCORRECT verdict
 */
export function parseGradingResponse(response: string): GradeResult | null {
  const result = gradeSchema.safeParse(extractJson(response));
  if (result.success) {
    return { correct: result.data.correct, feedback: result.data.feedback?.trim() ?? '' };
  }

  const verdict = response.trim().match(/^(CORRECT|INCORRECT)\b[\s:.-]*([\s\S]*)$/i);
  if (!verdict) {
    return null;
  }
  return { correct: verdict[1].toUpperCase() === 'CORRECT', feedback: verdict[2].trim() };
}
