/**
 * Statistics Tutor Prompt Builder
 *
 * Builds the system prompt and message list for the tutor's conversational
 * replies in learn mode. The tutor explains statistical concepts, works
 * through examples and checks understanding with a short follow-up
 * question, one concept at a time.
 */

import type { Interaction } from '../../core/models';
import type { LLMMessage } from '../types';

/**
 * Number of past interactions replayed as conversation context.
 */
export const TUTOR_HISTORY_LIMIT = 12;

export function buildTutorSystemPrompt(): string {
  return `You are a patient statistics tutor working one-on-one with a learner.

## How to teach

- Explain one concept at a time in plain language, then make it concrete with a small numeric example.
- Use correct terminology and define each term the first time you use it.
- When the learner states something incorrect, say so directly and give the correct statement.
- Build on what the learner already said earlier in the conversation.
- End with one short question that checks the learner understood the main point.

## Style

- Keep replies under 200 words unless the learner asks for more depth.
- Write formulas inline in plain text, for example: sd = sqrt(variance).
- Do not use headings or tables.`;
}

/**
 * Converts the interaction log plus the new learner message into the
 * alternating user/assistant list the Messages API expects.
 *
 * Consecutive entries from the same side are merged and a leading tutor
 * message is dropped, since a conversation must open with the user.
 */
export function buildTutorMessages(history: readonly Interaction[], learnerText: string): LLMMessage[] {
  const messages: LLMMessage[] = [];

  const turns: Array<{ role: LLMMessage['role']; text: string }> = [
    ...history.map((interaction) => ({
      role: interaction.role === 'learner' ? ('user' as const) : ('assistant' as const),
      text: interaction.text,
    })),
    { role: 'user', text: learnerText },
  ];

  for (const turn of turns) {
    if (messages.length === 0 && turn.role === 'assistant') {
      continue;
    }
    const last = messages[messages.length - 1];
    if (last && last.role === turn.role) {
      last.content = `${last.content}\n\n${turn.text}`;
    } else {
      messages.push({ role: turn.role, content: turn.text });
    }
  }

  return messages;
}
