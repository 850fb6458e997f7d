/**
 * Test doubles for the LLM collaborator.
 *
 * `FakeCollaborator` answers every task from configurable functions and can
 * be told to fail individual tasks. `ScriptedCompletionClient` replays
 * canned model replies to exercise the prompt parsers end to end.
 */

import { CollaboratorError } from '../src/core/errors';
import type { Fact, Interaction } from '../src/core/models';
import {
  LLMError,
  type CandidateFact,
  type CollaboratorTask,
  type Exchange,
  type GradeResult,
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
  type RequestOptions,
  type TutorCollaborator,
} from '../src/llm/types';
import type { CompletionClient } from '../src/llm/collaborator';

export class FakeCollaborator implements TutorCollaborator {
  reply = 'Let us look at that together.';
  extracted: CandidateFact[] = [];
  similarity: (existing: string, candidate: string) => number = () => 0;
  contradicts: (existing: string, candidate: string) => boolean = () => false;
  question: (fact: Fact) => string = (fact) => `What do you remember about ${fact.conceptKey}?`;
  grade: (fact: Fact, question: string, answer: string) => GradeResult = (fact, _question, answer) => ({
    correct: answer === fact.content,
    feedback: answer === fact.content ? 'Well done.' : `Expected: ${fact.content}`,
  });

  /** Tasks that reject with CollaboratorError */
  readonly failing = new Set<CollaboratorTask>();

  readonly calls: Record<CollaboratorTask, number> = {
    respond: 0,
    extract: 0,
    similarity: 0,
    contradiction: 0,
    generate_question: 0,
    grade: 0,
  };

  /** History passed to the most recent `respond` call */
  lastHistory: readonly Interaction[] = [];

  async respond(history: readonly Interaction[], _learnerText: string): Promise<string> {
    this.enter('respond');
    this.lastHistory = history;
    return this.reply;
  }

  async extractFacts(_exchange: Exchange): Promise<CandidateFact[]> {
    this.enter('extract');
    return this.extracted;
  }

  async scoreSimilarity(existing: string, candidate: string): Promise<number> {
    this.enter('similarity');
    return this.similarity(existing, candidate);
  }

  async detectContradiction(existing: string, candidate: string): Promise<boolean> {
    this.enter('contradiction');
    return this.contradicts(existing, candidate);
  }

  async generateQuestion(fact: Fact): Promise<string> {
    this.enter('generate_question');
    return this.question(fact);
  }

  async gradeAnswer(fact: Fact, question: string, answer: string): Promise<GradeResult> {
    this.enter('grade');
    return this.grade(fact, question, answer);
  }

  private enter(task: CollaboratorTask): void {
    this.calls[task] += 1;
    if (this.failing.has(task)) {
      throw new CollaboratorError(task, 'simulated outage');
    }
  }
}

/**
 * Completion client that returns queued replies in order and records every
 * request. An `LLMError` in the queue is thrown instead of returned.
 */
export class ScriptedCompletionClient implements CompletionClient {
  readonly requests: Array<{ messages: string | LLMMessage[]; config?: LLMConfig; options?: RequestOptions }> = [];

  constructor(private readonly replies: Array<string | LLMError>) {}

  async complete(
    messages: string | LLMMessage[],
    config?: LLMConfig,
    options?: RequestOptions
  ): Promise<LLMResponse> {
    this.requests.push({ messages, config, options });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new LLMError('No scripted reply left', 'unknown');
    }
    if (next instanceof LLMError) {
      throw next;
    }
    return { text: next, usage: null, stopReason: 'end_turn' };
  }
}
