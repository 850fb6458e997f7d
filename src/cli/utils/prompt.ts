/**
 * Line prompt for the interactive commands, over node:readline/promises.
 *
 * Closing the input (Ctrl+D) or pressing Ctrl+C closes the prompt and
 * signals `signal`, which the tutor session passes to in-flight
 * collaborator calls.
 */

import { createInterface } from 'node:readline/promises';

export interface LinePrompt {
  /** Resolves to the entered line, or null once the input is closed */
  ask(query: string): Promise<string | null>;
  close(): void;
  readonly signal: AbortSignal;
}

export function createLinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): LinePrompt {
  const rl = createInterface({ input, output });
  const controller = new AbortController();
  let closed = false;

  rl.on('close', () => {
    closed = true;
    controller.abort();
  });
  rl.on('SIGINT', () => rl.close());

  return {
    signal: controller.signal,

    async ask(query: string): Promise<string | null> {
      if (closed) {
        return null;
      }
      try {
        return await rl.question(query, { signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted) {
          return null;
        }
        throw error;
      }
    },

    close(): void {
      if (!closed) {
        rl.close();
      }
    },
  };
}
