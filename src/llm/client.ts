/**
 * Anthropic Client Wrapper
 *
 * Thin abstraction over the Anthropic SDK. It handles:
 * - API key configuration with clear error messages
 * - Per-request system prompts, timeouts and abort signals
 * - Error handling with typed errors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient();
 * const response = await client.complete('What is a z-score?', { temperature: 0 });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { LLMMessage, LLMConfig, LLMResponse, RequestOptions } from './types';
import { config as appConfig, getAnthropicApiKey } from '../config';
import { LLMError, type LLMErrorType } from './types';

// Default temperature for response generation
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Wrapper class for the Anthropic API client.
 */
export class AnthropicClient {
  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: Required<LLMConfig>;

  /**
   * Creates a new AnthropicClient instance.
   *
   * @param config - Optional configuration to override the environment
   * @param apiKey - Defaults to ANTHROPIC_API_KEY
   * @throws LLMError if no API key is available
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({ maxTokens: 512, timeoutMs: 10000 });
   * ```
   */
  constructor(config: LLMConfig = {}, apiKey: string | undefined = getAnthropicApiKey()) {
    if (!apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Get your API key at: https://console.anthropic.com/\n' +
          'Then set it in .env or: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey });

    this.defaultConfig = {
      model: config.model ?? appConfig.anthropic.model,
      maxTokens: config.maxTokens ?? appConfig.anthropic.maxTokens,
      temperature: config.temperature ?? DEFAULT_TEMPERATURE,
      timeoutMs: config.timeoutMs ?? appConfig.anthropic.timeoutMs,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param messages - Either a single string (treated as user message) or an array of messages
   * @param config - Optional configuration to override defaults for this request
   * @param options - System prompt and abort signal for this request
   * @throws LLMError on API errors, timeouts and aborts
   *
   * @example
   * ```typescript
   * const controller = new AbortController();
   * const response = await client.complete(
   *   [
   *     { role: 'user', content: 'What is variance?' },
   *     { role: 'assistant', content: 'The average squared deviation...' },
   *     { role: 'user', content: 'And the standard deviation?' },
   *   ],
   *   {},
   *   { system: 'You are a statistics tutor.', signal: controller.signal }
   * );
   * ```
   */
  async complete(
    messages: string | LLMMessage[],
    config: LLMConfig = {},
    options: RequestOptions = {}
  ): Promise<LLMResponse> {
    const formattedMessages = this.formatMessages(this.normalizeMessages(messages));
    const mergedConfig = this.mergeConfig(config);

    try {
      const response = await this.client.messages.create(
        {
          model: mergedConfig.model,
          max_tokens: mergedConfig.maxTokens,
          temperature: mergedConfig.temperature,
          system: options.system,
          messages: formattedMessages,
        },
        { timeout: mergedConfig.timeoutMs, signal: options.signal }
      );

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Normalizes input to always return an array of messages.
   */
  private normalizeMessages(input: string | LLMMessage[]): LLMMessage[] {
    if (typeof input === 'string') {
      return [{ role: 'user', content: input }];
    }
    return input;
  }

  private formatMessages(messages: LLMMessage[]): Anthropic.Messages.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private mergeConfig(config: LLMConfig): Required<LLMConfig> {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
      timeoutMs: config.timeoutMs ?? this.defaultConfig.timeoutMs,
    };
  }

  /**
   * Concatenates the text blocks of a response.
   */
  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof APIUserAbortError) {
      return new LLMError('Request to Anthropic API was aborted.', 'aborted', error);
    }

    // Must check before APIConnectionError since it extends it
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError('Request to Anthropic API timed out. Please try again.', 'timeout', error);
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
