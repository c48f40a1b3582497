/**
 * Anthropic Backend - Text generation via the Claude Messages API
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Backend, BackendConfig, InvokeOptions } from '../types';
import { BackendError } from '../errors';
import { getLogger } from '../utils/logger';

export interface MessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface MessageReply {
  content: Array<{ type: string; text?: string }>;
}

/**
 * The slice of the SDK's `messages` resource the backend calls
 */
export interface MessageCreator {
  create(request: MessageRequest): Promise<MessageReply>;
}

export class AnthropicBackend implements Backend {
  private config: BackendConfig;
  private messages: MessageCreator;

  constructor(config: BackendConfig, messages?: MessageCreator) {
    this.config = config;

    this.messages =
      messages ??
      new Anthropic({
        apiKey: config.apiKey,
        timeout: config.timeoutMs,
        maxRetries: 0,
      }).messages;
  }

  async invoke(
    systemInstruction: string,
    userContent: string,
    options: InvokeOptions = {}
  ): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.messages.create({
        model: this.config.model,
        max_tokens:
          options.maxTokens ?? Math.max(this.config.maxTokens.insight, this.config.maxTokens.trait),
        temperature: this.config.temperature,
        system: systemInstruction,
        messages: [
          {
            role: 'user',
            content: userContent,
          },
        ],
      });

      const text = response.content
        .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : null))
        .filter((chunk): chunk is string => chunk !== null)
        .join('\n');

      getLogger().debug('Backend replied', {
        model: this.config.model,
        durationMs: Date.now() - startTime,
        replyLength: text.length,
      });

      return text;
    } catch (error) {
      throw this.handleApiError(error);
    }
  }

  /**
   * Convert SDK and transport errors into BackendError
   */
  private handleApiError(error: unknown): BackendError {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new BackendError('TIMEOUT', `Request timed out after ${this.config.timeoutMs}ms`);
    }

    if (error instanceof Anthropic.APIConnectionError) {
      return new BackendError('CONNECTION_ERROR', `Connection error: ${error.message}`);
    }

    if (error instanceof Anthropic.APIError) {
      const status = error.status;

      if (status === 429) {
        return new BackendError('RATE_LIMITED', 'Rate limit exceeded', status);
      }

      if (status === 529) {
        return new BackendError('API_OVERLOADED', 'API is temporarily overloaded', status);
      }

      if (status !== undefined && status >= 500) {
        return new BackendError('API_ERROR', `API error: ${error.message}`, status);
      }

      return new BackendError('API_ERROR', error.message, status);
    }

    if (error instanceof BackendError) {
      return error;
    }

    if (error instanceof Error) {
      return new BackendError('UNKNOWN_ERROR', error.message);
    }

    return new BackendError('UNKNOWN_ERROR', 'An unknown error occurred');
  }
}
