/**
 * Tests for the Anthropic backend adapter
 */

import { describe, test, expect, beforeAll, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { AnthropicBackend, type MessageCreator, type MessageReply } from '../src/backend/anthropic';
import { BackendError } from '../src/errors';
import { initLogger } from '../src/utils/logger';
import type { BackendConfig } from '../src/types';

const config: BackendConfig = {
  model: 'test-model',
  temperature: 0.7,
  timeoutMs: 1000,
  maxTokens: { insight: 300, trait: 400 },
  apiKey: 'test-secret',
};

function fakeMessages(reply: MessageReply | Error) {
  const create = vi.fn(async () => {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });
  const messages: MessageCreator = { create };
  return { messages, create };
}

describe('AnthropicBackend', () => {
  beforeAll(() => {
    initLogger({ level: 'critical', console: false });
  });

  test('should send the instruction as the system prompt', async () => {
    const { messages, create } = fakeMessages({ content: [{ type: 'text', text: '{}' }] });
    const backend = new AnthropicBackend(config, messages);

    await backend.invoke('be brief', 'hello', { maxTokens: 123 });

    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 123,
      temperature: 0.7,
      system: 'be brief',
      messages: [{ role: 'user', content: 'hello' }],
    });
  });

  test('should default max tokens to the larger task budget', async () => {
    const { messages, create } = fakeMessages({ content: [{ type: 'text', text: '{}' }] });

    await new AnthropicBackend(config, messages).invoke('s', 'u');

    expect(create).toHaveBeenCalledWith(expect.objectContaining({ max_tokens: 400 }));
  });

  test('should join text blocks and skip other block types', async () => {
    const { messages } = fakeMessages({
      content: [
        { type: 'text', text: '{"summary":' },
        { type: 'tool_use' },
        { type: 'text', text: '"x"}' },
      ],
    });

    const reply = await new AnthropicBackend(config, messages).invoke('s', 'u');

    expect(reply).toBe('{"summary":\n"x"}');
  });

  test('should wrap unknown failures in BackendError', async () => {
    const { messages } = fakeMessages(new Error('socket hang up'));
    const backend = new AnthropicBackend(config, messages);

    const attempt = backend.invoke('s', 'u');

    await expect(attempt).rejects.toBeInstanceOf(BackendError);
    await expect(attempt).rejects.toMatchObject({ code: 'UNKNOWN_ERROR', message: 'socket hang up' });
  });

  test('should map a 429 to RATE_LIMITED', async () => {
    const { messages } = fakeMessages(new Anthropic.APIError(429, undefined, 'slow down', undefined));

    await expect(new AnthropicBackend(config, messages).invoke('s', 'u')).rejects.toMatchObject({
      code: 'RATE_LIMITED',
      status: 429,
      message: 'Rate limit exceeded',
    });
  });

  test('should map a 529 to API_OVERLOADED', async () => {
    const { messages } = fakeMessages(new Anthropic.APIError(529, undefined, 'overloaded', undefined));

    await expect(new AnthropicBackend(config, messages).invoke('s', 'u')).rejects.toMatchObject({
      code: 'API_OVERLOADED',
      status: 529,
      message: 'API is temporarily overloaded',
    });
  });

  test('should map other statuses to API_ERROR', async () => {
    const { messages } = fakeMessages(new Anthropic.APIError(400, undefined, 'bad request', undefined));

    await expect(new AnthropicBackend(config, messages).invoke('s', 'u')).rejects.toMatchObject({
      code: 'API_ERROR',
      status: 400,
    });
  });

  test('should prefix server-side failures with API error', async () => {
    const { messages } = fakeMessages(new Anthropic.APIError(500, undefined, 'boom', undefined));

    await expect(new AnthropicBackend(config, messages).invoke('s', 'u')).rejects.toMatchObject({
      code: 'API_ERROR',
      status: 500,
      message: expect.stringMatching(/^API error: /),
    });
  });

  test('should map a timeout to TIMEOUT', async () => {
    const { messages } = fakeMessages(new Anthropic.APIConnectionTimeoutError());

    await expect(new AnthropicBackend(config, messages).invoke('s', 'u')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Request timed out after 1000ms',
    });
  });

  test('should map a connection failure to CONNECTION_ERROR', async () => {
    const { messages } = fakeMessages(new Anthropic.APIConnectionError({ message: 'refused' }));

    await expect(new AnthropicBackend(config, messages).invoke('s', 'u')).rejects.toMatchObject({
      code: 'CONNECTION_ERROR',
      message: 'Connection error: refused',
    });
  });

  test('should pass BackendError through unchanged', async () => {
    const original = new BackendError('TIMEOUT', 'too slow');
    const { messages } = fakeMessages(original);

    await expect(new AnthropicBackend(config, messages).invoke('s', 'u')).rejects.toBe(original);
  });
});
