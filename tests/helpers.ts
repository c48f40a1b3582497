/**
 * In-process backend stand-ins for tests
 */

import { vi } from 'vitest';
import { INSIGHT_SYSTEM_PROMPT, TRAIT_SYSTEM_PROMPT } from '../src/core/prompt-builder';
import { BackendError } from '../src/errors';
import type { Backend, InvokeOptions } from '../src/types';

export type StubReply = string | Error;

export const INSIGHT_REPLY = '{"summary":"Wants commitment","keywords":["serious","relationship"]}';

export const TRAIT_REPLY =
  '{"traits":[{"name":"relationship_goal_readiness","score":0.9,"reason":"States a clear goal"},' +
  '{"name":"openness_to_commitment","score":0.8,"reason":"Uses the word serious"}]}';

/**
 * A backend that answers each agent by its system prompt
 */
export function createStubBackend(replies: { insight: StubReply; trait: StubReply }) {
  const invoke = vi.fn(
    async (systemInstruction: string, _userContent: string, _options?: InvokeOptions) => {
      const reply =
        systemInstruction === INSIGHT_SYSTEM_PROMPT
          ? replies.insight
          : systemInstruction === TRAIT_SYSTEM_PROMPT
            ? replies.trait
            : new Error('unexpected system prompt');
      if (reply instanceof Error) {
        throw reply;
      }
      return reply;
    }
  );

  const backend: Backend = { invoke };
  return { backend, invoke };
}

export function failingBackend(): Backend {
  return {
    invoke: async () => {
      throw new BackendError('CONNECTION_ERROR', 'Connection error: backend unreachable');
    },
  };
}
