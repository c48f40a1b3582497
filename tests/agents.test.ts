/**
 * Tests for the insight and trait agents
 */

import { describe, test, expect, beforeAll } from 'vitest';
import { createInsightTask, createTraitTask, INSIGHT_TASK, TRAIT_TASK } from '../src/core/agents';
import { createAnalysisInput } from '../src/core/analysis';
import { INSIGHT_SYSTEM_PROMPT, TRAIT_SYSTEM_PROMPT } from '../src/core/prompt-builder';
import { initLogger } from '../src/utils/logger';
import { createStubBackend, failingBackend, INSIGHT_REPLY, TRAIT_REPLY } from './helpers';

const input = createAnalysisInput('u1', 'What are you looking for?', 'I want a serious relationship.');

const USER_MESSAGE_PREFIX =
  "Onboarding Question: What are you looking for?\n\nUser's Response: I want a serious relationship.\n\n";

describe('agents', () => {
  beforeAll(() => {
    initLogger({ level: 'critical', console: false });
  });

  describe('insight agent', () => {
    test('should be named insight_agent', () => {
      expect(createInsightTask(failingBackend()).name).toBe(INSIGHT_TASK);
      expect(INSIGHT_TASK).toBe('insight_agent');
    });

    test('should parse the backend reply into an insight payload', async () => {
      const { backend, invoke } = createStubBackend({ insight: INSIGHT_REPLY, trait: TRAIT_REPLY });

      const outcome = await createInsightTask(backend).run(input);

      expect(outcome).toEqual({
        success: true,
        payload: { summary: 'Wants commitment', keywords: ['serious', 'relationship'] },
      });
      expect(invoke).toHaveBeenCalledWith(
        INSIGHT_SYSTEM_PROMPT,
        USER_MESSAGE_PREFIX + 'Analyze this response and provide a summary with keywords.',
        { maxTokens: 300 }
      );
    });

    test('should pass its own token budget to the backend', async () => {
      const { backend, invoke } = createStubBackend({ insight: INSIGHT_REPLY, trait: TRAIT_REPLY });

      await createInsightTask(backend, 120).run(input);

      expect(invoke.mock.calls[0][2]).toEqual({ maxTokens: 120 });
    });

    test('should report a backend error as its own failure', async () => {
      const outcome = await createInsightTask(failingBackend()).run(input);

      expect(outcome).toEqual({
        success: false,
        error: 'InsightAgent error: Connection error: backend unreachable',
      });
    });

    test('should report an unparseable reply as its own failure', async () => {
      const { backend } = createStubBackend({ insight: 'I cannot help with that.', trait: TRAIT_REPLY });

      const outcome = await createInsightTask(backend).run(input);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error).toMatch(/^InsightAgent error: Reply is not valid JSON: /);
      }
    });
  });

  describe('trait agent', () => {
    test('should be named trait_agent', () => {
      expect(createTraitTask(failingBackend()).name).toBe(TRAIT_TASK);
      expect(TRAIT_TASK).toBe('trait_agent');
    });

    test('should parse traits with the trait instruction', async () => {
      const { backend, invoke } = createStubBackend({ insight: INSIGHT_REPLY, trait: TRAIT_REPLY });

      const outcome = await createTraitTask(backend).run(input);

      expect(outcome).toEqual({
        success: true,
        payload: {
          traits: [
            { name: 'relationship_goal_readiness', score: 0.9, reason: 'States a clear goal' },
            { name: 'openness_to_commitment', score: 0.8, reason: 'Uses the word serious' },
          ],
        },
      });
      expect(invoke).toHaveBeenCalledWith(
        TRAIT_SYSTEM_PROMPT,
        USER_MESSAGE_PREFIX + 'Analyze this response and score relevant personality/dating traits.',
        { maxTokens: 400 }
      );
    });

    test('should clamp scores and keep the first five traits', async () => {
      const traits = Array.from({ length: 8 }, (_, i) => ({
        name: `trait_${i}`,
        score: i % 2 === 0 ? 3 : -3,
        reason: `reason ${i}`,
      }));
      const { backend } = createStubBackend({ insight: INSIGHT_REPLY, trait: JSON.stringify({ traits }) });

      const outcome = await createTraitTask(backend).run(input);

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.payload.traits.map((t) => t.name)).toEqual([
          'trait_0',
          'trait_1',
          'trait_2',
          'trait_3',
          'trait_4',
        ]);
        expect(outcome.payload.traits.map((t) => t.score)).toEqual([1, -1, 1, -1, 1]);
      }
    });

    test('should report a backend error as its own failure', async () => {
      const outcome = await createTraitTask(failingBackend()).run(input);

      expect(outcome).toEqual({
        success: false,
        error: 'TraitAgent error: Connection error: backend unreachable',
      });
    });

    test('should not mutate the shared input', async () => {
      const { backend } = createStubBackend({ insight: INSIGHT_REPLY, trait: TRAIT_REPLY });

      await createTraitTask(backend).run(input);

      expect(Object.isFrozen(input)).toBe(true);
      expect(input).toEqual({
        subjectId: 'u1',
        promptText: 'What are you looking for?',
        responseText: 'I want a serious relationship.',
      });
    });
  });
});
