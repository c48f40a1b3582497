/**
 * Tests for PromptBuilder
 */

import { describe, test, expect } from 'vitest';
import {
  INSIGHT_REQUEST,
  INSIGHT_SYSTEM_PROMPT,
  PromptBuilder,
  TRAIT_SYSTEM_PROMPT,
} from '../src/core/prompt-builder';
import { createAnalysisInput } from '../src/core/analysis';

describe('PromptBuilder', () => {
  describe('buildUserMessage', () => {
    test('should lay out question, response and request', () => {
      const builder = new PromptBuilder();
      const input = createAnalysisInput('u1', 'What are you looking for?', 'Something serious.');

      const message = builder.buildUserMessage(input, INSIGHT_REQUEST);

      expect(message).toBe(
        [
          'Onboarding Question: What are you looking for?',
          '',
          "User's Response: Something serious.",
          '',
          'Analyze this response and provide a summary with keywords.',
        ].join('\n')
      );
    });

    test('should not include the subject id', () => {
      const builder = new PromptBuilder();
      const input = createAnalysisInput('subject-42', 'Q', 'A');

      expect(builder.buildUserMessage(input, 'Go.')).toBe(
        "Onboarding Question: Q\n\nUser's Response: A\n\nGo."
      );
    });
  });

  describe('system prompts', () => {
    test('should ask the insight agent for summary and keywords as JSON', () => {
      expect(INSIGHT_SYSTEM_PROMPT).toContain('"summary"');
      expect(INSIGHT_SYSTEM_PROMPT).toContain('"keywords"');
      expect(INSIGHT_SYSTEM_PROMPT).toContain('2-5 key phrases');
    });

    test('should ask the trait agent for bounded scores', () => {
      expect(TRAIT_SYSTEM_PROMPT).toContain('"traits"');
      expect(TRAIT_SYSTEM_PROMPT).toContain('score from -1.0 to 1.0');
      expect(TRAIT_SYSTEM_PROMPT).toContain('2-5 personality/dating traits');
    });
  });

  describe('estimateTokens', () => {
    test('should estimate about four characters per token', () => {
      const builder = new PromptBuilder();
      expect(builder.estimateTokens('')).toBe(0);
      expect(builder.estimateTokens('abcd')).toBe(1);
      expect(builder.estimateTokens('abcde')).toBe(2);
    });
  });
});
