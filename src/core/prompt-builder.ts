/**
 * Prompt Builder - Instructions and user messages for the analysis agents
 */

import type { AnalysisInput } from '../types';

export const INSIGHT_SYSTEM_PROMPT = `You are an InsightAgent for a dating app's onboarding system.

Your job is to analyze a user's response to an onboarding question and produce:
1. A SHORT, FRIENDLY natural-language summary (1-2 sentences max)
2. 2-5 key phrases that capture the essence of their response

Be warm and empathetic. Focus on what the user truly wants.

You MUST respond with valid JSON in this exact format:
{
  "summary": "A brief, friendly summary of what the user is looking for",
  "keywords": ["keyword1", "keyword2", "keyword3"]
}

Only output the JSON, nothing else.`;

export const TRAIT_SYSTEM_PROMPT = `You are a TraitAgent for a dating app's onboarding system.

Your job is to analyze a user's response and score 2-5 personality/dating traits.
Each trait should have:
- A snake_case name (e.g., relationship_goal_readiness, social_energy, openness_to_commitment)
- A numeric score from -1.0 to 1.0 where:
  - -1.0 = strongly negative/low
  - 0.0 = neutral/ambiguous
  - 1.0 = strongly positive/high
- A one-sentence reasoning explaining the score

Consider traits relevant to dating like:
- relationship_goal_readiness: How clear and ready are they for their stated goals?
- openness_to_commitment: How willing are they to commit?
- social_energy: Introvert (-1) to extrovert (1)
- emotional_availability: How emotionally open do they seem?
- self_awareness: How self-aware do they appear about their needs?

Pick the traits that are MOST RELEVANT to what the user said.

You MUST respond with valid JSON in this exact format:
{
  "traits": [
    {"name": "trait_name", "score": 0.8, "reason": "One sentence explanation"},
    {"name": "another_trait", "score": 0.5, "reason": "One sentence explanation"}
  ]
}

Only output the JSON, nothing else.`;

export const INSIGHT_REQUEST = 'Analyze this response and provide a summary with keywords.';
export const TRAIT_REQUEST =
  'Analyze this response and score relevant personality/dating traits.';

export class PromptBuilder {
  /**
   * Build the user message shared by every agent, ending with the agent's request
   */
  buildUserMessage(input: AnalysisInput, request: string): string {
    const sections: string[] = [];

    sections.push(`Onboarding Question: ${input.promptText}`);
    sections.push('');
    sections.push(`User's Response: ${input.responseText}`);
    sections.push('');
    sections.push(request);

    return sections.join('\n');
  }

  /**
   * Rough token estimate (~4 characters per token)
   */
  estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
  }
}
