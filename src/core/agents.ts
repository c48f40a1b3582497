/**
 * Analysis agents - tasks that ask the backend for one part of the analysis
 */

import type {
  AnalysisInput,
  Backend,
  InsightPayload,
  NamedTask,
  TaskOutcome,
  TaskTokenBudgets,
  TraitPayload,
} from '../types';
import { errorMessage } from '../errors';
import { getLogger } from '../utils/logger';
import {
  INSIGHT_REQUEST,
  INSIGHT_SYSTEM_PROMPT,
  PromptBuilder,
  TRAIT_REQUEST,
  TRAIT_SYSTEM_PROMPT,
} from './prompt-builder';
import { parseInsightReply, parseTraitReply } from './reply-parser';

export const INSIGHT_TASK = 'insight_agent';
export const TRAIT_TASK = 'trait_agent';

export const DEFAULT_TOKEN_BUDGETS: TaskTokenBudgets = {
  insight: 300,
  trait: 400,
};

interface AgentDefinition<T> {
  name: string;
  label: string;
  systemPrompt: string;
  request: string;
  maxTokens?: number;
  parse: (reply: string) => T;
}

/**
 * A task that sends one instruction to the backend and parses the reply.
 * Backend and parse errors both come back as the agent's own failure.
 */
export class AgentTask<T> implements NamedTask<AnalysisInput, T> {
  readonly name: string;
  private definition: AgentDefinition<T>;
  private backend: Backend;
  private promptBuilder: PromptBuilder;

  constructor(backend: Backend, definition: AgentDefinition<T>, promptBuilder = new PromptBuilder()) {
    this.name = definition.name;
    this.definition = definition;
    this.backend = backend;
    this.promptBuilder = promptBuilder;
  }

  async run(input: AnalysisInput): Promise<TaskOutcome<T>> {
    const { label, systemPrompt, request, maxTokens, parse } = this.definition;
    const userMessage = this.promptBuilder.buildUserMessage(input, request);

    getLogger().debug('Invoking backend', {
      task: this.name,
      subjectId: input.subjectId,
      estimatedInputTokens: this.promptBuilder.estimateTokens(systemPrompt + userMessage),
      maxTokens,
    });

    try {
      const reply = await this.backend.invoke(systemPrompt, userMessage, { maxTokens });
      return { success: true, payload: parse(reply) };
    } catch (error) {
      return { success: false, error: `${label} error: ${errorMessage(error)}` };
    }
  }
}

export function createInsightTask(
  backend: Backend,
  maxTokens: number = DEFAULT_TOKEN_BUDGETS.insight
): AgentTask<InsightPayload> {
  return new AgentTask(backend, {
    name: INSIGHT_TASK,
    label: 'InsightAgent',
    systemPrompt: INSIGHT_SYSTEM_PROMPT,
    request: INSIGHT_REQUEST,
    maxTokens,
    parse: parseInsightReply,
  });
}

export function createTraitTask(
  backend: Backend,
  maxTokens: number = DEFAULT_TOKEN_BUDGETS.trait
): AgentTask<TraitPayload> {
  return new AgentTask(backend, {
    name: TRAIT_TASK,
    label: 'TraitAgent',
    systemPrompt: TRAIT_SYSTEM_PROMPT,
    request: TRAIT_REQUEST,
    maxTokens,
    parse: parseTraitReply,
  });
}
