/**
 * Analysis - runs the insight and trait agents side by side and merges them
 */

import type {
  AnalysisInput,
  AnalysisResult,
  Backend,
  InsightPayload,
  NamedTask,
  TaskTokenBudgets,
  TraitPayload,
} from '../types';
import { AnalysisError } from '../errors';
import { getLogger } from '../utils/logger';
import { createInsightTask, createTraitTask, DEFAULT_TOKEN_BUDGETS } from './agents';
import { runTaskGraph } from './task-graph';

export interface AnalysisTaskSet {
  [role: string]: NamedTask<AnalysisInput, unknown>;
  insight: NamedTask<AnalysisInput, InsightPayload>;
  traits: NamedTask<AnalysisInput, TraitPayload>;
}

export interface Analyzer {
  analyze(subjectId: string, promptText: string, responseText: string): Promise<AnalysisResult>;
}

export function createAnalysisInput(
  subjectId: string,
  promptText: string,
  responseText: string
): AnalysisInput {
  return Object.freeze({ subjectId, promptText, responseText });
}

export function createAnalysisTasks(
  backend: Backend,
  budgets: TaskTokenBudgets = DEFAULT_TOKEN_BUDGETS
): AnalysisTaskSet {
  return {
    insight: createInsightTask(backend, budgets.insight),
    traits: createTraitTask(backend, budgets.trait),
  };
}

/**
 * Run one analysis over a prepared task set.
 * Rejects with {@link AnalysisError} carrying every agent failure.
 */
export async function runAnalysis(
  input: AnalysisInput,
  tasks: AnalysisTaskSet
): Promise<AnalysisResult> {
  const result = await runTaskGraph(input, tasks, ({ insight, traits }) => ({
    subjectId: input.subjectId,
    insight,
    traits: traits.traits,
  }));

  if (!result.ok) {
    getLogger().error('Analysis failed', {
      subjectId: input.subjectId,
      errors: result.error.failures.map((f) => f.message),
    });
    throw new AnalysisError(result.error);
  }

  getLogger().info('Analysis completed', {
    subjectId: input.subjectId,
    keywords: result.value.insight.keywords.length,
    traits: result.value.traits.length,
  });

  return result.value;
}

/**
 * Build the task set once and reuse it for every call
 */
export function createAnalyzer(
  backend: Backend,
  budgets: TaskTokenBudgets = DEFAULT_TOKEN_BUDGETS
): Analyzer {
  const tasks = createAnalysisTasks(backend, budgets);

  return {
    analyze(subjectId, promptText, responseText) {
      return runAnalysis(createAnalysisInput(subjectId, promptText, responseText), tasks);
    },
  };
}
