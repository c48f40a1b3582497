/**
 * Onboarding Analyzer - library entry point
 */

export * from './types';
export * from './errors';
export {
  runTaskGraph,
  AgentTask,
  createInsightTask,
  createTraitTask,
  INSIGHT_TASK,
  TRAIT_TASK,
  PromptBuilder,
  parseInsightReply,
  parseTraitReply,
  clampScore,
  createAnalysisInput,
  createAnalysisTasks,
  createAnalyzer,
  runAnalysis,
} from './core';
export type { TaskSet, PayloadsOf, MergeFn, Analyzer, AnalysisTaskSet } from './core';
export { AnthropicBackend } from './backend';
export type { MessageCreator, MessageRequest, MessageReply } from './backend';
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './config';
export { initLogger, getLogger } from './utils';
export {
  OnboardingInputSchema,
  AnalysisOutputSchema,
  parseOnboardingInput,
  toAnalysisOutput,
  InputValidationError,
  OutputValidationError,
} from './transport/schemas';
export type { OnboardingInput, AnalysisOutput } from './transport/schemas';
export { createAnalysisServer, listen } from './transport/server';
