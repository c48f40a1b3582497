/**
 * Core modules export
 */

export { runTaskGraph } from './task-graph';
export type { TaskSet, PayloadsOf, MergeFn } from './task-graph';
export { AgentTask, createInsightTask, createTraitTask, INSIGHT_TASK, TRAIT_TASK } from './agents';
export { PromptBuilder } from './prompt-builder';
export { parseInsightReply, parseTraitReply, clampScore } from './reply-parser';
export {
  createAnalysisInput,
  createAnalysisTasks,
  createAnalyzer,
  runAnalysis,
} from './analysis';
export type { Analyzer, AnalysisTaskSet } from './analysis';
