/**
 * Request and response schemas shared by the HTTP server and the CLI
 */

import { z } from 'zod';
import type { AnalysisResult } from '../types';
import { AnalyzerError } from '../errors';

export const OnboardingInputSchema = z.object({
  user_id: z.string().min(1),
  question: z.string().min(1),
  answer: z.string().min(1),
});

export type OnboardingInput = z.infer<typeof OnboardingInputSchema>;

export const TraitSchema = z.object({
  name: z.string(),
  score: z.number().min(-1).max(1),
  reason: z.string(),
});

export const InsightSchema = z.object({
  summary: z.string(),
  keywords: z.array(z.string()).min(2).max(5),
});

export const AnalysisOutputSchema = z.object({
  user_id: z.string(),
  insight: InsightSchema,
  traits: z.array(TraitSchema).min(2).max(5),
});

export type AnalysisOutput = z.infer<typeof AnalysisOutputSchema>;

export interface ValidationIssue {
  loc: string[];
  msg: string;
}

export class InputValidationError extends AnalyzerError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.issues = issues;
  }
}

export class OutputValidationError extends AnalyzerError {}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: issue.path.map(String),
    msg: issue.message,
  }));
}

/**
 * Validate a decoded request body
 */
export function parseOnboardingInput(body: unknown): OnboardingInput {
  const result = OnboardingInputSchema.safeParse(body);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new InputValidationError(
      `Invalid input: ${issues.map((i) => `${i.loc.join('.') || '(root)'}: ${i.msg}`).join('; ')}`,
      issues
    );
  }
  return result.data;
}

/**
 * Serialize and validate a merged analysis before it leaves the process
 */
export function toAnalysisOutput(result: AnalysisResult): AnalysisOutput {
  const output = {
    user_id: result.subjectId,
    insight: {
      summary: result.insight.summary,
      keywords: [...result.insight.keywords],
    },
    traits: result.traits.map((trait) => ({
      name: trait.name,
      score: trait.score,
      reason: trait.reason,
    })),
  };

  const checked = AnalysisOutputSchema.safeParse(output);
  if (!checked.success) {
    const detail = toIssues(checked.error)
      .map((i) => `${i.loc.join('.')}: ${i.msg}`)
      .join('; ');
    throw new OutputValidationError(`Analysis output failed validation: ${detail}`);
  }
  return checked.data;
}
