/**
 * Error taxonomy for the analyzer
 */

import type { AggregateFailure, BackendErrorCode } from './types';

export class AnalyzerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The text-generation backend could not be reached or failed the request
 */
export class BackendError extends AnalyzerError {
  readonly code: BackendErrorCode;
  readonly status?: number;

  constructor(code: BackendErrorCode, message: string, status?: number) {
    super(message);
    this.code = code;
    this.status = status;
  }
}

/**
 * The backend answered, but the reply could not be read into the expected shape
 */
export class ReplyShapeError extends AnalyzerError {}

/**
 * Every task succeeded but a payload role the merge needs is missing
 */
export class IncompleteResultError extends AnalyzerError {
  readonly missingRoles: string[];

  constructor(missingRoles: string[]) {
    super(`Task graph produced no payload for: ${missingRoles.join(', ')}`);
    this.missingRoles = missingRoles;
  }
}

/**
 * One or more analysis tasks failed; carries every failure message
 */
export class AnalysisError extends AnalyzerError {
  readonly failure: AggregateFailure;

  constructor(failure: AggregateFailure) {
    super(`Agent errors: ${failure.failures.map((f) => f.message).join('; ')}`);
    this.failure = failure;
  }

  get messages(): string[] {
    return this.failure.failures.map((f) => f.message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
