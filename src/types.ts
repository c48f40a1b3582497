/**
 * Core types and interfaces for the Onboarding Analyzer
 */

// ============================================================================
// Analysis Types
// ============================================================================

export interface AnalysisInput {
  readonly subjectId: string;
  readonly promptText: string;
  readonly responseText: string;
}

export interface InsightPayload {
  readonly summary: string;
  readonly keywords: readonly string[];
}

export interface Trait {
  readonly name: string;
  readonly score: number;
  readonly reason: string;
}

export interface TraitPayload {
  readonly traits: readonly Trait[];
}

export interface AnalysisResult {
  readonly subjectId: string;
  readonly insight: InsightPayload;
  readonly traits: readonly Trait[];
}

// ============================================================================
// Task Graph Types
// ============================================================================

export type TaskOutcome<T> =
  | { readonly success: true; readonly payload: T }
  | { readonly success: false; readonly error: string };

export interface NamedTask<I, T> {
  readonly name: string;
  run(input: I): Promise<TaskOutcome<T>>;
}

export interface TaskFailure {
  task: string;
  message: string;
}

export interface AggregateFailure {
  failures: TaskFailure[];
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// ============================================================================
// Backend Types
// ============================================================================

export interface InvokeOptions {
  maxTokens?: number;
}

export interface Backend {
  invoke(systemInstruction: string, userContent: string, options?: InvokeOptions): Promise<string>;
}

export type BackendErrorCode =
  | 'RATE_LIMITED'
  | 'API_OVERLOADED'
  | 'API_ERROR'
  | 'TIMEOUT'
  | 'CONNECTION_ERROR'
  | 'UNKNOWN_ERROR';

// ============================================================================
// Configuration Types
// ============================================================================

export interface Config {
  app: AppConfig;
  backend: BackendConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}

export interface AppConfig {
  name: string;
  version: string;
}

export interface BackendConfig {
  model: string;
  temperature: number;
  timeoutMs: number;
  maxTokens: TaskTokenBudgets;
  apiKey?: string;
}

export interface TaskTokenBudgets {
  insight: number;
  trait: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  config?: string;
  model?: string;
  host?: string;
  port?: number;
  verbose: boolean;
}
