/**
 * Configuration management for the Onboarding Analyzer
 */

import { parse as parseYaml } from 'yaml';
import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { Config, CLIOptions } from './types';
import { isLogLevel } from './utils/logger';

/**
 * Convert snake_case keys to camelCase recursively
 */
function snakeToCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(snakeToCamel);
  }
  if (obj !== null && typeof obj === 'object') {
    return Object.fromEntries(
      Object.entries(obj).map(([key, value]) => {
        const camelKey = key.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
        return [camelKey, snakeToCamel(value)];
      })
    );
  }
  return obj;
}

const DEFAULT_CONFIG: Config = {
  app: {
    name: 'Onboarding Analysis',
    version: '1.0.0',
  },
  backend: {
    model: 'claude-3-5-haiku-latest',
    temperature: 0.7,
    timeoutMs: 60000,
    maxTokens: {
      insight: 300,
      trait: 400,
    },
    apiKey: undefined,
  },
  server: {
    host: '0.0.0.0',
    port: 8000,
  },
  logging: {
    level: 'info',
    file: undefined,
    console: true,
  },
};

const ConfigFileSchema = z
  .object({
    app: z.object({ name: z.string(), version: z.string() }).partial().strict(),
    backend: z
      .object({
        model: z.string(),
        temperature: z.number(),
        timeoutMs: z.number().int(),
        maxTokens: z.object({ insight: z.number().int(), trait: z.number().int() }).partial().strict(),
        apiKey: z.string(),
      })
      .partial()
      .strict(),
    server: z.object({ host: z.string(), port: z.number().int() }).partial().strict(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'critical']),
        file: z.string(),
        console: z.boolean(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

/**
 * Layer overrides onto a complete config, section by section
 */
function mergeConfig(target: Config, source: ConfigOverrides): Config {
  return {
    app: { ...target.app, ...source.app },
    backend: {
      ...target.backend,
      ...source.backend,
      maxTokens: { ...target.backend.maxTokens, ...source.backend?.maxTokens },
    },
    server: { ...target.server, ...source.server },
    logging: { ...target.logging, ...source.logging },
  };
}

/**
 * Load configuration from YAML file
 */
function loadConfigFile(path: string): ConfigOverrides {
  if (!existsSync(path)) {
    return {};
  }

  const content = readFileSync(path, 'utf-8');
  const parsed: unknown = parseYaml(content);
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(snakeToCamel(parsed));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${path}: ${issues}`);
  }
  return result.data;
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(): ConfigOverrides {
  const backend: NonNullable<ConfigOverrides['backend']> = {};
  const server: NonNullable<ConfigOverrides['server']> = {};
  const logging: NonNullable<ConfigOverrides['logging']> = {};

  // Backend configuration
  if (process.env.ANTHROPIC_API_KEY) {
    backend.apiKey = process.env.ANTHROPIC_API_KEY;
  }
  if (process.env.ANALYZER_MODEL) {
    backend.model = process.env.ANALYZER_MODEL;
  }
  const timeoutMs = parseInteger(process.env.ANALYZER_TIMEOUT_MS);
  if (timeoutMs !== undefined) {
    backend.timeoutMs = timeoutMs;
  }

  // Server configuration
  if (process.env.HOST) {
    server.host = process.env.HOST;
  }
  const port = parseInteger(process.env.PORT);
  if (port !== undefined) {
    server.port = port;
  }

  // Logging configuration
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    logging.level = level;
  }
  if (process.env.LOG_FILE) {
    logging.file = process.env.LOG_FILE;
  }

  return { backend, server, logging };
}

/**
 * Load and merge configuration from all sources
 * Priority (highest to lowest): CLI options > Environment > Config file > Defaults
 */
export function loadConfig(options: CLIOptions): Config {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const configPath = options.config || 'config/default.yaml';
  config = mergeConfig(config, loadConfigFile(configPath));

  config = mergeConfig(config, loadEnvConfig());

  // Merge CLI options
  if (options.model) {
    config.backend.model = options.model;
  }
  if (options.host) {
    config.server.host = options.host;
  }
  if (options.port !== undefined) {
    config.server.port = options.port;
  }
  if (options.verbose) {
    config.logging.level = 'debug';
  }

  return config;
}

/**
 * Validate configuration and return any errors
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.backend.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  if (config.backend.temperature < 0 || config.backend.temperature > 1) {
    errors.push('temperature must be between 0 and 1');
  }

  if (config.backend.timeoutMs < 1) {
    errors.push('timeoutMs must be at least 1');
  }

  if (config.backend.maxTokens.insight < 1 || config.backend.maxTokens.trait < 1) {
    errors.push('maxTokens budgets must be at least 1');
  }

  if (config.server.port < 0 || config.server.port > 65535) {
    errors.push('port must be between 0 and 65535');
  }

  return errors;
}

export { DEFAULT_CONFIG };
