#!/usr/bin/env node
/**
 * Onboarding Analyzer - CLI
 *
 * Analyzes onboarding question/answer pairs with parallel insight and trait agents
 */

import { program } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { config as loadEnv } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import type { CLIOptions, Config } from './types';
import { loadConfig, validateConfig } from './config';
import { initLogger, getLogger } from './utils/logger';
import { AnthropicBackend } from './backend/anthropic';
import { createAnalyzer, type Analyzer } from './core/analysis';
import { errorMessage } from './errors';
import { parseOnboardingInput, toAnalysisOutput, type OnboardingInput } from './transport/schemas';
import { createAnalysisServer, listen } from './transport/server';

// Load environment variables
loadEnv();

const VERSION = '1.0.0';

type GlobalOptions = {
  config?: string;
  model?: string;
  verbose?: boolean;
};

function fail(message: string): never {
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Load configuration, initialize the logger and refuse to continue on config errors
 */
function prepare(options: CLIOptions): Config {
  let config: Config;
  try {
    config = loadConfig(options);
  } catch (error) {
    fail(`Configuration error - ${errorMessage(error)}`);
  }

  initLogger({
    level: config.logging.level,
    file: config.logging.file,
    console: config.logging.console,
  });

  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    fail(`Configuration error - ${configErrors.join('; ')}`);
  }

  return config;
}

function buildAnalyzer(config: Config): Analyzer {
  return createAnalyzer(new AnthropicBackend(config.backend), config.backend.maxTokens);
}

async function runAnalyze(file: string | undefined, globals: GlobalOptions): Promise<void> {
  const config = prepare({ ...globals, verbose: globals.verbose ?? false });

  let raw: string;
  if (file) {
    if (!existsSync(file)) {
      fail(`File not found: ${file}`);
    }
    raw = readFileSync(file, 'utf-8');
  } else {
    raw = await readStdin();
  }

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    fail(`Invalid JSON${file ? ' in file' : ' input'}: ${errorMessage(error)}`);
  }

  let input: OnboardingInput;
  try {
    input = parseOnboardingInput(body);
  } catch (error) {
    fail(errorMessage(error));
  }

  const spinner = ora(`Analyzing response for ${input.user_id}...`).start();
  try {
    const result = await buildAnalyzer(config).analyze(input.user_id, input.question, input.answer);
    const output = toAnalysisOutput(result);
    spinner.succeed('Analysis complete');
    console.log(JSON.stringify(output, null, 2));
  } catch (error) {
    spinner.fail('Analysis failed');
    fail(`Analysis failed: ${errorMessage(error)}`);
  }
}

async function runServe(
  serveOptions: { port?: string; host?: string },
  globals: GlobalOptions
): Promise<void> {
  const port = serveOptions.port === undefined ? undefined : parseInt(serveOptions.port, 10);
  if (port !== undefined && Number.isNaN(port)) {
    fail(`Invalid port: ${serveOptions.port}`);
  }

  const config = prepare({
    ...globals,
    host: serveOptions.host,
    port,
    verbose: globals.verbose ?? false,
  });
  const logger = getLogger();

  const server = createAnalysisServer(buildAnalyzer(config));
  const boundPort = await listen(server, config.server.port, config.server.host);

  console.log(chalk.bold.cyan(`\n${config.app.name} v${config.app.version}\n`));
  console.log(`Model:    ${config.backend.model}`);
  console.log(`Listening on http://${config.server.host}:${boundPort}`);
  console.log('');

  const shutdown = (signal: string) => {
    logger.info('Shutting down...', { signal });
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  program
    .name('onboarding-analyzer')
    .description('Analyze onboarding responses with parallel insight and trait agents')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to config file')
    .option('-m, --model <name>', 'Backend model to use')
    .option('-v, --verbose', 'Enable verbose logging', false);

  program
    .command('analyze')
    .description('Analyze a JSON request { user_id, question, answer } from a file or stdin')
    .argument('[file]', 'Path to request JSON (reads stdin when omitted)')
    .action(async (file: string | undefined) => {
      await runAnalyze(file, program.opts<GlobalOptions>());
    });

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <number>', 'Port to listen on')
    .option('-H, --host <host>', 'Host to bind')
    .action(async (serveOptions: { port?: string; host?: string }) => {
      await runServe(serveOptions, program.opts<GlobalOptions>());
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  getLogger().critical('Fatal error', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  console.error('Unhandled error:', error);
  process.exit(1);
});
