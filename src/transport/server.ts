/**
 * HTTP server - exposes the analyzer as a small JSON API
 *
 *   GET  /health   liveness probe
 *   POST /analyze  run one analysis for { user_id, question, answer }
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import type { Analyzer } from '../core/analysis';
import { AnalysisError, errorMessage } from '../errors';
import { getLogger } from '../utils/logger';
import {
  InputValidationError,
  OutputValidationError,
  parseOnboardingInput,
  toAnalysisOutput,
} from './schemas';

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface ServerOptions {
  maxBodyBytes?: number;
}

class PayloadTooLargeError extends Error {}

const ROUTE_METHODS = new Map<string, string>([
  ['/health', 'GET'],
  ['/analyze', 'POST'],
]);

function sendJson(
  res: ServerResponse,
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): void {
  res.writeHead(status, { ...headers, 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (tooLarge) {
        reject(new PayloadTooLargeError(`Request body exceeds ${maxBytes} bytes`));
        return;
      }
      resolve(Buffer.concat(chunks).toString('utf8'));
    });
    req.on('error', reject);
  });
}

async function handleAnalyze(
  analyzer: Analyzer,
  req: IncomingMessage,
  res: ServerResponse,
  maxBodyBytes: number
): Promise<void> {
  let raw: string;
  try {
    raw = await readBody(req, maxBodyBytes);
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      sendJson(res, 413, { detail: error.message });
      return;
    }
    throw error;
  }

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    sendJson(res, 422, {
      detail: 'Validation error',
      errors: [{ loc: ['body'], msg: `Invalid JSON: ${errorMessage(error)}` }],
    });
    return;
  }

  try {
    const input = parseOnboardingInput(body);
    const result = await analyzer.analyze(input.user_id, input.question, input.answer);
    sendJson(res, 200, toAnalysisOutput(result));
  } catch (error) {
    if (error instanceof InputValidationError) {
      sendJson(res, 422, { detail: 'Validation error', errors: error.issues });
    } else if (error instanceof AnalysisError || error instanceof OutputValidationError) {
      sendJson(res, 500, { detail: error.message });
    } else {
      sendJson(res, 500, { detail: `Analysis failed: ${errorMessage(error)}` });
    }
  }
}

async function route(
  analyzer: Analyzer,
  req: IncomingMessage,
  res: ServerResponse,
  maxBodyBytes: number
): Promise<void> {
  const path = new URL(req.url ?? '/', 'http://localhost').pathname;

  if (req.method === 'GET' && path === '/health') {
    sendJson(res, 200, { status: 'healthy' });
    return;
  }

  if (req.method === 'POST' && path === '/analyze') {
    await handleAnalyze(analyzer, req, res, maxBodyBytes);
    return;
  }

  const allowed = ROUTE_METHODS.get(path);
  if (allowed !== undefined) {
    sendJson(res, 405, { detail: 'Method Not Allowed' }, { allow: allowed });
    return;
  }

  sendJson(res, 404, { error: 'not_found' });
}

export function createAnalysisServer(analyzer: Analyzer, options: ServerOptions = {}): Server {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const logger = getLogger();

  return createServer((req, res) => {
    const startTime = Date.now();
    const method = req.method ?? 'GET';
    const path = req.url ?? '/';

    route(analyzer, req, res, maxBodyBytes).then(
      () => logger.request(method, path, res.statusCode, Date.now() - startTime),
      (error: unknown) => {
        logger.error('Request handler crashed', { method, path, error: errorMessage(error) });
        if (!res.headersSent) {
          sendJson(res, 500, { detail: 'Internal server error' });
        } else {
          res.end();
        }
        logger.request(method, path, res.statusCode, Date.now() - startTime);
      }
    );
  });
}

/**
 * Start listening and resolve with the bound port
 */
export function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}
