/**
 * Reply Parser - Reads backend replies into typed payloads
 */

import { z } from 'zod';
import type { InsightPayload, Trait, TraitPayload } from '../types';
import { ReplyShapeError } from '../errors';

export const MAX_KEYWORDS = 5;
export const MAX_TRAITS = 5;
export const UNKNOWN_TRAIT = 'unknown_trait';

const InsightReplySchema = z.object({
  summary: z.string().default(''),
  keywords: z.array(z.unknown()).default([]),
});

const KeywordsSchema = z.array(z.string());

const TraitReplySchema = z.object({
  traits: z.array(z.unknown()).default([]),
});

const ScoreSchema = z.preprocess((value) => {
  if (value === undefined) return 0;
  if (typeof value === 'string') return value.trim() === '' ? Number.NaN : Number(value);
  return value;
}, z.number());

const TraitItemSchema = z.object({
  name: z.string().default(UNKNOWN_TRAIT),
  score: ScoreSchema,
  reason: z.string().default(''),
});

export function clampScore(score: number): number {
  return Math.max(-1, Math.min(1, score));
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ReplyShapeError(`Reply does not match expected shape: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * End index of the object opened at `start`, skipping braces inside strings
 */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * First balanced `{...}` in the text that parses as JSON
 */
function firstJsonObject(text: string): string | undefined {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = matchingBrace(text, start);
    if (end === -1) {
      return undefined;
    }
    const candidate = text.slice(start, end + 1);
    if (isJson(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Locate the JSON text in a reply: the whole reply when it already parses,
 * then a fenced block, then the first object embedded in prose
 */
export function extractJsonText(reply: string): string {
  const trimmed = reply.trim();
  if (isJson(trimmed)) {
    return trimmed;
  }

  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(trimmed);
  const fencedText = fenced ? fenced[1].trim() : undefined;
  if (fencedText !== undefined && isJson(fencedText)) {
    return fencedText;
  }

  return firstJsonObject(trimmed) ?? fencedText ?? trimmed;
}

/**
 * Parse a reply into a plain JSON object
 */
export function parseReplyObject(reply: string): Record<string, unknown> {
  const text = extractJsonText(reply);
  if (text.length === 0) {
    throw new ReplyShapeError('Reply is empty');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReplyShapeError(`Reply is not valid JSON: ${detail}`);
  }

  return parseWith(z.record(z.unknown()), parsed);
}

export function parseInsightReply(reply: string): InsightPayload {
  const raw = parseWith(InsightReplySchema, parseReplyObject(reply));
  const keywords = parseWith(KeywordsSchema, raw.keywords.slice(0, MAX_KEYWORDS));

  return { summary: raw.summary, keywords };
}

/**
 * Traits are truncated before validation, so an over-long list only has its
 * first entries checked. Scores are clamped into [-1, 1].
 */
export function parseTraitReply(reply: string): TraitPayload {
  const raw = parseWith(TraitReplySchema, parseReplyObject(reply));

  const traits: Trait[] = raw.traits.slice(0, MAX_TRAITS).map((item, index) => {
    const result = TraitItemSchema.safeParse(item);
    if (!result.success) {
      throw new ReplyShapeError(`Trait ${index} is malformed: ${formatIssues(result.error)}`);
    }
    return {
      name: result.data.name,
      score: clampScore(result.data.score),
      reason: result.data.reason,
    };
  });

  return { traits };
}
