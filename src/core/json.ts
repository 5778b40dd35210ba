/**
 * JSON Extraction
 *
 * Reasoning backends wrap structured output in prose or markdown. Candidates
 * are tried in a fixed order and the first one that parses wins:
 *   1. a ```json fenced block
 *   2. any fenced block
 *   3. the first balanced top-level {...} span
 *   4. the raw trimmed text
 */

import { MalformedOutputError } from './errors.js';

const JSON_FENCE = /```json\s*([\s\S]*?)```/i;
const ANY_FENCE = /```[a-zA-Z0-9_-]*\s*([\s\S]*?)```/;

/**
 * Find the first balanced {...} span, skipping braces inside string literals.
 */
export function findBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return null;
}

export function jsonCandidates(raw: string): string[] {
  const candidates: string[] = [];
  const push = (value: string | null | undefined) => {
    const trimmed = value?.trim();
    if (trimmed && !candidates.includes(trimmed)) {
      candidates.push(trimmed);
    }
  };

  push(raw.match(JSON_FENCE)?.[1]);
  push(raw.match(ANY_FENCE)?.[1]);
  push(findBalancedObject(raw));
  push(raw);
  return candidates;
}

/**
 * Return the first candidate that parses as JSON, as text.
 */
export function extractJsonText(raw: string): string {
  for (const candidate of jsonCandidates(raw)) {
    try {
      JSON.parse(candidate);
      return candidate;
    } catch {
      // next candidate
    }
  }
  throw new MalformedOutputError('No parsable JSON found in backend output', raw);
}

export function extractJson(raw: string): unknown {
  return JSON.parse(extractJsonText(raw));
}
