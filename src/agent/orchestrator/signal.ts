/**
 * Final Signal Normalization
 *
 * Validates synthesis output and applies the deterministic post-processing:
 * confidence clamped to [0, 1] and `confidence_low` below 0.4.
 */

import { z } from 'zod';

import { MalformedOutputError } from '../../core/errors.js';
import { extractJson } from '../../core/json.js';
import { EVENT_TYPES, type FinalSignal, type PreliminaryAnalysis } from '../../types/index.js';

export const LOW_CONFIDENCE_THRESHOLD = 0.4;

const lenientEnum = <T extends readonly [string, ...string[]]>(values: T) =>
  z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(values).optional().catch(undefined)
  );

const StringArray = z
  .union([z.array(z.unknown()), z.string(), z.null()])
  .optional()
  .transform((value): string[] => {
    if (value === null || value === undefined) return [];
    const items = typeof value === 'string' ? value.split(',') : value;
    return items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  });

const SynthesisOutputSchema = z.object({
  summary: z.string().default(''),
  event_type: lenientEnum(EVENT_TYPES),
  asset: z.string().optional(),
  asset_name: z.string().optional(),
  action: lenientEnum(['buy', 'sell', 'observe'] as const),
  direction: lenientEnum(['long', 'short', 'neutral'] as const),
  // Numeric strings are accepted; null, booleans and blank strings are not.
  confidence: z
    .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
    .refine(Number.isFinite, 'confidence must be a finite number'),
  strength: lenientEnum(['low', 'medium', 'high'] as const),
  timeframe: lenientEnum(['short', 'medium', 'long'] as const),
  risk_flags: StringArray,
  notes: z.string().default(''),
  links: StringArray,
});

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function defaultDirection(action: FinalSignal['action']): FinalSignal['direction'] {
  if (action === 'buy') return 'long';
  if (action === 'sell') return 'short';
  return 'neutral';
}

/**
 * Parse synthesis JSON text into a normalized signal.
 */
export function normalizeSignal(raw: string, preliminary: PreliminaryAnalysis): FinalSignal {
  const value = extractJson(raw);
  const parsed = SynthesisOutputSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedOutputError(
      `Synthesis output failed validation: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ')}`,
      raw
    );
  }

  const output = parsed.data;
  const confidence = clampConfidence(output.confidence);
  const riskFlags = Array.from(new Set(output.risk_flags));
  if (confidence < LOW_CONFIDENCE_THRESHOLD && !riskFlags.includes('confidence_low')) {
    riskFlags.push('confidence_low');
  }

  const action = output.action ?? 'observe';
  const asset = output.asset?.trim() || preliminary.asset;

  return {
    summary: output.summary,
    eventType: output.event_type ?? preliminary.eventType,
    asset,
    ...(output.asset_name ? { assetName: output.asset_name } : {}),
    action,
    direction: output.direction ?? defaultDirection(action),
    confidence,
    strength: output.strength ?? 'medium',
    timeframe: output.timeframe ?? 'short',
    riskFlags,
    notes: output.notes,
    links: Array.from(new Set(output.links)),
  };
}

/**
 * Snake-case JSON form for downstream consumers.
 */
export function signalToJson(signal: FinalSignal): Record<string, unknown> {
  return {
    summary: signal.summary,
    event_type: signal.eventType,
    asset: signal.asset,
    ...(signal.assetName ? { asset_name: signal.assetName } : {}),
    action: signal.action,
    direction: signal.direction,
    confidence: signal.confidence,
    strength: signal.strength,
    timeframe: signal.timeframe,
    risk_flags: signal.riskFlags,
    notes: signal.notes,
    links: signal.links,
  };
}
