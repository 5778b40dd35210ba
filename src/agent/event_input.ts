/**
 * Event file parsing for the CLI and other callers that receive events as
 * JSON. Accepts camelCase or snake_case keys.
 */

import { z } from 'zod';

import { EVENT_TYPES, type EventPayload, type PreliminaryAnalysis } from '../types/index.js';

const Keywords = z
  .union([z.array(z.string()), z.string()])
  .optional()
  .transform((value): string[] => {
    if (value === undefined) return [];
    const items = typeof value === 'string' ? value.split(',') : value;
    return items.map((item) => item.trim()).filter((item) => item.length > 0);
  });

const PayloadSchema = z
  .object({
    text: z.string().min(1),
    translatedText: z.string().optional(),
    translated_text: z.string().optional(),
    source: z.string().default('unknown'),
    keywordsHit: Keywords,
    keywords_hit: Keywords,
    language: z.string().default('unknown'),
    timestamp: z.string().optional(),
  })
  .transform((raw): EventPayload => {
    const translatedText = raw.translatedText ?? raw.translated_text;
    return {
      text: raw.text,
      ...(translatedText ? { translatedText } : {}),
      source: raw.source,
      keywordsHit: raw.keywordsHit.length > 0 ? raw.keywordsHit : raw.keywords_hit,
      language: raw.language,
      ...(raw.timestamp ? { timestamp: raw.timestamp } : {}),
    };
  });

const PreliminarySchema = z
  .object({
    eventType: z.enum(EVENT_TYPES).optional(),
    event_type: z.enum(EVENT_TYPES).optional(),
    asset: z.string().default('NONE'),
    action: z.enum(['buy', 'sell', 'observe']).default('observe'),
    confidence: z.number().min(0).max(1).default(0.5),
    summary: z.string().default(''),
    keywords: Keywords,
  })
  .transform(
    (raw): PreliminaryAnalysis => ({
      eventType: raw.eventType ?? raw.event_type ?? 'other',
      asset: raw.asset,
      action: raw.action,
      confidence: raw.confidence,
      summary: raw.summary,
      keywords: raw.keywords,
    })
  );

const EventInputSchema = z.object({
  payload: PayloadSchema,
  preliminary: PreliminarySchema,
});

export type EventInput = z.infer<typeof EventInputSchema>;

export function parseEventInput(raw: unknown): EventInput {
  return EventInputSchema.parse(raw);
}
