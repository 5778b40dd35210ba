import { describe, expect, it } from 'vitest';

import {
  clampConfidence,
  normalizeSignal,
  signalToJson,
} from '../../../src/agent/orchestrator/signal.js';
import { MalformedOutputError } from '../../../src/core/errors.js';
import { makePreliminary } from '../../helpers/fixtures.js';

describe('clampConfidence', () => {
  it('clamps to [0, 1]', () => {
    expect(clampConfidence(1.4)).toBe(1);
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(Number.NaN)).toBe(0);
    expect(clampConfidence(0.55)).toBe(0.55);
  });
});

describe('normalizeSignal', () => {
  const preliminary = makePreliminary({ eventType: 'depeg', asset: 'USDC' });

  it('fills defaults from the preliminary analysis', () => {
    const signal = normalizeSignal('{"summary": "peg holding", "confidence": 0.62}', preliminary);
    expect(signal).toEqual({
      summary: 'peg holding',
      eventType: 'depeg',
      asset: 'USDC',
      action: 'observe',
      direction: 'neutral',
      confidence: 0.62,
      strength: 'medium',
      timeframe: 'short',
      riskFlags: [],
      notes: '',
      links: [],
    });
  });

  it('clamps confidence and adds confidence_low', () => {
    const signal = normalizeSignal(
      '```json\n{"summary": "s", "action": "SELL", "confidence": -0.3, ' +
        '"risk_flags": ["data_conflict", "data_conflict"]}\n```',
      preliminary
    );
    expect(signal.confidence).toBe(0);
    expect(signal.action).toBe('sell');
    expect(signal.direction).toBe('short');
    expect(signal.riskFlags).toEqual(['data_conflict', 'confidence_low']);
  });

  it('does not duplicate confidence_low', () => {
    const signal = normalizeSignal(
      '{"confidence": "0.2", "risk_flags": "confidence_low, speculative"}',
      preliminary
    );
    expect(signal.confidence).toBe(0.2);
    expect(signal.riskFlags).toEqual(['confidence_low', 'speculative']);
  });

  it('keeps high confidence capped at 1 without a low flag', () => {
    const signal = normalizeSignal(
      '{"confidence": 1.7, "action": "buy", "links": ["https://a.test", 3, "https://a.test"], ' +
        '"asset": "ETH", "asset_name": "Ether", "strength": "extreme"}',
      preliminary
    );
    expect(signal).toMatchObject({
      confidence: 1,
      riskFlags: [],
      direction: 'long',
      asset: 'ETH',
      assetName: 'Ether',
      strength: 'medium',
      links: ['https://a.test'],
    });
  });

  it('rejects output without a usable confidence', () => {
    expect(() => normalizeSignal('{"summary": "s"}', preliminary)).toThrow(MalformedOutputError);
    expect(() => normalizeSignal('{"confidence": "high"}', preliminary)).toThrow(
      'Synthesis output failed validation'
    );
    expect(() => normalizeSignal('no json', preliminary)).toThrow(MalformedOutputError);
  });

  it('rejects null, blank and boolean confidence', () => {
    for (const raw of ['null', '""', '"  "', 'true', 'false']) {
      expect(() => normalizeSignal(`{"confidence": ${raw}}`, preliminary)).toThrow(
        MalformedOutputError
      );
    }
  });

  it('accepts a numeric string confidence', () => {
    expect(normalizeSignal('{"confidence": " 0.75 "}', preliminary).confidence).toBe(0.75);
  });
});

describe('signalToJson', () => {
  it('uses snake_case keys', () => {
    const signal = normalizeSignal('{"confidence": 0.5, "asset_name": "USD Coin"}', makePreliminary());
    expect(signalToJson(signal)).toEqual({
      summary: '',
      event_type: 'hack',
      asset: 'USDC',
      asset_name: 'USD Coin',
      action: 'observe',
      direction: 'neutral',
      confidence: 0.5,
      strength: 'medium',
      timeframe: 'short',
      risk_flags: [],
      notes: '',
      links: [],
    });
  });
});
