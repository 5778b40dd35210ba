import type { OrchestrationState } from '../orchestrator/types.js';
import type { ToolName } from '../tools/types.js';
import { formatEvidenceBrief, formatEvidenceDetail } from './formatters.js';

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  search: 'search news to verify the event (rumour vs. official, multi-source confirmation)',
  price: 'asset price, 24h change and volume; detects depegs and volatility spikes',
  macro: 'macro indicators (CPI, CORE_CPI, FED_FUNDS, UNEMPLOYMENT, DXY, VIX)',
  onchain: 'on-chain liquidity and redemption data for an asset',
  protocol: 'protocol TVL, fees and chain distribution by protocol slug',
};

function describeEvent(state: OrchestrationState): string {
  const { payload, preliminary } = state;
  const lines = [
    `Message: ${payload.text}`,
    ...(payload.translatedText ? [`Translation: ${payload.translatedText}`] : []),
    `Language: ${payload.language || 'unknown'}`,
    `Source: ${payload.source}`,
    `Event type: ${preliminary.eventType}`,
    `Asset: ${preliminary.asset || 'NONE'}`,
    `Preliminary action: ${preliminary.action}`,
    `Preliminary confidence: ${preliminary.confidence}`,
    `Preliminary summary: ${preliminary.summary}`,
  ];
  return lines.join('\n');
}

export const PLANNER_SYSTEM_PROMPT =
  'You schedule evidence tools for crypto market event analysis. ' +
  'Only request a tool when its result could change the buy/sell/observe decision.';

export function buildPlannerPrompt(
  state: OrchestrationState,
  availableTools: ToolName[]
): string {
  const toolLines =
    availableTools.length > 0
      ? availableTools.map((name) => `- ${name}: ${TOOL_DESCRIPTIONS[name]}`).join('\n')
      : '- (no tools available)';

  return `Decide which evidence tools to call next for this event.

[Available tools]
${toolLines}

[Event]
${describeEvent(state)}

[Evidence so far]
${formatEvidenceBrief(state)}

[Turn]
${state.toolCallCount + 1} of ${state.maxToolCalls}

[Rules]
- Request nothing when the existing evidence already supports a confident decision.
- Do not repeat a search that already returned multi-source results.
- Skip price when the asset is NONE or the event has no market impact.
- Pick macro indicators from: CPI, CORE_CPI, FED_FUNDS, UNEMPLOYMENT, DXY, VIX.
- Only use tool names from the list above.

Respond with JSON only:
{"tools": ["search"], "search_keywords": "...", "macro_indicators": [], "onchain_assets": [], "protocol_slugs": [], "reason": "..."}`;
}

export function buildKeywordPrompt(state: OrchestrationState): string {
  return `Write one short web search query (at most 8 words) that would confirm or refute this event.
Prefer the asset name, the protocol or exchange involved, and the event type.

${describeEvent(state)}

Respond with JSON only: {"search_keywords": "..."}`;
}

export const SYNTHESIS_SYSTEM_PROMPT =
  'You are a crypto trading analyst. Combine the preliminary analysis and the collected ' +
  'evidence into one final trading signal. Respond with a single JSON object.';

export function buildSynthesisPrompt(state: OrchestrationState): string {
  const { preliminary } = state;
  return `Produce the final signal for this event.

[Event]
${describeEvent(state)}

[Historical memory]
${state.memoryEvidence.formatted || 'No similar historical events'}

${formatEvidenceDetail(state)}

[Confidence adjustment]
Start from the preliminary confidence (${preliminary.confidence}) and adjust:
- Multi-source confirmation AND official confirmation: +0.15 to +0.20
- Multi-source confirmation without official confirmation: +0.05 to +0.10
- Fewer than 3 results or no official confirmation: -0.10 to -0.20
- Sources conflict with each other: -0.20 and add "data_incomplete"
- A historical precedent with similarity > 0.8: shift up to 0.10 toward that precedent's outcome
- Price anomaly consistent with the event: +0.10 to +0.15
- Price normal while the event claims a depeg or liquidation: -0.15 to -0.25 and add "data_conflict"
- Old or retrospective content rather than news: -0.30 to -0.50 and add "stale_event"
Keep confidence within [0, 1]. Below 0.4, "confidence_low" must be in risk_flags.

[Output]
{
  "summary": "one or two sentences",
  "event_type": "${preliminary.eventType}",
  "asset": "${preliminary.asset || 'NONE'}",
  "asset_name": "optional full name",
  "action": "buy | sell | observe",
  "direction": "long | short | neutral",
  "confidence": 0.0,
  "strength": "low | medium | high",
  "timeframe": "short | medium | long",
  "risk_flags": ["price_volatility", "liquidity_risk", "regulation_risk", "confidence_low", "data_incomplete", "data_conflict", "stale_event", "vague_timeline", "speculative", "unverifiable"],
  "notes": "reasoning, citing the evidence used",
  "links": ["https://..."]
}
Include only the risk flags that apply.`;
}
