/**
 * Tool Adapters Index
 *
 * Re-exports the bundled adapters and registers the ones the configuration
 * enables. Tools passed through the engine overrides take precedence.
 */

export { createTavilySearchTool, buildSearchEnvelope } from './search.js';
export { createCoinGeckoPriceTool, buildPriceEnvelope } from './price.js';
export { createFredMacroTool, buildMacroEnvelope } from './macro.js';
export { createDefiLlamaOnchainTool, buildOnchainEnvelope } from './onchain.js';
export { createDefiLlamaProtocolTool, buildProtocolEnvelope } from './protocol.js';

import { createTavilySearchTool } from './search.js';
import { createCoinGeckoPriceTool } from './price.js';
import { createFredMacroTool } from './macro.js';
import { createDefiLlamaOnchainTool } from './onchain.js';
import { createDefiLlamaProtocolTool } from './protocol.js';
import type { EngineConfig } from '../../../core/config.js';
import type { Logger } from '../../../core/logger.js';
import { toErrorMessage } from '../../../core/errors.js';
import type { EvidenceToolRegistry } from '../registry.js';

/**
 * Register the bundled tools enabled in config. A tool whose construction
 * fails (e.g. missing API key) stays unregistered and the executor skips it.
 */
export function registerConfiguredTools(
  registry: EvidenceToolRegistry,
  config: EngineConfig,
  logger: Logger
): void {
  const { search, price, macro, onchain, protocol } = config.tools;

  if (search.enabled && !registry.has('search')) {
    try {
      registry.register(
        createTavilySearchTool({
          apiKey: search.apiKey,
          multiSourceThreshold: search.multiSourceThreshold,
        })
      );
    } catch (error) {
      logger.warn(`Search tool not initialized: ${toErrorMessage(error)}`);
    }
  }

  if (price.enabled && !registry.has('price')) {
    registry.register(
      createCoinGeckoPriceTool({
        baseUrl: price.baseUrl,
        apiKey: price.apiKey,
        assetIds: price.assetIds,
        deviationThresholdPct: price.deviationThresholdPct,
        stablecoinTolerancePct: price.stablecoinTolerancePct,
      })
    );
  }

  if (macro.enabled && !registry.has('macro')) {
    try {
      registry.register(
        createFredMacroTool({
          apiKey: macro.apiKey,
          baseUrl: macro.baseUrl,
          expectations: macro.expectations,
        })
      );
    } catch (error) {
      logger.warn(`Macro tool not initialized: ${toErrorMessage(error)}`);
    }
  }

  if (onchain.enabled && !registry.has('onchain')) {
    registry.register(
      createDefiLlamaOnchainTool({
        baseUrl: onchain.baseUrl,
        tvlDropThresholdPct: onchain.tvlDropThresholdPct,
        redemptionUsdThreshold: onchain.redemptionUsdThreshold,
      })
    );
  }

  if (protocol.enabled && !registry.has('protocol')) {
    registry.register(
      createDefiLlamaProtocolTool({
        baseUrl: protocol.baseUrl,
        tvlDropThresholdPct: protocol.tvlDropThresholdPct,
        tvlDropThresholdUsd: protocol.tvlDropThresholdUsd,
        topChainLimit: protocol.topChainLimit,
      })
    );
  }
}
