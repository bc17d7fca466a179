import type { PriceComparisonSettings } from "./config"
import { createMarketplaceAgents } from "./agents/marketplace"
import { createStorefrontAgents } from "./agents/storefront"
import { MarketplaceRequestSchema, StorefrontRequestSchema } from "./schemas"
import type { StructuredLlm } from "./services/llm-client"
import {
  MARKETPLACE_PLATFORM,
  PlatformRouter,
  STOREFRONT_PLATFORM,
} from "./services/platform-router"
import type { WebSearch } from "./services/search-orchestrator"

export interface PlatformDependencies {
  llm: StructuredLlm
  search: WebSearch
  priceComparison: PriceComparisonSettings
  now?: () => Date
}

export function createPlatformRouter(deps: PlatformDependencies): PlatformRouter {
  return new PlatformRouter()
    .register({
      platform: STOREFRONT_PLATFORM,
      aliases: ["ecommerce", "generic"],
      schema: StorefrontRequestSchema,
      agents: createStorefrontAgents(deps),
    })
    .register({
      platform: MARKETPLACE_PLATFORM,
      aliases: ["marketplace"],
      schema: MarketplaceRequestSchema,
      agents: createMarketplaceAgents(deps),
    })
}
