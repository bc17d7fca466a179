import type { PriceComparisonSettings } from "../../config"
import type { StorefrontRequest } from "../../schemas"
import type { StructuredLlm } from "../../services/llm-client"
import type { WebSearch } from "../../services/search-orchestrator"
import type { Agent } from "../agent"
import { EcommerceGuardAgent } from "./ecommerce-guard"
import { PriceComparisonAgent } from "./price-comparison"
import { ReviewsAgent } from "./reviews"

export interface StorefrontAgentDependencies {
  llm: StructuredLlm
  search: WebSearch
  priceComparison: PriceComparisonSettings
}

export function createStorefrontAgents(deps: StorefrontAgentDependencies): Agent<StorefrontRequest>[] {
  return [
    new EcommerceGuardAgent(deps.llm),
    new ReviewsAgent(deps.search, deps.llm),
    new PriceComparisonAgent(deps.search, deps.llm, deps.priceComparison),
  ]
}
