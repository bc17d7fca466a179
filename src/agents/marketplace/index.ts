import type { MarketplaceRequest } from "../../schemas"
import type { StructuredLlm } from "../../services/llm-client"
import type { Agent } from "../agent"
import { DescriptionQualityAgent } from "./description-quality"
import { ImageAnalysisAgent } from "./image-analysis"
import { PriceAnalysisAgent } from "./price-analysis"
import { PricingAgent } from "./pricing"
import { RedFlagsAgent } from "./red-flags"
import { SellerHistoryAgent } from "./seller-history"
import { SellerTrustAgent } from "./seller-trust"
import { SupplierConfidenceAgent } from "./supplier-confidence"

export interface MarketplaceAgentDependencies {
  llm: StructuredLlm
  now?: () => Date
}

export function createMarketplaceAgents(deps: MarketplaceAgentDependencies): Agent<MarketplaceRequest>[] {
  return [
    new SellerTrustAgent(deps.now),
    new SellerHistoryAgent(),
    new PricingAgent(),
    new PriceAnalysisAgent(),
    new ImageAnalysisAgent(deps.llm),
    new RedFlagsAgent(),
    new DescriptionQualityAgent(),
    new SupplierConfidenceAgent(deps.llm, deps.now),
  ]
}
