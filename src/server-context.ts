import type { AppConfig } from "./config"
import type { Loggers } from "./logger"
import type { AnalysisService } from "./services/analysis-service"
import type { StructuredLlm } from "./services/llm-client"
import type { WebSearch } from "./services/search-orchestrator"

export interface ServerContext {
  config: AppConfig
  loggers: Loggers
  analysisService: AnalysisService
  llm: StructuredLlm
  search: WebSearch
}
