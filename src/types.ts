export type Severity = "critical" | "warning" | "info"

export type RiskLevel = "safe" | "suspicious" | "dangerous"

export interface Flag {
  severity: Severity
  message: string
}

export type AgentDetails = Record<string, unknown>

export interface AgentResult {
  flags: Flag[]
  details: AgentDetails
  /** Points deducted from the base score. Never negative. */
  scoreImpact: number
  verdictTitle?: string
  verdictMessage?: string
}

export type AgentStatus = "completed" | "failed" | "timed_out"

export interface AgentOutcome {
  agent: string
  status: AgentStatus
  result: AgentResult
  durationMs: number
  error?: string
}

export interface ScoreBreakdown {
  baseScore: number
  totalImpact: number
  impacts: Record<string, number>
}

export interface AggregateResult {
  platform: string
  score: number
  riskLevel: RiskLevel
  verdictTitle: string
  verdictMessage: string
  flags: Flag[]
  details: Record<string, AgentDetails>
  perAgentOutputs: Record<string, AgentResult>
  failedAgents: string[]
  analysisPerformed: boolean
  scoreBreakdown: ScoreBreakdown
}

export interface AgentResultResponse {
  flags: Flag[]
  details: AgentDetails
  score_impact: number
  verdict_title?: string
  verdict_message?: string
}

export interface AggregateResultResponse {
  platform: string
  score: number
  risk_level: RiskLevel
  verdict_title: string
  verdict_message: string
  flags: Flag[]
  details: Record<string, AgentDetails>
  per_agent_outputs: Record<string, AgentResultResponse>
  failed_agents: string[]
  analysis_performed: boolean
  score_breakdown: {
    base_score: number
    total_impact: number
    impacts: Record<string, number>
  }
}
