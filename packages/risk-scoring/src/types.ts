export type Address = string;

export type TransactionCategory = "send" | "receive" | "contract" | "approval";

export type Severity = "low" | "medium" | "high" | "critical";

export type RiskLevel = Severity;

export type PatternKind =
  | "rapid_transactions"
  | "large_transfer"
  | "unusual_contract"
  | "failed_spike"
  | "round_amounts"
  | "unusual_hours"
  | "new_address";

export type AlertKind = "security" | "warning";

export interface AddressRecord {
  address: Address;
  transactionCount: number;
  totalVolume: bigint;
  firstSeenAt: number;
  lastTransactionTime: number;
  rapidTransactionCount: number;
  failedTransactionCount: number;
  contractInteractionCount: number;
  riskScore: number;
  suspiciousPatternIds: PatternKind[];
}

export interface ObservedActivity {
  transactionRef: string;
  amount: bigint;
  timestamp: number;
  category: TransactionCategory;
}

export interface RiskThresholds {
  rapidTransactionWindowMs: number;
  largeTransferCutoff: bigint;
  failedTransactionCutoff: number;
  contractInteractionRatioCutoffPct: number;
  roundAmountClusterCutoff: number;
  roundAmountUnit: bigint;
  unusualHourStart: number;
  unusualHourWindow: number;
  newAddressMaxTransactions: number;
}

export interface AiBlendConfig {
  enabled: boolean;
  aiWeightPct: number;
  confidenceFloorPct: number;
  maxWaitMs: number;
  fallbackOnFailure: boolean;
}

export interface PatternFinding {
  address: Address;
  patternKind: PatternKind;
  severity: Severity;
  description: string;
  evidenceIds: string[];
  scoreContribution: number;
  detectedAt: number;
}

export interface Alert {
  transactionRef: string;
  sender: Address;
  recipient: Address;
  amount: bigint;
  riskScore: number;
  severity: Severity;
  alertKind: AlertKind;
  message: string;
  timestamp: number;
}

export interface ObservedTransaction {
  transactionRef: string;
  sender: Address;
  recipient: Address;
  amount: bigint;
  category: TransactionCategory;
  timestamp: number;
}

export type RiskFactor = "blacklisted" | "whitelisted" | "large_transfer" | "rapid_transactions" | "failed_spike" | "contract_ratio";

export interface ScoreBreakdown {
  score: number;
  factors: RiskFactor[];
}

export interface TransactionAnalysis {
  transactionRef: string;
  sender: Address;
  recipient: Address;
  amount: bigint;
  category: TransactionCategory;
  riskFactors: RiskFactor[];
  finalRiskScore: number;
  timestamp: number;
}

export interface WalletMonitoringUpdate {
  address: Address;
  isWatching: boolean;
  currentRiskScore: number;
  patternsDetected: PatternKind[];
  lastUpdate: number;
}

export interface WalletRiskInfo {
  address: Address;
  riskScore: number;
  isBlacklisted: boolean;
  isWhitelisted: boolean;
  transactionCount: number;
  riskLevel: RiskLevel;
}

export type RiskEvent =
  | { type: "alert"; payload: Alert }
  | { type: "pattern_finding"; payload: PatternFinding }
  | { type: "transaction_analysis"; payload: TransactionAnalysis }
  | { type: "wallet_monitoring"; payload: WalletMonitoringUpdate };

export interface OracleContext {
  transactionRef: string;
  sender: Address;
  recipient: Address;
  amount: string;
  category: TransactionCategory;
  timestamp: string;
  ruleScore: number;
  senderHistory: OracleAddressSummary;
  recipientHistory: OracleAddressSummary;
  thresholds: {
    rapidTransactionWindowMs: number;
    largeTransferCutoff: string;
    failedTransactionCutoff: number;
    contractInteractionRatioCutoffPct: number;
  };
}

export interface OracleAddressSummary {
  transactionCount: number;
  totalVolume: string;
  rapidTransactionCount: number;
  failedTransactionCount: number;
  contractInteractionCount: number;
  blacklisted: boolean;
  whitelisted: boolean;
}

export interface OracleResponse {
  riskScore: number;
  confidence: number;
  reasoning: string;
  patterns: string[];
  recommendations: string[];
}

export interface OracleAssessment extends OracleResponse {
  model: string;
  requestHash: string;
  processingTimeMs: number;
}

export interface OracleRequest {
  requestHash: string;
  context: OracleContext;
  signal?: AbortSignal;
}

export interface RiskOracleAdapter {
  name: string;
  assess(request: OracleRequest): Promise<OracleAssessment>;
}

export interface BlendOutcome {
  score: number;
  ruleScore: number;
  aiScore?: number;
  aiConfidence?: number;
  applied: boolean;
  degraded: boolean;
}
