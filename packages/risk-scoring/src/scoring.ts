import { AddressRegistry } from "./registry";
import { AddressRecord, AiBlendConfig, BlendOutcome, RiskFactor, RiskThresholds, ScoreBreakdown } from "./types";

export const MAX_RISK_SCORE = 100;

const BLACKLIST_POINTS = 90;
const LARGE_TRANSFER_POINTS = 25;
const RAPID_TRANSACTION_POINTS = 20;
const FAILED_TRANSACTION_POINTS = 15;
const CONTRACT_RATIO_POINTS = 10;

export const RAPID_TRANSACTION_FLOOR = 3;

export interface ScoreInput {
  address: string;
  amount: bigint;
  now: number;
  registry: AddressRegistry;
  thresholds: RiskThresholds;
  history?: AddressRecord;
}

/** Truncating integer percentage, 0 when there are no transactions. */
export function contractInteractionPct(record: AddressRecord): number {
  if (record.transactionCount <= 0) {
    return 0;
  }
  return Math.floor((record.contractInteractionCount * 100) / record.transactionCount);
}

export function scoreWithBreakdown({ address, amount, registry, thresholds, history }: ScoreInput): ScoreBreakdown {
  const factors: RiskFactor[] = [];
  let score = 0;

  if (registry.isBlacklisted(address)) {
    score += BLACKLIST_POINTS;
    factors.push("blacklisted");
  }

  // Whitelisting dampens whatever the blacklist added; it never erases it.
  if (registry.isWhitelisted(address)) {
    score = Math.floor(score / 2);
    factors.push("whitelisted");
  }

  if (amount > thresholds.largeTransferCutoff) {
    score += LARGE_TRANSFER_POINTS;
    factors.push("large_transfer");
  }

  if (history) {
    if (history.rapidTransactionCount > RAPID_TRANSACTION_FLOOR) {
      score += RAPID_TRANSACTION_POINTS;
      factors.push("rapid_transactions");
    }
    if (history.failedTransactionCount > thresholds.failedTransactionCutoff) {
      score += FAILED_TRANSACTION_POINTS;
      factors.push("failed_spike");
    }
    if (
      history.transactionCount > 0 &&
      contractInteractionPct(history) > thresholds.contractInteractionRatioCutoffPct
    ) {
      score += CONTRACT_RATIO_POINTS;
      factors.push("contract_ratio");
    }
  }

  return { score: Math.min(score, MAX_RISK_SCORE), factors };
}

export function score(input: ScoreInput): number {
  return scoreWithBreakdown(input).score;
}

function clampScore(value: number): number {
  return Math.max(0, Math.min(MAX_RISK_SCORE, Math.trunc(value)));
}

/**
 * Weighted blend of the rule score with an oracle score, rounded half up in
 * integer arithmetic. Returns the rule score untouched when the oracle's
 * confidence is below the configured floor.
 */
export function blendScores(
  ruleScore: number,
  aiScore: number,
  aiConfidence: number,
  config: Pick<AiBlendConfig, "aiWeightPct" | "confidenceFloorPct">
): BlendOutcome {
  const rule = clampScore(ruleScore);
  const ai = clampScore(aiScore);
  const confidence = clampScore(aiConfidence);

  if (confidence < config.confidenceFloorPct) {
    return { score: rule, ruleScore: rule, aiScore: ai, aiConfidence: confidence, applied: false, degraded: false };
  }

  const weight = config.aiWeightPct;
  const blended = Math.floor((rule * (100 - weight) + ai * weight + 50) / 100);

  return {
    score: clampScore(blended),
    ruleScore: rule,
    aiScore: ai,
    aiConfidence: confidence,
    applied: true,
    degraded: false,
  };
}

export function ruleOnlyOutcome(ruleScore: number, degraded: boolean): BlendOutcome {
  const rule = clampScore(ruleScore);
  return { score: rule, ruleScore: rule, applied: false, degraded };
}
