import { InvalidInputError } from "./errors";
import { AiBlendConfig, RiskLevel, RiskThresholds } from "./types";

export const DEFAULT_RISK_THRESHOLDS: Readonly<RiskThresholds> = Object.freeze({
  rapidTransactionWindowMs: 5 * 60 * 1000,
  largeTransferCutoff: BigInt(1000),
  failedTransactionCutoff: 3,
  contractInteractionRatioCutoffPct: 70,
  roundAmountClusterCutoff: 5,
  roundAmountUnit: BigInt(10),
  unusualHourStart: 2,
  unusualHourWindow: 6,
  newAddressMaxTransactions: 1,
});

export const DEFAULT_AI_BLEND_CONFIG: Readonly<AiBlendConfig> = Object.freeze({
  enabled: false,
  aiWeightPct: 30,
  confidenceFloorPct: 70,
  maxWaitMs: 5000,
  fallbackOnFailure: true,
});

const RISK_LEVEL_FLOORS: Array<[RiskLevel, number]> = [
  ["critical", 90],
  ["high", 80],
  ["medium", 60],
];

export function riskLevel(score: number): RiskLevel {
  for (const [level, floor] of RISK_LEVEL_FLOORS) {
    if (score >= floor) {
      return level;
    }
  }
  return "low";
}

function assertCount(field: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(field, "must be a non-negative integer");
  }
}

function assertPercentage(field: string, value: number) {
  assertCount(field, value);
  if (value > 100) {
    throw new InvalidInputError(field, "must be between 0 and 100");
  }
}

function assertHour(field: string, value: number) {
  assertCount(field, value);
  if (value > 24) {
    throw new InvalidInputError(field, "must be an hour between 0 and 24");
  }
}

export function validateThresholds(thresholds: RiskThresholds): RiskThresholds {
  assertCount("rapidTransactionWindowMs", thresholds.rapidTransactionWindowMs);
  assertCount("failedTransactionCutoff", thresholds.failedTransactionCutoff);
  assertPercentage("contractInteractionRatioCutoffPct", thresholds.contractInteractionRatioCutoffPct);
  assertCount("roundAmountClusterCutoff", thresholds.roundAmountClusterCutoff);
  assertCount("newAddressMaxTransactions", thresholds.newAddressMaxTransactions);
  assertHour("unusualHourStart", thresholds.unusualHourStart);
  assertHour("unusualHourWindow", thresholds.unusualHourWindow);

  if (thresholds.largeTransferCutoff < BigInt(0)) {
    throw new InvalidInputError("largeTransferCutoff", "must be non-negative");
  }
  if (thresholds.roundAmountUnit <= BigInt(0)) {
    throw new InvalidInputError("roundAmountUnit", "must be greater than zero");
  }
  if (thresholds.unusualHourStart >= thresholds.unusualHourWindow) {
    throw new InvalidInputError("unusualHourWindow", "must end after unusualHourStart");
  }

  return copyThresholds(thresholds);
}

export function validateAiBlendConfig(config: AiBlendConfig): AiBlendConfig {
  assertPercentage("aiWeightPct", config.aiWeightPct);
  assertPercentage("confidenceFloorPct", config.confidenceFloorPct);
  assertCount("maxWaitMs", config.maxWaitMs);
  if (config.maxWaitMs === 0) {
    throw new InvalidInputError("maxWaitMs", "must be greater than zero");
  }

  return { ...config };
}

export function copyThresholds(thresholds: RiskThresholds): RiskThresholds {
  return { ...thresholds };
}
