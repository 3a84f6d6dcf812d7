import { normalizeAddress } from "./registry";
import { contractInteractionPct, RAPID_TRANSACTION_FLOOR } from "./scoring";
import { AddressRecord, ObservedActivity, PatternFinding, RiskThresholds, Severity } from "./types";

const CRITICAL_RAPID_COUNT = 10;
const HIGH_CONTRACT_RATIO_PCT = 90;
const ROUND_AMOUNT_SHARE_PCT = 30;
const LARGE_TRANSFER_CONTRIBUTION = 25;
const NEW_ADDRESS_CONTRIBUTION = 30;

export interface BatchTransaction {
  transactionRef: string;
  amount: bigint;
  timestamp: number;
}

function isUnusualHour(timestamp: number, thresholds: RiskThresholds): boolean {
  const hour = new Date(timestamp).getUTCHours();
  return hour >= thresholds.unusualHourStart && hour < thresholds.unusualHourWindow;
}

function refs(activity: ObservedActivity[]): string[] {
  return activity.map((item) => item.transactionRef);
}

/**
 * Per-address heuristics over the aggregate record and its recent activity
 * window. Every rule is evaluated on its own; several may fire in one pass.
 */
export function detectPatterns(
  address: string,
  record: AddressRecord | undefined,
  thresholds: RiskThresholds,
  activity: ObservedActivity[] = [],
  now = Date.now()
): PatternFinding[] {
  if (!record) {
    return [];
  }

  const normalized = normalizeAddress(address);
  const findings: PatternFinding[] = [];
  const finding = (
    patternKind: PatternFinding["patternKind"],
    severity: Severity,
    description: string,
    evidenceIds: string[],
    scoreContribution: number
  ) => findings.push({ address: normalized, patternKind, severity, description, evidenceIds, scoreContribution, detectedAt: now });

  if (record.rapidTransactionCount > RAPID_TRANSACTION_FLOOR) {
    const rapid = record.rapidTransactionCount;
    finding(
      "rapid_transactions",
      rapid > CRITICAL_RAPID_COUNT ? "critical" : "high",
      `${rapid} consecutive transactions within ${thresholds.rapidTransactionWindowMs}ms of each other`,
      refs(activity.slice(-(rapid + 1))),
      Math.min(rapid * 10, 100)
    );
  }

  if (record.failedTransactionCount > thresholds.failedTransactionCutoff) {
    const failed = record.failedTransactionCount;
    finding(
      "failed_spike",
      "medium",
      `${failed} failed transactions recorded`,
      [],
      Math.min(failed * 15, 100)
    );
  }

  if (record.transactionCount > 0) {
    const ratio = contractInteractionPct(record);
    if (ratio > thresholds.contractInteractionRatioCutoffPct) {
      finding(
        "unusual_contract",
        ratio > HIGH_CONTRACT_RATIO_PCT ? "high" : "medium",
        `${ratio}% of transactions are contract interactions`,
        refs(activity.filter((item) => item.category === "contract")),
        ratio
      );
    }
  }

  if (activity.length > 0) {
    const unit = thresholds.roundAmountUnit;
    const round = activity.filter((item) => item.amount > BigInt(0) && item.amount % unit === BigInt(0));
    if (
      round.length > thresholds.roundAmountClusterCutoff &&
      round.length * 100 > ROUND_AMOUNT_SHARE_PCT * activity.length
    ) {
      finding(
        "round_amounts",
        "low",
        `${round.length} of ${activity.length} recent transactions use amounts divisible by ${unit}`,
        refs(round),
        Math.min(round.length * 5, 100)
      );
    }

    const offHours = activity.filter((item) => isUnusualHour(item.timestamp, thresholds));
    if (offHours.length > 0) {
      finding(
        "unusual_hours",
        offHours.length * 2 > activity.length ? "medium" : "low",
        `${offHours.length} transactions between ${thresholds.unusualHourStart}:00 and ${thresholds.unusualHourWindow}:00 UTC`,
        refs(offHours),
        Math.min(offHours.length * 5, 100)
      );
    }
  }

  return findings;
}

function largeTransferSeverity(average: bigint, cutoff: bigint): Severity {
  if (average > cutoff * BigInt(10)) {
    return "critical";
  }
  if (average > cutoff * BigInt(5)) {
    return "high";
  }
  return "medium";
}

/** Batch-level rules over a list of observed transactions for one address. */
export function detectBatchPatterns(
  address: string,
  transactions: BatchTransaction[],
  thresholds: RiskThresholds,
  record?: AddressRecord,
  now = Date.now()
): PatternFinding[] {
  const normalized = normalizeAddress(address);
  const large = transactions.filter((tx) => tx.amount > thresholds.largeTransferCutoff);
  if (large.length === 0) {
    return [];
  }

  const total = large.reduce((sum, tx) => sum + tx.amount, BigInt(0));
  const average = total / BigInt(large.length);
  const evidenceIds = large.map((tx) => tx.transactionRef);

  const findings: PatternFinding[] = [
    {
      address: normalized,
      patternKind: "large_transfer",
      severity: largeTransferSeverity(average, thresholds.largeTransferCutoff),
      description: `${large.length} transfers above ${thresholds.largeTransferCutoff} (average ${average})`,
      evidenceIds,
      scoreContribution: LARGE_TRANSFER_CONTRIBUTION,
      detectedAt: now,
    },
  ];

  if (!record || record.transactionCount <= thresholds.newAddressMaxTransactions) {
    findings.push({
      address: normalized,
      patternKind: "new_address",
      severity: "medium",
      description: `Large transfer involving an address with ${record?.transactionCount ?? 0} prior transactions`,
      evidenceIds,
      scoreContribution: NEW_ADDRESS_CONTRIBUTION,
      detectedAt: now,
    });
  }

  return findings;
}
