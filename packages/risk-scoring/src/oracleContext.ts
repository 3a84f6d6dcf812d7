import { AddressRegistry, normalizeAddress } from "./registry";
import { AddressRecord, ObservedTransaction, OracleAddressSummary, OracleContext, RiskThresholds } from "./types";

export interface OracleContextInput {
  transaction: ObservedTransaction;
  ruleScore: number;
  senderRecord?: AddressRecord;
  recipientRecord?: AddressRecord;
  registry: AddressRegistry;
  thresholds: RiskThresholds;
}

function summarize(address: string, record: AddressRecord | undefined, registry: AddressRegistry): OracleAddressSummary {
  return {
    transactionCount: record?.transactionCount ?? 0,
    totalVolume: (record?.totalVolume ?? BigInt(0)).toString(),
    rapidTransactionCount: record?.rapidTransactionCount ?? 0,
    failedTransactionCount: record?.failedTransactionCount ?? 0,
    contractInteractionCount: record?.contractInteractionCount ?? 0,
    blacklisted: registry.isBlacklisted(address),
    whitelisted: registry.isWhitelisted(address),
  };
}

/** JSON-safe view of a transaction and both parties' aggregates for an oracle. */
export function buildOracleContext(input: OracleContextInput): OracleContext {
  const { transaction, ruleScore, senderRecord, recipientRecord, registry, thresholds } = input;

  return {
    transactionRef: transaction.transactionRef,
    sender: normalizeAddress(transaction.sender),
    recipient: normalizeAddress(transaction.recipient),
    amount: transaction.amount.toString(),
    category: transaction.category,
    timestamp: new Date(transaction.timestamp).toISOString(),
    ruleScore,
    senderHistory: summarize(transaction.sender, senderRecord, registry),
    recipientHistory: summarize(transaction.recipient, recipientRecord, registry),
    thresholds: {
      rapidTransactionWindowMs: thresholds.rapidTransactionWindowMs,
      largeTransferCutoff: thresholds.largeTransferCutoff.toString(),
      failedTransactionCutoff: thresholds.failedTransactionCutoff,
      contractInteractionRatioCutoffPct: thresholds.contractInteractionRatioCutoffPct,
    },
  };
}
