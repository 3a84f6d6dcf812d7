import { normalizeOracleResponse } from "../normalize";
import { OracleAddressSummary, OracleContext, OracleRequest, OracleResponse, RiskOracleAdapter } from "../types";

/** Deterministic stand-in used when no model endpoint is configured. */
export class RulesOracleAdapter implements RiskOracleAdapter {
  public readonly name = "rules-offline";

  public async assess(request: OracleRequest) {
    const startedAt = Date.now();
    return normalizeOracleResponse(this.evaluate(request.context), `${this.name}/v1`, request.requestHash, startedAt);
  }

  private evaluate(context: OracleContext): OracleResponse {
    const patterns = [
      ...this.partyPatterns(context.senderHistory, context.thresholds.failedTransactionCutoff),
      ...this.partyPatterns(context.recipientHistory, context.thresholds.failedTransactionCutoff),
    ];
    if (BigInt(context.amount) > BigInt(context.thresholds.largeTransferCutoff)) {
      patterns.push("large_transfer");
    }
    const unique = Array.from(new Set(patterns));

    const riskScore = Math.min(100, context.ruleScore + unique.length * 5);
    const suspicious = unique.length > 0;

    return {
      riskScore,
      confidence: suspicious ? 60 : 20,
      reasoning: suspicious
        ? `Offline heuristics matched: ${unique.join(", ")}`
        : "No offline heuristics matched this transaction",
      patterns: unique,
      recommendations: suspicious ? ["Increase monitoring for these addresses"] : [],
    };
  }

  private partyPatterns(summary: OracleAddressSummary, failedCutoff: number): string[] {
    const patterns: string[] = [];
    if (summary.blacklisted) {
      patterns.push("blacklisted_address");
    }
    if (summary.rapidTransactionCount > 3) {
      patterns.push("rapid_transactions");
    }
    if (summary.failedTransactionCount > failedCutoff) {
      patterns.push("failed_spike");
    }
    if (summary.transactionCount <= 1) {
      patterns.push("new_address");
    }
    return patterns;
  }
}
