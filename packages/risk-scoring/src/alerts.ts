import { Alert, AlertKind, ObservedTransaction, PatternFinding, Severity } from "./types";

export const ALERT_SCORE_BOUNDARY = 80;

function alertSeverity(score: number): Severity {
  if (score > 90) {
    return "critical";
  }
  if (score > 70) {
    return "high";
  }
  return "medium";
}

function alertKind(severity: Severity): AlertKind {
  return severity === "critical" ? "security" : "warning";
}

/**
 * Decides whether a scored transaction becomes a visible alert. Findings are
 * described in the message but never raise an alert on their own.
 */
export function maybeAlert(
  senderScore: number,
  recipientScore: number,
  findings: PatternFinding[],
  transaction: ObservedTransaction
): Alert | undefined {
  const finalScore = Math.max(senderScore, recipientScore);
  if (finalScore <= ALERT_SCORE_BOUNDARY) {
    return undefined;
  }

  const severity = alertSeverity(finalScore);
  const flagged = senderScore >= recipientScore ? "sender" : "recipient";
  const patternKinds = Array.from(new Set(findings.map((finding) => finding.patternKind)));
  const message =
    `High-risk transaction: ${flagged} scored ${finalScore}/100` +
    (patternKinds.length ? ` (patterns: ${patternKinds.join(", ")})` : "");

  return {
    transactionRef: transaction.transactionRef,
    sender: transaction.sender,
    recipient: transaction.recipient,
    amount: transaction.amount,
    riskScore: finalScore,
    severity,
    alertKind: alertKind(severity),
    message,
    timestamp: transaction.timestamp,
  };
}
