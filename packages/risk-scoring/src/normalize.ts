import { OracleAssessment, OracleResponse } from "./types";

const MAX_REASONING_LENGTH = 500;

function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, Math.round(value)));
}

export function normalizeOracleResponse(
  response: OracleResponse,
  model: string,
  requestHash: string,
  startedAt: number
): OracleAssessment {
  const reasoning =
    response.reasoning.length > MAX_REASONING_LENGTH
      ? `${response.reasoning.slice(0, MAX_REASONING_LENGTH)}...`
      : response.reasoning;

  return {
    riskScore: clampPercent(response.riskScore),
    confidence: clampPercent(response.confidence),
    reasoning,
    patterns: response.patterns,
    recommendations: response.recommendations,
    model,
    requestHash,
    processingTimeMs: Math.max(0, Date.now() - startedAt),
  };
}
