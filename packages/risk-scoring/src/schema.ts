import { OracleResponseError } from "./errors";
import { OracleResponse } from "./types";

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * Checks the shape an oracle must answer with. Missing `patterns` and
 * `recommendations` default to empty lists; numbers are range-checked later.
 */
export function validateOracleResponse(payload: unknown): OracleResponse {
  if (!isRecord(payload)) {
    throw new OracleResponseError("Oracle response is not an object");
  }

  const { riskScore, confidence, reasoning, patterns, recommendations } = payload;

  if (typeof riskScore !== "number" || Number.isNaN(riskScore)) {
    throw new OracleResponseError("Oracle response missing numeric riskScore");
  }

  if (typeof confidence !== "number" || Number.isNaN(confidence)) {
    throw new OracleResponseError("Oracle response missing numeric confidence");
  }

  if (reasoning !== undefined && typeof reasoning !== "string") {
    throw new OracleResponseError("Oracle response reasoning must be a string");
  }

  if (patterns !== undefined && !isStringArray(patterns)) {
    throw new OracleResponseError("Oracle response patterns must be an array of strings");
  }

  if (recommendations !== undefined && !isStringArray(recommendations)) {
    throw new OracleResponseError("Oracle response recommendations must be an array of strings");
  }

  return {
    riskScore,
    confidence,
    reasoning: reasoning ?? "No reasoning provided",
    patterns: patterns ?? [],
    recommendations: recommendations ?? [],
  };
}

/** Pulls the first JSON object out of free-form model text. */
export function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new OracleResponseError("Oracle text output does not contain a JSON object");
  }
  try {
    return JSON.parse(match[0]);
  } catch {
    throw new OracleResponseError("Oracle text output is not valid JSON");
  }
}
