import { OracleResponseError } from "./errors";
import { normalizeOracleResponse } from "./normalize";
import { extractJsonObject, validateOracleResponse } from "./schema";

describe("validateOracleResponse", () => {
  it("fills optional fields", () => {
    expect(validateOracleResponse({ riskScore: 40, confidence: 75 })).toEqual({
      riskScore: 40,
      confidence: 75,
      reasoning: "No reasoning provided",
      patterns: [],
      recommendations: [],
    });
  });

  it.each<[unknown, string]>([
    [null, "Oracle response is not an object"],
    [[1, 2], "Oracle response is not an object"],
    [{ confidence: 10 }, "Oracle response missing numeric riskScore"],
    [{ riskScore: 10, confidence: "high" }, "Oracle response missing numeric confidence"],
    [{ riskScore: 10, confidence: 10, reasoning: 5 }, "Oracle response reasoning must be a string"],
    [{ riskScore: 10, confidence: 10, patterns: [1] }, "Oracle response patterns must be an array of strings"],
  ])("rejects %j", (payload, message) => {
    expect(() => validateOracleResponse(payload)).toThrow(new OracleResponseError(message));
  });
});

describe("extractJsonObject", () => {
  it("finds a JSON object inside model text", () => {
    expect(extractJsonObject('Sure, here it is: {"riskScore": 12, "confidence": 80} hope that helps')).toEqual({
      riskScore: 12,
      confidence: 80,
    });
  });

  it("rejects text without an object", () => {
    expect(() => extractJsonObject("no json here")).toThrow("Oracle text output does not contain a JSON object");
  });

  it("rejects malformed JSON", () => {
    expect(() => extractJsonObject("{riskScore: 1}")).toThrow("Oracle text output is not valid JSON");
  });
});

describe("normalizeOracleResponse", () => {
  it("clamps and rounds scores", () => {
    const assessment = normalizeOracleResponse(
      { riskScore: 120.4, confidence: 55.5, reasoning: "ok", patterns: ["x"], recommendations: [] },
      "model-a",
      "hash-1",
      Date.now()
    );

    expect(assessment).toMatchObject({
      riskScore: 100,
      confidence: 56,
      reasoning: "ok",
      patterns: ["x"],
      model: "model-a",
      requestHash: "hash-1",
    });
    expect(assessment.processingTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("clamps negative values to 0", () => {
    const assessment = normalizeOracleResponse(
      { riskScore: -3, confidence: -1, reasoning: "", patterns: [], recommendations: [] },
      "m",
      "h",
      Date.now()
    );
    expect([assessment.riskScore, assessment.confidence]).toEqual([0, 0]);
  });

  it("truncates long reasoning", () => {
    const assessment = normalizeOracleResponse(
      { riskScore: 1, confidence: 1, reasoning: "a".repeat(600), patterns: [], recommendations: [] },
      "m",
      "h",
      Date.now()
    );

    expect(assessment.reasoning).toBe(`${"a".repeat(500)}...`);
  });
});
