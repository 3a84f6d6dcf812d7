import { InvalidInputError } from "./errors";
import {
  DEFAULT_AI_BLEND_CONFIG,
  DEFAULT_RISK_THRESHOLDS,
  riskLevel,
  validateAiBlendConfig,
  validateThresholds,
} from "./thresholds";

describe("riskLevel", () => {
  it.each<[number, string]>([
    [100, "critical"],
    [90, "critical"],
    [89, "high"],
    [80, "high"],
    [79, "medium"],
    [60, "medium"],
    [59, "low"],
    [0, "low"],
  ])("maps %i to %s", (score, level) => {
    expect(riskLevel(score)).toBe(level);
  });
});

describe("validateThresholds", () => {
  it("returns a copy of valid thresholds", () => {
    const validated = validateThresholds(DEFAULT_RISK_THRESHOLDS);

    expect(validated).toEqual(DEFAULT_RISK_THRESHOLDS);
    expect(validated).not.toBe(DEFAULT_RISK_THRESHOLDS);
  });

  it("rejects percentages above 100", () => {
    expect(() => validateThresholds({ ...DEFAULT_RISK_THRESHOLDS, contractInteractionRatioCutoffPct: 101 })).toThrow(
      "Invalid value for contractInteractionRatioCutoffPct: must be between 0 and 100"
    );
  });

  it("rejects negative and fractional counts", () => {
    expect(() => validateThresholds({ ...DEFAULT_RISK_THRESHOLDS, failedTransactionCutoff: -1 })).toThrow(
      InvalidInputError
    );
    expect(() => validateThresholds({ ...DEFAULT_RISK_THRESHOLDS, rapidTransactionWindowMs: 1.5 })).toThrow(
      InvalidInputError
    );
  });

  it("rejects a zero round amount unit", () => {
    expect(() => validateThresholds({ ...DEFAULT_RISK_THRESHOLDS, roundAmountUnit: BigInt(0) })).toThrow(
      "Invalid value for roundAmountUnit: must be greater than zero"
    );
  });

  it("rejects an unusual hour band that ends before it starts", () => {
    expect(() =>
      validateThresholds({ ...DEFAULT_RISK_THRESHOLDS, unusualHourStart: 6, unusualHourWindow: 6 })
    ).toThrow("Invalid value for unusualHourWindow: must end after unusualHourStart");
  });

  it("rejects hours past 24", () => {
    expect(() => validateThresholds({ ...DEFAULT_RISK_THRESHOLDS, unusualHourWindow: 25 })).toThrow(
      "Invalid value for unusualHourWindow: must be an hour between 0 and 24"
    );
  });
});

describe("validateAiBlendConfig", () => {
  it("accepts the defaults", () => {
    expect(validateAiBlendConfig(DEFAULT_AI_BLEND_CONFIG)).toEqual(DEFAULT_AI_BLEND_CONFIG);
  });

  it("rejects a zero wait", () => {
    expect(() => validateAiBlendConfig({ ...DEFAULT_AI_BLEND_CONFIG, maxWaitMs: 0 })).toThrow(
      "Invalid value for maxWaitMs: must be greater than zero"
    );
  });

  it("rejects weights above 100", () => {
    expect(() => validateAiBlendConfig({ ...DEFAULT_AI_BLEND_CONFIG, aiWeightPct: 150 })).toThrow(InvalidInputError);
  });
});
