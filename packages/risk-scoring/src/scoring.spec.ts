import { AddressRegistry } from "./registry";
import { blendScores, contractInteractionPct, ruleOnlyOutcome, score, scoreWithBreakdown } from "./scoring";
import { DEFAULT_RISK_THRESHOLDS } from "./thresholds";
import { AddressRecord } from "./types";

const A = "0xaaa";

const record = (overrides: Partial<AddressRecord> = {}): AddressRecord => ({
  address: A,
  transactionCount: 10,
  totalVolume: BigInt(500),
  firstSeenAt: 0,
  lastTransactionTime: 0,
  rapidTransactionCount: 0,
  failedTransactionCount: 0,
  contractInteractionCount: 0,
  riskScore: 0,
  suspiciousPatternIds: [],
  ...overrides,
});

describe("score", () => {
  const thresholds = { ...DEFAULT_RISK_THRESHOLDS };
  let registry: AddressRegistry;

  beforeEach(() => {
    registry = new AddressRegistry();
  });

  it("returns 0 for an unknown address with a small amount", () => {
    expect(score({ address: A, amount: BigInt(10), now: 0, registry, thresholds })).toBe(0);
  });

  it("halves the blacklist penalty when the address is also whitelisted", () => {
    registry.addToBlacklist([A]);
    registry.addToWhitelist([A]);

    expect(scoreWithBreakdown({ address: A, amount: BigInt(0), now: 0, registry, thresholds })).toEqual({
      score: 45,
      factors: ["blacklisted", "whitelisted"],
    });
  });

  it("scores a blacklisted address at 90", () => {
    registry.addToBlacklist([A]);
    expect(score({ address: A, amount: BigInt(0), now: 0, registry, thresholds })).toBe(90);
  });

  it("adds 25 only when the amount exceeds the large transfer cutoff", () => {
    expect(score({ address: A, amount: BigInt(1000), now: 0, registry, thresholds })).toBe(0);
    expect(score({ address: A, amount: BigInt(1001), now: 0, registry, thresholds })).toBe(25);
  });

  it("adds history factors", () => {
    const history = record({ rapidTransactionCount: 4, failedTransactionCount: 4, contractInteractionCount: 8 });

    expect(scoreWithBreakdown({ address: A, amount: BigInt(2000), now: 0, registry, thresholds, history })).toEqual({
      score: 70,
      factors: ["large_transfer", "rapid_transactions", "failed_spike", "contract_ratio"],
    });
  });

  it("does not count a rapid count of exactly 3", () => {
    const history = record({ rapidTransactionCount: 3 });
    expect(score({ address: A, amount: BigInt(0), now: 0, registry, thresholds, history })).toBe(0);
  });

  it("does not add the contract bonus when the ratio equals the cutoff", () => {
    const history = record({ transactionCount: 10, contractInteractionCount: 7 });

    expect(contractInteractionPct(history)).toBe(70);
    expect(score({ address: A, amount: BigInt(0), now: 0, registry, thresholds, history })).toBe(0);
  });

  it("truncates the contract ratio", () => {
    expect(contractInteractionPct(record({ transactionCount: 3, contractInteractionCount: 2 }))).toBe(66);
    expect(contractInteractionPct(record({ transactionCount: 0, contractInteractionCount: 0 }))).toBe(0);
  });

  it("clamps to 100", () => {
    registry.addToBlacklist([A]);
    const history = record({ rapidTransactionCount: 20, failedTransactionCount: 20, contractInteractionCount: 10 });

    expect(score({ address: A, amount: BigInt(5000), now: 0, registry, thresholds, history })).toBe(100);
  });

  it("stays within 0..100 across combinations of inputs", () => {
    const amounts = [BigInt(0), BigInt(999), BigInt(1001), BigInt("18446744073709551615")];
    for (const blacklisted of [false, true]) {
      for (const whitelisted of [false, true]) {
        for (const amount of amounts) {
          for (const rapid of [0, 4, 50]) {
            for (const failed of [0, 4, 50]) {
              for (const contract of [0, 7, 10]) {
                const local = new AddressRegistry();
                if (blacklisted) local.addToBlacklist([A]);
                if (whitelisted) local.addToWhitelist([A]);
                const history = record({
                  rapidTransactionCount: rapid,
                  failedTransactionCount: failed,
                  contractInteractionCount: contract,
                });
                const value = score({ address: A, amount, now: 0, registry: local, thresholds, history });
                expect(value).toBeGreaterThanOrEqual(0);
                expect(value).toBeLessThanOrEqual(100);
              }
            }
          }
        }
      }
    }
  });
});

describe("blendScores", () => {
  const config = { aiWeightPct: 30, confidenceFloorPct: 70 };

  it("blends with integer weights", () => {
    expect(blendScores(60, 90, 80, config)).toEqual({
      score: 69,
      ruleScore: 60,
      aiScore: 90,
      aiConfidence: 80,
      applied: true,
      degraded: false,
    });
  });

  it("rounds half up", () => {
    expect(blendScores(50, 55, 90, { aiWeightPct: 50, confidenceFloorPct: 0 }).score).toBe(53);
  });

  it("keeps the rule score below the confidence floor", () => {
    expect(blendScores(60, 90, 69, config)).toEqual({
      score: 60,
      ruleScore: 60,
      aiScore: 90,
      aiConfidence: 69,
      applied: false,
      degraded: false,
    });
  });

  it("applies the blend at exactly the confidence floor", () => {
    expect(blendScores(0, 100, 70, config)).toMatchObject({ score: 30, applied: true });
  });

  it("clamps out-of-range oracle scores", () => {
    expect(blendScores(100, 250, 100, { aiWeightPct: 100, confidenceFloorPct: 0 }).score).toBe(100);
  });
});

describe("ruleOnlyOutcome", () => {
  it("reports the rule score without oracle fields", () => {
    expect(ruleOnlyOutcome(42, true)).toEqual({ score: 42, ruleScore: 42, applied: false, degraded: true });
  });
});
