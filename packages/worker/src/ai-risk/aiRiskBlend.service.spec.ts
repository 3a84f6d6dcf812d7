import { Logger } from "@nestjs/common";
import {
  AddressRegistry,
  AiBlendConfig,
  buildOracleContext,
  DEFAULT_AI_BLEND_CONFIG,
  DEFAULT_RISK_THRESHOLDS,
  OracleAssessment,
  OracleContext,
  OracleRequest,
} from "risk-scoring";
import { AiScoringConfig } from "../config";
import { buildConfigService } from "../testing/configFixture";
import { AiRiskBlendService, selectOracleAdapter } from "./aiRiskBlend.service";

const context: OracleContext = buildOracleContext({
  transaction: {
    transactionRef: "tx-1",
    sender: "0xaaa",
    recipient: "0xbbb",
    amount: BigInt(2000),
    category: "send",
    timestamp: Date.UTC(2024, 0, 1, 12),
  },
  ruleScore: 25,
  registry: new AddressRegistry(),
  thresholds: DEFAULT_RISK_THRESHOLDS,
});

const enabled: AiBlendConfig = { ...DEFAULT_AI_BLEND_CONFIG, enabled: true, maxWaitMs: 50 };

const assessment = (overrides: Partial<OracleAssessment> = {}): OracleAssessment => ({
  riskScore: 90,
  confidence: 80,
  reasoning: "test",
  patterns: [],
  recommendations: [],
  model: "mock",
  requestHash: "hash",
  processingTimeMs: 1,
  ...overrides,
});

function mockAdapter(assess: (request: OracleRequest) => Promise<OracleAssessment>) {
  return { name: "mock", assess: jest.fn(assess) };
}

describe("AiRiskBlendService", () => {
  it("does not consult the oracle when disabled", async () => {
    const adapter = mockAdapter(async () => assessment());
    const service = new AiRiskBlendService(buildConfigService(), adapter);

    const outcomes = await service.blend([25, 40], context, DEFAULT_AI_BLEND_CONFIG);

    expect(outcomes).toEqual([
      { score: 25, ruleScore: 25, applied: false, degraded: false },
      { score: 40, ruleScore: 40, applied: false, degraded: false },
    ]);
    expect(adapter.assess).not.toHaveBeenCalled();
  });

  it("blends every party with one oracle assessment", async () => {
    const adapter = mockAdapter(async () => assessment());
    const service = new AiRiskBlendService(buildConfigService(), adapter);

    const outcomes = await service.blend([25, 0], context, enabled);

    expect(outcomes).toEqual([
      { score: 45, ruleScore: 25, aiScore: 90, aiConfidence: 80, applied: true, degraded: false },
      { score: 27, ruleScore: 0, aiScore: 90, aiConfidence: 80, applied: true, degraded: false },
    ]);
    expect(adapter.assess).toHaveBeenCalledTimes(1);
  });

  it("keeps the rule score under the confidence floor", async () => {
    const service = new AiRiskBlendService(
      buildConfigService(),
      mockAdapter(async () => assessment({ confidence: 40 }))
    );

    const [outcome] = await service.blend([25], context, enabled);

    expect(outcome).toEqual({ score: 25, ruleScore: 25, aiScore: 90, aiConfidence: 40, applied: false, degraded: false });
  });

  it("reuses a cached assessment for the same context", async () => {
    const adapter = mockAdapter(async () => assessment());
    const service = new AiRiskBlendService(buildConfigService(), adapter);

    await service.blend([25], context, enabled);
    await service.blend([25], context, enabled);
    await service.blend([25], { ...context, ruleScore: 30 }, enabled);

    expect(adapter.assess).toHaveBeenCalledTimes(2);
  });

  it("reuses a cached assessment across transactions with the same features", async () => {
    const adapter = mockAdapter(async () => assessment());
    const service = new AiRiskBlendService(buildConfigService(), adapter);

    await service.blend([25], context, enabled);
    const [outcome] = await service.blend([25], { ...context, transactionRef: "tx-2" }, enabled);

    expect(outcome).toEqual({ score: 45, ruleScore: 25, aiScore: 90, aiConfidence: 80, applied: true, degraded: false });
    expect(adapter.assess).toHaveBeenCalledTimes(1);
  });

  it("falls back to the rule score on oracle failure", async () => {
    const service = new AiRiskBlendService(
      buildConfigService(),
      mockAdapter(async () => {
        throw new Error("connection refused");
      })
    );

    expect(await service.blend([25], context, enabled)).toEqual([
      { score: 25, ruleScore: 25, applied: false, degraded: true },
    ]);
  });

  it("reports zero confidence when fallback is disabled", async () => {
    const service = new AiRiskBlendService(
      buildConfigService(),
      mockAdapter(async () => {
        throw new Error("connection refused");
      })
    );

    expect(await service.blend([25], context, { ...enabled, fallbackOnFailure: false })).toEqual([
      { score: 25, ruleScore: 25, aiConfidence: 0, applied: false, degraded: true },
    ]);
  });

  it("aborts the oracle call after maxWaitMs", async () => {
    let signal: AbortSignal | undefined;
    const adapter = mockAdapter((request) => {
      signal = request.signal;
      return new Promise<OracleAssessment>(() => undefined);
    });
    const service = new AiRiskBlendService(buildConfigService(), adapter);

    const outcomes = await service.blend([25], context, { ...enabled, maxWaitMs: 10 });

    expect(outcomes).toEqual([{ score: 25, ruleScore: 25, applied: false, degraded: true }]);
    expect(signal?.aborted).toBe(true);
  });
});

describe("selectOracleAdapter", () => {
  const logger = new Logger("selectOracleAdapter");
  const base: AiScoringConfig = {
    blend: { ...DEFAULT_AI_BLEND_CONFIG },
    adapterMode: "auto",
    cacheTtlMs: 60000,
    openAi: { baseUrl: "https://api.test/v1", model: "gpt-test" },
    ollama: { baseUrl: "", model: "llama3" },
  };

  it("prefers OpenAI when a key is configured", () => {
    const adapter = selectOracleAdapter({ ...base, openAi: { ...base.openAi, apiKey: "test-secret" } }, logger);
    expect(adapter.name).toBe("openai-http");
  });

  it("uses Ollama when it has a base URL", () => {
    const adapter = selectOracleAdapter({ ...base, ollama: { baseUrl: "http://ollama.test", model: "llama3" } }, logger);
    expect(adapter.name).toBe("ollama-http");
  });

  it("falls back to the offline adapter when the requested one is not configured", () => {
    expect(selectOracleAdapter({ ...base, adapterMode: "openai" }, logger).name).toBe("rules-offline");
    expect(selectOracleAdapter(base, logger).name).toBe("rules-offline");
  });

  it("honours the offline mode even with credentials", () => {
    const adapter = selectOracleAdapter(
      { ...base, adapterMode: "offline", openAi: { ...base.openAi, apiKey: "test-secret" } },
      logger
    );
    expect(adapter.name).toBe("rules-offline");
  });
});
