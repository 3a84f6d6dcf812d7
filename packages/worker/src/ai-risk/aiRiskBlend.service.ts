import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  AiBlendConfig,
  blendScores,
  BlendOutcome,
  createRequestHash,
  OllamaOracleAdapter,
  OpenAiOracleAdapter,
  ORACLE_CONTEXT_VERSION,
  OracleAssessment,
  OracleContext,
  OracleTimeoutError,
  RiskOracleAdapter,
  ruleOnlyOutcome,
  RulesOracleAdapter,
} from "risk-scoring";
import { AiScoringConfig } from "../config";

export const RISK_ORACLE_ADAPTER = Symbol("RISK_ORACLE_ADAPTER");

interface CachedAssessment {
  assessment: OracleAssessment;
  storedAt: number;
}

const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export function selectOracleAdapter(config: AiScoringConfig, logger: Logger): RiskOracleAdapter {
  const mode = config.adapterMode ?? "offline";
  const apiKey = config.openAi.apiKey;
  const ollamaReady = !!config.ollama.baseUrl && !!config.ollama.model;
  const timeoutMs = config.blend.maxWaitMs;

  if ((mode === "openai" || mode === "auto") && apiKey && config.openAi.model) {
    logger.log("AI risk blend using OpenAI HTTP adapter");
    return new OpenAiOracleAdapter({
      apiKey,
      baseUrl: config.openAi.baseUrl,
      model: config.openAi.model,
      organization: config.openAi.organization,
      timeoutMs,
    });
  }

  if ((mode === "ollama" || mode === "auto") && ollamaReady) {
    logger.log("AI risk blend using Ollama HTTP adapter");
    return new OllamaOracleAdapter({ baseUrl: config.ollama.baseUrl, model: config.ollama.model, timeoutMs });
  }

  if (mode === "openai" || mode === "ollama") {
    logger.warn({ mode }, "AI oracle adapter selected but not configured; falling back to offline rules adapter");
  } else {
    logger.log("AI risk blend using offline rules adapter");
  }
  return new RulesOracleAdapter();
}

@Injectable()
export class AiRiskBlendService {
  private readonly logger = new Logger(AiRiskBlendService.name);
  private readonly adapter: RiskOracleAdapter;
  private readonly cacheTtlMs: number;
  private readonly cache = new Map<string, CachedAssessment>();

  public constructor(
    configService: ConfigService,
    @Optional() @Inject(RISK_ORACLE_ADAPTER) adapter?: RiskOracleAdapter
  ) {
    const config = configService.get<AiScoringConfig>("aiScoring");
    this.cacheTtlMs = config?.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.adapter = adapter ?? (config ? selectOracleAdapter(config, this.logger) : new RulesOracleAdapter());
  }

  public get adapterName(): string {
    return this.adapter.name;
  }

  /**
   * Blends each rule score with a single oracle opinion on the transaction.
   * Never throws: oracle failures and timeouts degrade to the rule scores.
   */
  public async blend(ruleScores: number[], context: OracleContext, config: AiBlendConfig): Promise<BlendOutcome[]> {
    if (!config.enabled) {
      return ruleScores.map((ruleScore) => ruleOnlyOutcome(ruleScore, false));
    }

    const requestHash = createRequestHash(ORACLE_CONTEXT_VERSION, context);

    try {
      const assessment = await this.assess(requestHash, context, config.maxWaitMs);
      const outcomes = ruleScores.map((ruleScore) =>
        blendScores(ruleScore, assessment.riskScore, assessment.confidence, config)
      );
      this.logger.debug(
        {
          transactionRef: context.transactionRef,
          model: assessment.model,
          aiScore: assessment.riskScore,
          confidence: assessment.confidence,
          applied: outcomes.some((outcome) => outcome.applied),
        },
        "AI risk assessment received"
      );
      return outcomes;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (config.fallbackOnFailure) {
        this.logger.warn(
          { transactionRef: context.transactionRef, adapter: this.adapter.name, error: reason },
          "AI risk assessment degraded; using rule-based score"
        );
        return ruleScores.map((ruleScore) => ruleOnlyOutcome(ruleScore, true));
      }

      this.logger.error(
        { transactionRef: context.transactionRef, adapter: this.adapter.name, error: reason },
        "AI risk assessment failed with fallback disabled; reporting zero-confidence result"
      );
      return ruleScores.map((ruleScore) => ({ ...ruleOnlyOutcome(ruleScore, true), aiConfidence: 0 }));
    }
  }

  private async assess(requestHash: string, context: OracleContext, maxWaitMs: number): Promise<OracleAssessment> {
    const cached = this.cache.get(requestHash);
    if (cached && Date.now() - cached.storedAt < this.cacheTtlMs) {
      return cached.assessment;
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new OracleTimeoutError(maxWaitMs));
      }, maxWaitMs);
    });

    try {
      const assessment = await Promise.race([
        this.adapter.assess({ requestHash, context, signal: controller.signal }),
        timeout,
      ]);
      this.cache.set(requestHash, { assessment, storedAt: Date.now() });
      this.evictExpired();
      return assessment;
    } finally {
      clearTimeout(timer);
    }
  }

  private evictExpired() {
    const now = Date.now();
    for (const [key, entry] of this.cache) {
      if (now - entry.storedAt >= this.cacheTtlMs) {
        this.cache.delete(key);
      }
    }
  }
}
