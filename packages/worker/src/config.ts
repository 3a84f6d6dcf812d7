import { AiBlendConfig, DEFAULT_AI_BLEND_CONFIG, DEFAULT_RISK_THRESHOLDS, RiskThresholds } from "risk-scoring";

export type OracleAdapterMode = "auto" | "openai" | "ollama" | "offline";

export interface AiScoringConfig {
  blend: AiBlendConfig;
  adapterMode: OracleAdapterMode;
  cacheTtlMs: number;
  openAi: {
    baseUrl: string;
    model: string;
    apiKey?: string;
    organization?: string;
  };
  ollama: {
    baseUrl: string;
    model: string;
  };
}

export interface DetectorConfig {
  adminAddress: string;
  monitoringEnabled: boolean;
  evaluationWindowSize: number;
  eventQueueCapacity: number;
  thresholds: RiskThresholds;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") {
    return fallback;
  }
  return value === "true" || value === "1";
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBigInt(value: string | undefined, fallback: bigint): bigint {
  if (!value) {
    return fallback;
  }
  try {
    return BigInt(value);
  } catch {
    return fallback;
  }
}

function parseAdapterMode(value: string | undefined): OracleAdapterMode {
  return value === "openai" || value === "ollama" || value === "offline" ? value : "auto";
}

export default () => {
  const {
    PORT,
    ADMIN_ADDRESS,
    MONITORING_ENABLED,
    EVALUATION_WINDOW_SIZE,
    EVENT_QUEUE_CAPACITY,
    RAPID_TRANSACTION_WINDOW_MS,
    LARGE_TRANSFER_CUTOFF,
    FAILED_TRANSACTION_CUTOFF,
    CONTRACT_INTERACTION_RATIO_CUTOFF_PCT,
    ROUND_AMOUNT_CLUSTER_CUTOFF,
    ROUND_AMOUNT_UNIT,
    UNUSUAL_HOUR_START,
    UNUSUAL_HOUR_WINDOW,
    NEW_ADDRESS_MAX_TRANSACTIONS,
    AI_ENABLED,
    AI_WEIGHT_PCT,
    AI_CONFIDENCE_FLOOR_PCT,
    AI_MAX_WAIT_MS,
    AI_FALLBACK_ON_FAILURE,
    AI_ADAPTER_MODE,
    AI_CACHE_TTL_MS,
    OPENAI_BASE_URL,
    OPENAI_MODEL,
    OPENAI_API_KEY,
    OPENAI_ORGANIZATION,
    OLLAMA_URL,
    OLLAMA_MODEL,
    DATABASE_URL,
    DATABASE_HOST,
    DATABASE_PORT,
    DATABASE_USER,
    DATABASE_PASSWORD,
    DATABASE_NAME,
    DATABASE_SYNCHRONIZE,
  } = process.env;

  const defaults = DEFAULT_RISK_THRESHOLDS;
  const detector: DetectorConfig = {
    adminAddress: (ADMIN_ADDRESS ?? "").trim().toLowerCase(),
    monitoringEnabled: parseBoolean(MONITORING_ENABLED, true),
    evaluationWindowSize: parseInteger(EVALUATION_WINDOW_SIZE, 50),
    eventQueueCapacity: parseInteger(EVENT_QUEUE_CAPACITY, 10000),
    thresholds: {
      rapidTransactionWindowMs: parseInteger(RAPID_TRANSACTION_WINDOW_MS, defaults.rapidTransactionWindowMs),
      largeTransferCutoff: parseBigInt(LARGE_TRANSFER_CUTOFF, defaults.largeTransferCutoff),
      failedTransactionCutoff: parseInteger(FAILED_TRANSACTION_CUTOFF, defaults.failedTransactionCutoff),
      contractInteractionRatioCutoffPct: parseInteger(
        CONTRACT_INTERACTION_RATIO_CUTOFF_PCT,
        defaults.contractInteractionRatioCutoffPct
      ),
      roundAmountClusterCutoff: parseInteger(ROUND_AMOUNT_CLUSTER_CUTOFF, defaults.roundAmountClusterCutoff),
      roundAmountUnit: parseBigInt(ROUND_AMOUNT_UNIT, defaults.roundAmountUnit),
      unusualHourStart: parseInteger(UNUSUAL_HOUR_START, defaults.unusualHourStart),
      unusualHourWindow: parseInteger(UNUSUAL_HOUR_WINDOW, defaults.unusualHourWindow),
      newAddressMaxTransactions: parseInteger(NEW_ADDRESS_MAX_TRANSACTIONS, defaults.newAddressMaxTransactions),
    },
  };

  const aiScoring: AiScoringConfig = {
    blend: {
      enabled: parseBoolean(AI_ENABLED, DEFAULT_AI_BLEND_CONFIG.enabled),
      aiWeightPct: parseInteger(AI_WEIGHT_PCT, DEFAULT_AI_BLEND_CONFIG.aiWeightPct),
      confidenceFloorPct: parseInteger(AI_CONFIDENCE_FLOOR_PCT, DEFAULT_AI_BLEND_CONFIG.confidenceFloorPct),
      maxWaitMs: parseInteger(AI_MAX_WAIT_MS, DEFAULT_AI_BLEND_CONFIG.maxWaitMs),
      fallbackOnFailure: parseBoolean(AI_FALLBACK_ON_FAILURE, DEFAULT_AI_BLEND_CONFIG.fallbackOnFailure),
    },
    adapterMode: parseAdapterMode(AI_ADAPTER_MODE),
    cacheTtlMs: parseInteger(AI_CACHE_TTL_MS, 5 * 60 * 1000),
    openAi: {
      baseUrl: OPENAI_BASE_URL || "https://api.openai.com/v1",
      model: OPENAI_MODEL || "gpt-4o-mini",
      apiKey: OPENAI_API_KEY || undefined,
      organization: OPENAI_ORGANIZATION || undefined,
    },
    ollama: {
      baseUrl: OLLAMA_URL || "",
      model: OLLAMA_MODEL || "llama3",
    },
  };

  return {
    port: parseInteger(PORT, 3001),
    detector,
    aiScoring,
    typeORM: {
      type: "postgres" as const,
      ...(DATABASE_URL
        ? { url: DATABASE_URL }
        : {
            host: DATABASE_HOST || "localhost",
            port: parseInteger(DATABASE_PORT, 5432),
            username: DATABASE_USER || "postgres",
            password: DATABASE_PASSWORD || "postgres",
            database: DATABASE_NAME || "wallet-risk",
          }),
      synchronize: parseBoolean(DATABASE_SYNCHRONIZE, false),
      migrationsRun: true,
    },
  };
};
