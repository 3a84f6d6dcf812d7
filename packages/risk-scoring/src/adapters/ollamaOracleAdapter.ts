import { OracleResponseError } from "../errors";
import { normalizeOracleResponse } from "../normalize";
import { extractJsonObject, validateOracleResponse } from "../schema";
import { OracleContext, OracleRequest, RiskOracleAdapter } from "../types";
import { postJson } from "./http";

export interface OllamaOracleAdapterOptions {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

export class OllamaOracleAdapter implements RiskOracleAdapter {
  public readonly name = "ollama-http";

  public constructor(private readonly options: OllamaOracleAdapterOptions) {}

  public async assess(request: OracleRequest) {
    const startedAt = Date.now();

    const raw = await postJson({
      url: `${this.options.baseUrl}/api/generate`,
      body: {
        model: this.options.model,
        prompt: OllamaOracleAdapter.buildPrompt(request.context),
        stream: false,
        options: {
          temperature: 0.3,
          num_predict: 1000,
          top_p: 0.9,
          top_k: 40,
        },
      },
      timeoutMs: this.options.timeoutMs ?? 15000,
      signal: request.signal,
    });

    const text =
      raw && typeof raw === "object" && "response" in raw && typeof raw.response === "string" ? raw.response : undefined;
    if (!text) {
      throw new OracleResponseError("Ollama response missing generated text");
    }

    const response = validateOracleResponse(extractJsonObject(text));
    return normalizeOracleResponse(response, this.options.model, request.requestHash, startedAt);
  }

  public static buildPrompt(context: OracleContext): string {
    return `
Assess the scam risk of this blockchain transfer.

TRANSFER:
${JSON.stringify(
  {
    transactionRef: context.transactionRef,
    sender: context.sender,
    recipient: context.recipient,
    amount: context.amount,
    category: context.category,
    timestamp: context.timestamp,
    ruleScore: context.ruleScore,
  },
  null,
  2
)}

SENDER AGGREGATES:
${JSON.stringify(context.senderHistory, null, 2)}

RECIPIENT AGGREGATES:
${JSON.stringify(context.recipientHistory, null, 2)}

THRESHOLDS:
${JSON.stringify(context.thresholds, null, 2)}

Answer with a single JSON object and nothing else:
{
  "riskScore": <integer 0-100>,
  "confidence": <integer 0-100>,
  "reasoning": "<short explanation>",
  "patterns": ["<pattern id>"],
  "recommendations": ["<recommendation>"]
}
`.trim();
  }
}
