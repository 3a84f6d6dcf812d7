import { OracleResponseError } from "../errors";
import { normalizeOracleResponse } from "../normalize";
import { extractJsonObject, validateOracleResponse } from "../schema";
import { OracleRequest, RiskOracleAdapter } from "../types";
import { postJson } from "./http";

export interface OpenAiOracleAdapterOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  organization?: string;
  timeoutMs?: number;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function records(value: unknown): JsonRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export class OpenAiOracleAdapter implements RiskOracleAdapter {
  public readonly name = "openai-http";

  private static readonly SYSTEM_PROMPT = `
You are an on-chain fraud analyst reviewing a single wallet transfer. You receive the transfer, a rule-based score and
rolling aggregates for the sender and the recipient.
- Return riskScore and confidence as integers in [0,100].
- Prefer these pattern ids when they fit: rapid_transactions, large_transfer, unusual_timing, round_amounts,
  new_address, high_frequency, suspicious_contract, blacklisted_address.
- Keep "reasoning" short and tied to concrete values from the supplied data. Do not invent details.
- If data is thin, keep confidence below 50.
Respond strictly in the JSON schema provided.`;

  public constructor(private readonly options: OpenAiOracleAdapterOptions) {}

  public async assess(request: OracleRequest) {
    const startedAt = Date.now();

    const payload = {
      model: this.options.model,
      temperature: 0.1,
      max_output_tokens: 800,
      response_format: {
        type: "json_schema",
        json_schema: {
          name: "wallet_risk_assessment",
          schema: {
            type: "object",
            required: ["riskScore", "confidence", "reasoning", "patterns", "recommendations"],
            properties: {
              riskScore: { type: "number" },
              confidence: { type: "number" },
              reasoning: { type: "string" },
              patterns: { type: "array", items: { type: "string" } },
              recommendations: { type: "array", items: { type: "string" } },
            },
          },
        },
      },
      input: [
        {
          role: "system",
          content: [{ type: "text", text: OpenAiOracleAdapter.SYSTEM_PROMPT.trim() }],
        },
        {
          role: "user",
          content: [{ type: "text", text: JSON.stringify(request.context, null, 2) }],
        },
      ],
      metadata: {
        request_hash: request.requestHash,
        caller: "wallet-risk-engine",
      },
    };

    const raw = await postJson({
      url: `${this.options.baseUrl}/responses`,
      body: payload,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        ...(this.options.organization ? { "OpenAI-Organization": this.options.organization } : {}),
      },
      timeoutMs: this.options.timeoutMs ?? 15000,
      signal: request.signal,
    });

    const response = validateOracleResponse(this.extractPayload(raw));
    return normalizeOracleResponse(response, this.options.model, request.requestHash, startedAt);
  }

  private extractPayload(raw: unknown): unknown {
    const output = isRecord(raw) ? records(raw.output) : [];
    const schemaOutput = output.find((item) => item.type === "output_json_schema") ?? output[0];
    const parts = schemaOutput ? records(schemaOutput.content) : [];

    const jsonPart = parts.find((part) => part.type === "output_json_schema" || part.type === "json");
    if (jsonPart && jsonPart.json !== undefined) {
      return jsonPart.json;
    }

    const textPart = parts.find((part) => part.type === "text" || part.type === "output_text");
    if (textPart && typeof textPart.text === "string") {
      return extractJsonObject(textPart.text);
    }

    throw new OracleResponseError("Oracle response missing JSON schema output payload");
  }
}
