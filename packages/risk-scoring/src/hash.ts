import crypto from "node:crypto";
import { OracleContext } from "./types";

export const ORACLE_CONTEXT_VERSION = "wallet-risk-context/v1";

/** JSON text with object keys sorted at every depth and undefined members omitted. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }

  if (value && typeof value === "object") {
    const members = Object.keys(value)
      .sort()
      .flatMap((key) => {
        const member: unknown = Reflect.get(value, key);
        return member === undefined ? [] : [`${JSON.stringify(key)}:${stableStringify(member)}`];
      });
    return `{${members.join(",")}}`;
  }

  return JSON.stringify(value);
}

/**
 * Cache key for an oracle assessment. Covers the context's features only: the
 * transaction reference is left out and the timestamp reduced to its UTC hour.
 */
export function createRequestHash(contextVersion: string, context: OracleContext): string {
  const features = {
    ...context,
    transactionRef: undefined,
    timestamp: new Date(context.timestamp).getUTCHours(),
  };
  return crypto.createHash("sha256").update(`${contextVersion}:${stableStringify(features)}`).digest("hex");
}
