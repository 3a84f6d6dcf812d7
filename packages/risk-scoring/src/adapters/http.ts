import { OracleResponseError } from "../errors";

export interface PostJsonOptions {
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * POSTs a JSON body and returns the parsed JSON reply. Aborts on its own
 * timeout or when the caller's signal fires.
 */
export async function postJson({ url, body, headers, timeoutMs, signal }: PostJsonOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  }
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...headers,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new OracleResponseError(`Oracle request failed with status ${response.status}`);
    }

    return await response.json();
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
}
