import { BackendError, classifyStatus, toBackendError } from "./errors.js";
import type { ProviderName } from "./types.js";

/**
 * fetch() wrapper shared by the REST adapters: connection failures and
 * non-2xx responses become BackendErrors.
 */
export async function requestJson(
  provider: ProviderName,
  url: string,
  init: { method?: "GET" | "POST"; body?: unknown; signal?: AbortSignal } = {},
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: init.method ?? (init.body === undefined ? "GET" : "POST"),
      headers: { "Content-Type": "application/json" },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: init.signal,
    });
  } catch (error) {
    throw toBackendError(error, provider);
  }

  if (!response.ok) {
    const errorBody = await response
      .text()
      .catch((error: unknown) => (error instanceof Error ? error.message : ""));
    throw new BackendError(
      `${provider} API error ${response.status}: ${errorBody}`.trim(),
      {
        kind: classifyStatus(response.status),
        provider,
        statusCode: response.status,
      },
    );
  }

  return response;
}

/**
 * Decode a streamed body into lines, holding back a trailing partial line
 * until the next chunk arrives.
 */
export async function* readLines(
  response: Response,
  provider: ProviderName,
): AsyncGenerator<string> {
  const reader = response.body?.getReader();
  if (!reader) {
    throw new BackendError(`No response body from ${provider}`, {
      kind: "unavailable",
      provider,
    });
  }

  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        yield line;
      }
    }
    buffer += decoder.decode();
    if (buffer) yield buffer;
  } catch (error) {
    throw toBackendError(error, provider);
  } finally {
    reader.releaseLock();
  }
}
