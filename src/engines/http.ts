import { setTimeout as delay } from "node:timers/promises";

import type { ZodType, ZodTypeDef } from "zod";

import { EngineCallError } from "../errors.js";

/** Statuses worth another attempt: throttling and gateway hiccups. */
export function isRetriableStatus(status: number | null): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}

export interface JsonRequest<T> {
  readonly engine: string;
  readonly url: URL;
  readonly init: RequestInit;
  readonly schema: ZodType<T, ZodTypeDef, unknown>;
  /** Per-request budget enforced on top of the caller's signal. */
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  /** Extra attempts for retriable statuses. */
  readonly maxRetries?: number;
  /** Skips the content-type check for APIs that mislabel their JSON. */
  readonly lenientContentType?: boolean;
}

/**
 * Performs a JSON request and validates the payload. Every failure surfaces
 * as an {@link EngineCallError}: HTTP statuses keep their code, schema
 * mismatches and network errors carry the original error as `cause`.
 */
export async function requestJson<T>(fetchImpl: typeof fetch, request: JsonRequest<T>): Promise<T> {
  const maxAttempts = Math.max(1, (request.maxRetries ?? 0) + 1);
  for (let attempt = 1; ; attempt += 1) {
    try {
      const response = await performRequest(fetchImpl, request);
      return await parseJson(response, request);
    } catch (error) {
      const status = error instanceof EngineCallError ? error.status : null;
      if (attempt >= maxAttempts || !isRetriableStatus(status) || request.signal?.aborted) {
        throw error;
      }
      try {
        await delay(150 * attempt + Math.floor(Math.random() * 100), undefined, { signal: request.signal });
      } catch (abortError) {
        throw new EngineCallError(request.engine, "request cancelled", { cause: abortError });
      }
    }
  }
}

async function performRequest<T>(fetchImpl: typeof fetch, request: JsonRequest<T>): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
  const forwardAbort = () => controller.abort();
  request.signal?.addEventListener("abort", forwardAbort, { once: true });
  if (request.signal?.aborted) {
    controller.abort();
  }

  try {
    const response = await fetchImpl(request.url, { ...request.init, signal: controller.signal });
    if (!response.ok) {
      throw new EngineCallError(request.engine, `HTTP ${response.status}`, { status: response.status });
    }
    return response;
  } catch (error) {
    if (error instanceof EngineCallError) {
      throw error;
    }
    if (controller.signal.aborted) {
      const reason = request.signal?.aborted ? "request cancelled" : `request timed out after ${request.timeoutMs}ms`;
      throw new EngineCallError(request.engine, reason, { cause: error });
    }
    throw new EngineCallError(request.engine, "network request failed", { cause: error });
  } finally {
    clearTimeout(timeout);
    request.signal?.removeEventListener("abort", forwardAbort);
  }
}

async function parseJson<T>(response: Response, request: JsonRequest<T>): Promise<T> {
  const contentType = response.headers.get("content-type") ?? "";
  if (!request.lenientContentType && !contentType.includes("json")) {
    throw new EngineCallError(request.engine, "response is not JSON", { status: response.status });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new EngineCallError(request.engine, "unable to parse JSON payload", { status: response.status, cause: error });
  }

  const parsed = request.schema.safeParse(payload);
  if (!parsed.success) {
    throw new EngineCallError(request.engine, "payload did not match the expected schema", {
      status: response.status,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Collapses whitespace and drops the markup some engines leave in snippets. */
export function cleanSnippet(value: string | null | undefined): string {
  if (!value) {
    return "";
  }
  return value
    .replace(/<[^>]+>/g, "")
    .replace(/\s+/g, " ")
    .trim();
}
