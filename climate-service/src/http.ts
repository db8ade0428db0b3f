import { UpstreamUnavailableError } from "./errors.js";

const DEFAULT_TIMEOUT_MS = 10_000;

export type UpstreamRequest = {
  /** Provider name used in error messages. */
  upstream: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
};

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function isTimeout(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("name" in err)) return false;
  return err.name === "TimeoutError" || err.name === "AbortError";
}

/** Network, abort and timeout failures, whether raised by the request or while the body streams. */
function transportError(err: unknown, upstream: string, timeoutMs: number, reading: boolean): UpstreamUnavailableError {
  if (isTimeout(err)) {
    return new UpstreamUnavailableError(`${upstream} did not respond within ${timeoutMs}ms`, { cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  const message = reading ? `${upstream} response was interrupted: ${detail}` : `${upstream} is unreachable: ${detail}`;
  return new UpstreamUnavailableError(message, { cause: err });
}

function timeoutFor(options: UpstreamRequest): number {
  return options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
}

/**
 * GET with the provider error policy applied. Resolves `null` on 404 so callers
 * can decide whether absence means "not found" or "try the next candidate".
 */
export async function requestUpstream(url: string, options: UpstreamRequest): Promise<Response | null> {
  const timeoutMs = timeoutFor(options);
  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: options.headers,
      signal: AbortSignal.timeout(timeoutMs)
    });
  }
  catch (err) {
    throw transportError(err, options.upstream, timeoutMs, false);
  }

  if (response.status === 404) return null;
  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new UpstreamUnavailableError(
      `${options.upstream} request failed (${response.status}): ${text || response.statusText}`,
      { status: response.status, retryable: isTransientStatus(response.status) }
    );
  }
  return response;
}

async function readBody(response: Response, options: UpstreamRequest): Promise<string> {
  try {
    return await response.text();
  }
  catch (err) {
    throw transportError(err, options.upstream, timeoutFor(options), true);
  }
}

export async function fetchText(url: string, options: UpstreamRequest): Promise<string | null> {
  const response = await requestUpstream(url, options);
  if (!response) return null;
  return readBody(response, options);
}

export async function fetchJson<T>(url: string, options: UpstreamRequest): Promise<T | null> {
  const text = await fetchText(url, options);
  if (text === null) return null;
  try {
    return JSON.parse(text) as T;
  }
  catch (err) {
    throw new UpstreamUnavailableError(`${options.upstream} returned malformed JSON`, { cause: err, retryable: false });
  }
}
