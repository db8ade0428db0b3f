import { vi } from "vitest";

export type FetchInput = string | URL | Request;

export function urlOf(input: FetchInput): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.toString() : input.url;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/geo+json" }
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/** Stubs global fetch; unmatched URLs get a 404. */
export function stubFetch(route: (url: string) => Response | undefined) {
  const fetchMock = vi.fn(async (input: FetchInput, _init?: RequestInit) => route(urlOf(input)) ?? textResponse("Not Found", 404));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}
