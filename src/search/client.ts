/**
 * NixOS package search over HTTP
 */
import { SEARCH_URL, TIMEOUTS } from "../constants.js";
import type { FailureKind, PackageRecord } from "../types/index.js";
import { buildSearchQuery } from "./query.js";

export class NixSearchError extends Error {
  readonly kind: Extract<FailureKind, "network"> = "network";
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "NixSearchError";
    this.status = options?.status;
  }
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface SearchOptions {
  url?: string;
  timeoutMs?: number;
  authorization?: string | undefined;
  fetchImpl?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Pull `hits.hits[]._source` out of a search response, skipping hits that
 * have no object source.
 */
export function extractRecords(body: unknown): PackageRecord[] {
  if (!isRecord(body) || !isRecord(body.hits) || !Array.isArray(body.hits.hits)) {
    return [];
  }

  const hits: unknown[] = body.hits.hits;
  return hits.map((hit) => (isRecord(hit) ? hit._source : undefined)).filter(isRecord);
}

/**
 * Reject with the signal's reason once it aborts, even when `promise` itself
 * never settles (a response body that stalls after the headers).
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

export async function searchNixPackages(query: string, options: SearchOptions = {}): Promise<PackageRecord[]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.search;
  const timedOut = `Search timed out after ${timeoutMs / 1000}s`;
  // Covers the whole request, body included
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json",
  };
  if (options.authorization) {
    headers.Authorization = options.authorization;
  }

  try {
    let res: Response;
    try {
      res = await fetchImpl(options.url ?? SEARCH_URL, {
        method: "POST",
        headers,
        body: JSON.stringify(buildSearchQuery(query)),
        signal: controller.signal,
      });
    } catch (error) {
      const message = controller.signal.aborted
        ? timedOut
        : `Search failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new NixSearchError(message, { cause: error });
    }

    if (!res.ok) {
      throw new NixSearchError(`Search failed: HTTP ${res.status} ${res.statusText}`.trim(), {
        status: res.status,
      });
    }

    let body: unknown;
    try {
      body = await untilAborted<unknown>(res.json(), controller.signal);
    } catch (error) {
      throw new NixSearchError(controller.signal.aborted ? timedOut : "Failed to parse search response", {
        cause: error,
      });
    }

    return extractRecords(body);
  } finally {
    clearTimeout(timer);
  }
}
