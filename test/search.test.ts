import test from "node:test";
import assert from "node:assert/strict";
import { SEARCH_URL } from "../src/constants.js";
import { extractRecords, NixSearchError, searchNixPackages, type FetchLike } from "../src/search/client.js";
import { buildSearchQuery } from "../src/search/query.js";

interface FetchCall {
  url: string;
  init: RequestInit;
}

function recordingFetch(respond: () => Response | Promise<Response>): { fetchImpl: FetchLike; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return respond();
  };
  return { fetchImpl, calls };
}

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), init);
}

void test("buildSearchQuery weights fields and filters to packages", () => {
  assert.deepEqual(buildSearchQuery("ripgrep"), {
    from: 0,
    size: 50,
    query: {
      bool: {
        must: [
          {
            multi_match: {
              query: "ripgrep",
              fields: ["package_attr_name^3", "package_programs^2", "package_pname^2", "package_description"],
            },
          },
        ],
        filter: [{ term: { type: { value: "package" } } }],
      },
    },
    sort: [{ _score: "desc" }, { package_attr_name: "asc" }],
  });
});

void test("buildSearchQuery passes the text through untouched", () => {
  const query = buildSearchQuery('  "quoted" text ', 10);

  assert.equal(query.size, 10);
  assert.equal(query.query.bool.must[0]?.multi_match.query, '  "quoted" text ');
});

void test("extractRecords returns hit sources and skips malformed hits", () => {
  const records = extractRecords({
    hits: { hits: [{ _source: { package_attr_name: "a" } }, { _id: "no-source" }, null, { _source: "x" }] },
  });

  assert.deepEqual(records, [{ package_attr_name: "a" }]);
  assert.deepEqual(extractRecords({ error: "boom" }), []);
});

void test("searchNixPackages posts the query as JSON", async () => {
  const { fetchImpl, calls } = recordingFetch(() =>
    jsonResponse({ hits: { hits: [{ _source: { package_attr_name: "git", package_pversion: "2.44.0" } }] } })
  );

  const records = await searchNixPackages("git", { fetchImpl });

  assert.deepEqual(records, [{ package_attr_name: "git", package_pversion: "2.44.0" }]);
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, SEARCH_URL);
  assert.equal(calls[0]?.init.method, "POST");
  assert.equal(calls[0]?.init.body, JSON.stringify(buildSearchQuery("git")));
});

void test("searchNixPackages sends an authorization header when given", async () => {
  const { fetchImpl, calls } = recordingFetch(() => jsonResponse({ hits: { hits: [] } }));

  await searchNixPackages("git", { fetchImpl, url: "https://search.example.test/_search", authorization: "Basic dGVzdA==" });

  assert.equal(calls[0]?.url, "https://search.example.test/_search");
  assert.deepEqual(calls[0]?.init.headers, {
    "Content-Type": "application/json",
    Accept: "application/json",
    Authorization: "Basic dGVzdA==",
  });
});

void test("an empty hit list is not an error", async () => {
  const { fetchImpl } = recordingFetch(() => jsonResponse({ hits: { total: { value: 0 }, hits: [] } }));

  assert.deepEqual(await searchNixPackages("zzzz", { fetchImpl }), []);
});

void test("non-2xx responses raise a network error with the status", async () => {
  const { fetchImpl } = recordingFetch(() =>
    jsonResponse({ error: "down" }, { status: 503, statusText: "Service Unavailable" })
  );

  await assert.rejects(searchNixPackages("git", { fetchImpl }), (error: unknown) => {
    assert.ok(error instanceof NixSearchError);
    assert.equal(error.kind, "network");
    assert.equal(error.status, 503);
    assert.equal(error.message, "Search failed: HTTP 503 Service Unavailable");
    return true;
  });
});

void test("transport failures raise a network error", async () => {
  const fetchImpl: FetchLike = () => Promise.reject(new Error("getaddrinfo ENOTFOUND"));

  await assert.rejects(searchNixPackages("git", { fetchImpl }), {
    name: "NixSearchError",
    message: "Search failed: getaddrinfo ENOTFOUND",
  });
});

void test("slow responses are aborted after the timeout", async () => {
  const fetchImpl: FetchLike = (_url, init) =>
    new Promise((_resolve, reject) => {
      init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    });

  await assert.rejects(searchNixPackages("git", { fetchImpl, timeoutMs: 20 }), {
    name: "NixSearchError",
    message: "Search timed out after 0.02s",
  });
});

void test("a body that stalls after the headers still times out", async () => {
  const stalled = Object.assign(new Response(null, { status: 200 }), {
    json: () => new Promise<unknown>(() => undefined),
  });
  const { fetchImpl } = recordingFetch(() => stalled);

  await assert.rejects(searchNixPackages("git", { fetchImpl, timeoutMs: 30 }), {
    name: "NixSearchError",
    message: "Search timed out after 0.03s",
  });
});

void test("malformed JSON raises a network error", async () => {
  const { fetchImpl } = recordingFetch(() => new Response("<html>", { status: 200 }));

  await assert.rejects(searchNixPackages("git", { fetchImpl }), {
    name: "NixSearchError",
    message: "Failed to parse search response",
  });
});
