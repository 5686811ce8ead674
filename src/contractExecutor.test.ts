import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildHeaders,
  executeCase,
  resolveTimeoutMs,
} from "./contractExecutor.js";
import { compilePath } from "./jsonPath.js";
import type { Case, Contract, SystemConfig } from "./types.js";

const contract: Contract = {
  protocol: "http",
  method: "POST",
  bodyPath: compilePath("$"),
  outputPath: compilePath("$.answer"),
  headers: { "x-suite": "arith" },
};

const system: SystemConfig = {
  name: "alpha",
  endpoint: "http://localhost:9000/answer",
};

const testCase: Case = {
  id: "c1",
  input: { question: "2+2?" },
  reference: "4",
};

const options = { defaultTimeoutMs: 1_000 };

const jsonResponse = (body: string) => new Response(body, { status: 200 });

describe("executeCase", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the case input and extracts the prediction", async () => {
    mockFetch.mockResolvedValue(jsonResponse('{"answer":"4"}'));

    const outcome = await executeCase(contract, system, testCase, options);

    expect(outcome).toEqual({ ok: true, predicted: "4" });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("http://localhost:9000/answer");
    expect(init).toMatchObject({
      method: "POST",
      body: '{"question":"2+2?"}',
      headers: {
        "content-type": "application/json",
        accept: "application/json",
        "x-suite": "arith",
      },
    });
  });

  it("sends one value per header whatever the case of its name", async () => {
    mockFetch.mockResolvedValue(jsonResponse('{"answer":"4"}'));

    await executeCase(
      {
        ...contract,
        headers: {
          Authorization: "Bearer contract",
          "Content-Type": "text/plain",
        },
      },
      { ...system, headers: { authorization: "Bearer system" } },
      testCase,
      options,
    );

    const sent = new Headers(mockFetch.mock.calls[0][1].headers);
    expect(sent.get("authorization")).toBe("Bearer system");
    expect(sent.get("content-type")).toBe("text/plain");
  });

  it("sends only the part of the input the body path selects", async () => {
    mockFetch.mockResolvedValue(jsonResponse('{"answer":null}'));

    const outcome = await executeCase(
      { ...contract, bodyPath: compilePath("$.question") },
      system,
      testCase,
      options,
    );

    expect(outcome).toEqual({ ok: true, predicted: null });
    expect(mockFetch.mock.calls[0][1]).toMatchObject({ body: '"2+2?"' });
  });

  it("classifies a body that is not JSON as a parse error", async () => {
    mockFetch.mockResolvedValue(jsonResponse("oops"));

    const outcome = await executeCase(contract, system, testCase, options);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("parse_error");
      expect(outcome.error.message).toMatch(
        /^response from http:\/\/localhost:9000\/answer is not valid JSON/,
      );
      expect(outcome.error.message.endsWith(': "oops"')).toBe(true);
    }
  });

  it("reports an oversized number apart from invalid JSON", async () => {
    const body = '{"answer":"4","score":1e400}';
    mockFetch.mockResolvedValue(jsonResponse(body));

    const outcome = await executeCase(contract, system, testCase, options);

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: "parse_error",
        message:
          "response from http://localhost:9000/answer could not be " +
          "represented: a number is too large to represent " +
          `(overflows to Infinity): ${JSON.stringify(body)}`,
      },
    });
  });

  it("classifies a non-2xx status as an http error", async () => {
    const response = new Response("busy", { status: 503 });
    mockFetch.mockResolvedValue(response);

    const outcome = await executeCase(contract, system, testCase, options);

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: "http_error",
        status: 503,
        message: "http://localhost:9000/answer responded with status 503",
      },
    });
    expect(response.bodyUsed).toBe(true);
  });

  it("classifies a failed connection as a network error", async () => {
    mockFetch.mockRejectedValue(
      new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } }),
    );

    const outcome = await executeCase(contract, system, testCase, options);

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: "network_error",
        message:
          "request to http://localhost:9000/answer failed: " +
          "fetch failed (ECONNREFUSED)",
      },
    });
  });

  it("aborts a request that outlives its timeout", async () => {
    mockFetch.mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => {
            reject(new Error("This operation was aborted"));
          });
        }),
    );

    const outcome = await executeCase(
      contract,
      { ...system, timeoutMs: 20 },
      testCase,
      options,
    );

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: "network_error",
        message: "request to http://localhost:9000/answer timed out after 20ms",
      },
    });
  });

  it("reports an output path the response does not contain", async () => {
    mockFetch.mockResolvedValue(jsonResponse('{"result":"4"}'));

    const outcome = await executeCase(contract, system, testCase, options);

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: "extraction_error",
        message:
          "output path $.answer did not resolve: " +
          "field 'answer' not found at $.answer",
      },
    });
  });

  it("does not call the system when the body path misses", async () => {
    const outcome = await executeCase(
      { ...contract, bodyPath: compilePath("$.prompt") },
      system,
      testCase,
      options,
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("extraction_error");
    }
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe("request settings", () => {
  it("lets system headers override contract headers", () => {
    expect(
      buildHeaders(
        { headers: { "x-suite": "a", accept: "text/plain" } },
        { headers: { "x-suite": "b" } },
      ),
    ).toEqual({
      "content-type": "application/json",
      accept: "text/plain",
      "x-suite": "b",
    });
  });

  it("merges header names without regard to case", () => {
    expect(
      buildHeaders(
        {
          headers: {
            Authorization: "Bearer contract",
            "Content-Type": "text/plain",
          },
        },
        { headers: { authorization: "Bearer system" } },
      ),
    ).toEqual({
      "content-type": "text/plain",
      accept: "application/json",
      authorization: "Bearer system",
    });
  });

  it("prefers the system timeout, then the contract's", () => {
    expect(
      resolveTimeoutMs({ timeoutMs: 500 }, { timeoutMs: 100 }, options),
    ).toBe(100);
    expect(resolveTimeoutMs({ timeoutMs: 500 }, {}, options)).toBe(500);
    expect(resolveTimeoutMs({}, {}, options)).toBe(1_000);
  });
});
