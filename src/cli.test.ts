import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from "vitest";
import { exitCodes, runCli } from "./cli.js";

const specDocument = {
  id: "arith",
  name: "Arithmetic",
  version: "1.0",
  dataset: { path: "cases.jsonl" },
  contract: {
    protocol: "http",
    request: { method: "POST", body_json_path: "$" },
    response: { output_json_path: "$.answer" },
  },
  scoring: {
    metrics: [{ name: "em", type: "exact_match" }],
    primary_metric: "em",
  },
  reporting: {
    aggregate: [{ name: "accuracy", type: "mean", metric: "em" }],
  },
};

describe("runCli", () => {
  let dir: string;
  let specPath: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const printed = (): string[] =>
    logSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-test-"));
    specPath = path.join(dir, "bench.json");
    fs.writeFileSync(specPath, JSON.stringify(specDocument));
    fs.writeFileSync(
      path.join(dir, "cases.jsonl"),
      [
        '{"id":"one","input":{"q":"1+1"},"reference":"2"}',
        '{"id":"two","input":{"q":"2+2"},"reference":"4"}',
      ].join("\n"),
    );
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("validates a spec and its dataset", async () => {
    const code = await runCli(["validate", specPath]);

    expect(code).toBe(exitCodes.ok);
    expect(printed()).toEqual([
      "✓ Spec valid: arith (v1.0)",
      "✓ Dataset valid: 2 cases",
    ]);
  });

  it("prints every spec problem and fails", async () => {
    fs.writeFileSync(
      specPath,
      JSON.stringify({ ...specDocument, scoring: { metrics: [] } }),
    );

    const code = await runCli(["validate", specPath]);

    expect(code).toBe(exitCodes.failed);
    expect(errorSpy).toHaveBeenCalledWith(
      [
        `[bench] Invalid benchmark spec ${specPath} (3 problems):`,
        "  - scoring.metrics: Array must contain at least 1 element(s)",
        "  - scoring.primary_metric: Required",
        "  - reporting.aggregate[0].metric: " +
          "aggregate references unknown metric 'em'",
      ].join("\n"),
    );
  });

  it("runs a benchmark and writes the result file", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response('{"answer":"4"}', { status: 200 })),
    );
    const outPath = path.join(dir, "out", "result.json");

    const code = await runCli([
      "run",
      specPath,
      "--system",
      "calc=http://localhost:7000/solve",
      "--out",
      outPath,
      "--verbose",
    ]);

    expect(code).toBe(exitCodes.ok);
    const document = JSON.parse(fs.readFileSync(outPath, "utf8"));
    expect(document).toMatchObject({
      spec_id: "arith",
      spec_version: "1.0",
      complete: true,
      systems: [
        {
          system: "calc",
          primary_metric: "em",
          aggregates: { accuracy: 0.5 },
          case_count: 2,
          error_count: 0,
        },
      ],
    });
    expect(document.systems[0].case_results).toEqual([
      { case_id: "one", predicted: "4", metrics: { em: 0 } },
      { case_id: "two", predicted: "4", metrics: { em: 1 } },
    ]);
    expect(printed()).toContain("  accuracy: 0.5000");
    expect(printed()).toContain(`\nResults written to ${outPath}`);
  });

  it("requires at least one system", async () => {
    const code = await runCli(["run", specPath]);

    expect(code).toBe(exitCodes.failed);
    expect(errorSpy).toHaveBeenCalledWith(
      "[bench] at least one --system or --systems file is required",
    );
  });

  it("rejects a timeout longer than a timer can wait", async () => {
    const fetchSpy = vi.fn();
    vi.stubGlobal("fetch", fetchSpy);

    const code = await runCli([
      "run",
      specPath,
      "--system",
      "calc=http://localhost:7000/solve",
      "--timeout",
      "3000000000",
    ]);

    expect(code).toBe(exitCodes.failed);
    expect(errorSpy).toHaveBeenCalledWith(
      "[bench] --timeout must be at most 2147483647 ms, got 3000000000",
    );
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("rejects an unknown command", async () => {
    expect(await runCli(["bench", specPath])).toBe(exitCodes.failed);
    expect(errorSpy).toHaveBeenCalledWith("[bench] unknown command 'bench'");
  });

  it("prints usage for --help", async () => {
    expect(await runCli(["--help"])).toBe(exitCodes.ok);
    expect(printed()[0]).toMatch(/^Usage:/);
  });
});
