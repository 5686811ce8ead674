import { aggregateSystem } from "./aggregator.js";
import {
  fallbackConcurrency,
  fallbackTimeoutMs,
  isTimeoutMs,
  maxTimeoutMs,
} from "./config.js";
import { executeCase } from "./contractExecutor.js";
import { loadDataset } from "./dataset.js";
import { DatasetError, SpecValidationError } from "./errors.js";
import { logDebug } from "./log.js";
import { metricRegistry, scoreCase, type MetricRegistry } from "./metrics.js";
import { loadSpec, resolveDatasetPath } from "./spec.js";
import { assertUniqueSystems } from "./systems.js";
import type {
  BenchmarkResult,
  BenchmarkSpec,
  Case,
  CaseResult,
  SystemConfig,
  SystemReport,
} from "./types.js";
import { runPool } from "./workerPool.js";

export type RunState =
  | "loading"
  | "executing"
  | "aggregating"
  | "complete"
  | "failed";

const transitions: Readonly<Record<RunState, readonly RunState[]>> = {
  loading: ["executing", "failed"],
  executing: ["aggregating"],
  aggregating: ["complete"],
  complete: [],
  failed: [],
};

export type LoadedBenchmark = {
  specPath: string;
  spec: BenchmarkSpec;
  cases: readonly Case[];
};

export type ProgressInfo = {
  systemName: string;
  caseId: string;
  completed: number;
  total: number;
  failed: boolean;
};

export type RunnerOptions = {
  concurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  registry?: MetricRegistry;
  now?: () => Date;
  onProgress?: (progress: ProgressInfo) => void;
  onStateChange?: (state: RunState) => void;
};

type WorkItem = {
  system: SystemConfig;
  testCase: Case;
};

/**
 * Runs one benchmark: loading, then every (system, case) pair through the
 * worker pool, aggregating each system once all of its cases are in.
 * A runner instance drives a single run.
 */
export class BenchmarkRunner {
  private current: RunState = "loading";
  private readonly registry: MetricRegistry;

  constructor(private readonly options: RunnerOptions = {}) {
    const { timeoutMs } = options;
    if (timeoutMs !== undefined && !isTimeoutMs(timeoutMs)) {
      throw new RangeError(
        `timeoutMs must be an integer from 1 to ${maxTimeoutMs}, ` +
          `got ${timeoutMs}`,
      );
    }
    this.registry = options.registry ?? metricRegistry;
  }

  get state(): RunState {
    return this.current;
  }

  async load(specPath: string): Promise<LoadedBenchmark> {
    this.assertState("loading");
    try {
      const spec = await loadSpec(specPath);
      const cases = await loadDataset(resolveDatasetPath(specPath, spec));
      logDebug("loaded benchmark", {
        specId: spec.id,
        version: spec.version,
        cases: cases.length,
      });
      return { specPath, spec, cases };
    } catch (error) {
      if (
        error instanceof SpecValidationError ||
        error instanceof DatasetError
      ) {
        this.moveTo("failed");
      }
      throw error;
    }
  }

  async execute(
    benchmark: Pick<LoadedBenchmark, "spec" | "cases">,
    systems: readonly SystemConfig[],
  ): Promise<BenchmarkResult> {
    this.assertState("loading");
    assertUniqueSystems(systems);
    const { spec, cases } = benchmark;

    this.moveTo("executing");

    const items: WorkItem[] = systems.flatMap((system) =>
      cases.map((testCase) => ({ system, testCase })),
    );
    const collected = new Map<string, CaseResult[]>(
      systems.map((system) => [system.name, []]),
    );
    let completed = 0;

    const { skipped } = await runPool(
      items,
      async ({ system, testCase }) => {
        const result = await this.runSingle(spec, system, testCase);
        collected.get(system.name)?.push(result);
        completed += 1;
        this.options.onProgress?.({
          systemName: system.name,
          caseId: testCase.id,
          completed,
          total: items.length,
          failed: result.error !== undefined,
        });
        return result;
      },
      {
        concurrency: this.options.concurrency ?? fallbackConcurrency,
        signal: this.options.signal,
      },
    );

    this.moveTo("aggregating");
    // Barrier: only systems with a result for every case are aggregated;
    // a cancelled run leaves the rest out.
    const systemReports: SystemReport[] = [];
    for (const system of systems) {
      const results = collected.get(system.name) ?? [];
      if (results.length === cases.length) {
        systemReports.push(aggregateSystem(system.name, spec, results));
      }
    }
    this.moveTo("complete");

    return {
      specId: spec.id,
      specVersion: spec.version,
      generatedAt: (this.options.now ?? (() => new Date()))().toISOString(),
      complete: skipped === 0 && systemReports.length === systems.length,
      systems: systemReports,
    };
  }

  async run(
    specPath: string,
    systems: readonly SystemConfig[],
  ): Promise<BenchmarkResult> {
    const benchmark = await this.load(specPath);
    return this.execute(benchmark, systems);
  }

  private async runSingle(
    spec: BenchmarkSpec,
    system: SystemConfig,
    testCase: Case,
  ): Promise<CaseResult> {
    const outcome = await executeCase(spec.contract, system, testCase, {
      defaultTimeoutMs: this.options.timeoutMs ?? fallbackTimeoutMs,
    });

    if (!outcome.ok) {
      logDebug("case error", {
        system: system.name,
        caseId: testCase.id,
        error: outcome.error,
      });
      return {
        caseId: testCase.id,
        systemName: system.name,
        error: outcome.error,
      };
    }

    const metrics = scoreCase(
      spec.metrics,
      outcome.predicted,
      testCase.reference,
      this.registry,
    );
    logDebug("case scored", {
      system: system.name,
      caseId: testCase.id,
      metrics,
    });
    return {
      caseId: testCase.id,
      systemName: system.name,
      predicted: outcome.predicted,
      metrics,
    };
  }

  private assertState(expected: RunState): void {
    if (this.current !== expected) {
      throw new Error(
        `runner is ${this.current}, expected ${expected}; ` +
          "use a new runner per run",
      );
    }
  }

  private moveTo(next: RunState): void {
    if (!transitions[this.current].includes(next)) {
      throw new Error(
        `invalid run state transition ${this.current} -> ${next}`,
      );
    }
    this.current = next;
    logDebug("run state", { state: next });
    this.options.onStateChange?.(next);
  }
}
