import type {
  AggregateValue,
  BenchmarkSpec,
  CaseErrorKind,
  CaseResult,
  ReductionType,
  SystemReport,
} from "./types.js";

// Every reduction receives its scores sorted ascending, which makes the
// floating-point result independent of the order cases completed in.
type Reduction = (sortedScores: readonly number[]) => number;

const sum = (values: readonly number[]): number =>
  values.reduce((total, value) => total + value, 0);

const mean: Reduction = (values) => sum(values) / values.length;

export const reductionRegistry: Readonly<Record<ReductionType, Reduction>> =
  Object.freeze({
    mean,
    median: (values) => {
      const mid = Math.floor(values.length / 2);
      return values.length % 2 !== 0
        ? values[mid]
        : (values[mid - 1] + values[mid]) / 2;
    },
    min: (values) => values[0],
    max: (values) => values[values.length - 1],
    std: (values) => {
      const center = mean(values);
      const squared = values
        .map((value) => (value - center) ** 2)
        .sort((a, b) => a - b);
      return Math.sqrt(sum(squared) / values.length);
    },
  });

export const reductionTypes: readonly string[] = Object.freeze(
  Object.keys(reductionRegistry).sort(),
);

export const isReductionType = (value: string): value is ReductionType =>
  Object.prototype.hasOwnProperty.call(reductionRegistry, value);

export const reduceScores = (
  type: ReductionType,
  scores: readonly number[],
): AggregateValue => {
  if (scores.length === 0) {
    return null;
  }
  return reductionRegistry[type]([...scores].sort((a, b) => a - b));
};

export const compareCaseIds = (a: CaseResult, b: CaseResult): number =>
  a.caseId < b.caseId ? -1 : a.caseId > b.caseId ? 1 : 0;

const sortedCounts = (
  counts: ReadonlyMap<string, number>,
): Record<string, number> => {
  const result: Record<string, number> = {};
  const entries = [...counts.entries()].sort(([a], [b]) => (a < b ? -1 : 1));
  for (const [key, count] of entries) {
    result[key] = count;
  }
  return result;
};

/** Collects the scores each metric produced on cases that ran cleanly. */
export const collectScores = (
  spec: Pick<BenchmarkSpec, "metrics">,
  caseResults: readonly CaseResult[],
): Map<string, number[]> => {
  const scores = new Map<string, number[]>(
    spec.metrics.map((metric) => [metric.name, []]),
  );
  for (const result of caseResults) {
    if (result.error || !result.metrics) {
      continue;
    }
    for (const [name, outcome] of Object.entries(result.metrics)) {
      if (outcome.ok) {
        scores.get(name)?.push(outcome.score);
      }
    }
  }
  return scores;
};

export const aggregateSystem = (
  systemName: string,
  spec: Pick<BenchmarkSpec, "metrics" | "aggregates" | "primaryMetric">,
  caseResults: readonly CaseResult[],
): SystemReport => {
  const scores = collectScores(spec, caseResults);

  const aggregates: Record<string, AggregateValue> = {};
  for (const definition of spec.aggregates) {
    aggregates[definition.name] = reduceScores(
      definition.type,
      scores.get(definition.metric) ?? [],
    );
  }

  const errorCounts = new Map<CaseErrorKind, number>();
  const metricErrorCounts = new Map<string, number>();
  for (const result of caseResults) {
    if (result.error) {
      const { kind } = result.error;
      errorCounts.set(kind, (errorCounts.get(kind) ?? 0) + 1);
      continue;
    }
    for (const [name, outcome] of Object.entries(result.metrics ?? {})) {
      if (!outcome.ok) {
        metricErrorCounts.set(name, (metricErrorCounts.get(name) ?? 0) + 1);
      }
    }
  }

  return {
    systemName,
    primaryMetric: spec.primaryMetric,
    aggregates,
    caseCount: caseResults.length,
    errorCount: caseResults.filter((result) => result.error !== undefined)
      .length,
    errorCounts: sortedCounts(errorCounts),
    metricErrorCounts: sortedCounts(metricErrorCounts),
    caseResults: [...caseResults].sort(compareCaseIds),
  };
};
