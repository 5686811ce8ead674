import type { JsonValue } from "./json.js";
import type { JsonPath } from "./jsonPath.js";

export type HttpMethod = "POST" | "PUT" | "PATCH";

export type Contract = {
  protocol: "http";
  method: HttpMethod;
  bodyPath: JsonPath;
  outputPath: JsonPath;
  headers: Readonly<Record<string, string>>;
  timeoutMs?: number;
};

export type MetricType = "exact_match" | "contains" | "token_f1";

export type NormalizeOptions = {
  lowercase: boolean;
  stripWhitespace: boolean;
  stripPunctuation: boolean;
};

export type MetricArgs = {
  predPath: JsonPath;
  refPath: JsonPath;
  normalize: NormalizeOptions;
};

export type MetricDefinition = {
  name: string;
  type: MetricType;
  args: MetricArgs;
};

export type ReductionType = "mean" | "median" | "min" | "max" | "std";

export type AggregateDefinition = {
  name: string;
  type: ReductionType;
  metric: string;
};

export type BenchmarkSpec = {
  id: string;
  name: string;
  version: string | number;
  description?: string;
  datasetPath: string;
  contract: Contract;
  metrics: readonly MetricDefinition[];
  primaryMetric: string;
  aggregates: readonly AggregateDefinition[];
};

export type Case = {
  id: string;
  input: JsonValue;
  reference: JsonValue;
};

export type SystemConfig = {
  name: string;
  endpoint: string;
  headers?: Readonly<Record<string, string>>;
  timeoutMs?: number;
};

export type CaseErrorKind =
  | "network_error"
  | "http_error"
  | "parse_error"
  | "extraction_error";

export type CaseError = {
  kind: CaseErrorKind;
  message: string;
  status?: number;
};

export type MetricOutcome =
  | { ok: true; score: number }
  | { ok: false; error: string };

export type CaseResult = {
  caseId: string;
  systemName: string;
  predicted?: JsonValue;
  metrics?: Readonly<Record<string, MetricOutcome>>;
  error?: CaseError;
};

/** null marks an aggregate with no scored cases to reduce. */
export type AggregateValue = number | null;

export type SystemReport = {
  systemName: string;
  primaryMetric: string;
  aggregates: Readonly<Record<string, AggregateValue>>;
  caseCount: number;
  errorCount: number;
  // Keyed by CaseErrorKind, keys sorted.
  errorCounts: Readonly<Record<string, number>>;
  metricErrorCounts: Readonly<Record<string, number>>;
  caseResults: readonly CaseResult[];
};

export type BenchmarkResult = {
  specId: string;
  specVersion: string | number;
  generatedAt: string;
  complete: boolean;
  systems: readonly SystemReport[];
};
