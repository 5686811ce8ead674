import fs from "node:fs";
import path from "node:path";
import type { JsonValue } from "./json.js";
import type { BenchmarkResult, CaseResult, SystemReport } from "./types.js";

export type ReportOptions = {
  // Include every case result, not just the per-system summary.
  verbose?: boolean;
};

export type CaseResultDocument = {
  case_id: string;
  predicted?: JsonValue;
  metrics?: Record<string, number>;
  metric_errors?: Record<string, string>;
  error?: { kind: string; message: string; status?: number };
};

export type SystemReportDocument = {
  system: string;
  primary_metric: string;
  aggregates: Record<string, number | null>;
  case_count: number;
  error_count: number;
  error_counts: Record<string, number>;
  metric_error_counts: Record<string, number>;
  case_results?: CaseResultDocument[];
};

export type ResultDocument = {
  spec_id: string;
  spec_version: string | number;
  generated_at: string;
  complete: boolean;
  systems: SystemReportDocument[];
};

const toCaseDocument = (result: CaseResult): CaseResultDocument => {
  const document: CaseResultDocument = { case_id: result.caseId };
  if (result.predicted !== undefined) {
    document.predicted = result.predicted;
  }
  if (result.metrics) {
    const scores: Record<string, number> = {};
    const errors: Record<string, string> = {};
    for (const [name, outcome] of Object.entries(result.metrics)) {
      if (outcome.ok) {
        scores[name] = outcome.score;
      } else {
        errors[name] = outcome.error;
      }
    }
    document.metrics = scores;
    if (Object.keys(errors).length > 0) {
      document.metric_errors = errors;
    }
  }
  if (result.error) {
    document.error = {
      kind: result.error.kind,
      message: result.error.message,
      ...(result.error.status !== undefined
        ? { status: result.error.status }
        : {}),
    };
  }
  return document;
};

const toSystemDocument = (
  report: SystemReport,
  options: ReportOptions,
): SystemReportDocument => ({
  system: report.systemName,
  primary_metric: report.primaryMetric,
  aggregates: { ...report.aggregates },
  case_count: report.caseCount,
  error_count: report.errorCount,
  error_counts: { ...report.errorCounts },
  metric_error_counts: { ...report.metricErrorCounts },
  ...(options.verbose
    ? { case_results: report.caseResults.map(toCaseDocument) }
    : {}),
});

export const toResultDocument = (
  result: BenchmarkResult,
  options: ReportOptions = {},
): ResultDocument => ({
  spec_id: result.specId,
  spec_version: result.specVersion,
  generated_at: result.generatedAt,
  complete: result.complete,
  systems: result.systems.map((report) => toSystemDocument(report, options)),
});

export const writeResultFile = (
  filePath: string,
  result: BenchmarkResult,
  options: ReportOptions = {},
): void => {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  const document = toResultDocument(result, options);
  fs.writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`);
};

const formatAggregate = (value: number | null): string =>
  value === null ? "undefined (no scored cases)" : value.toFixed(4);

export const formatSummary = (result: BenchmarkResult): string[] => {
  const lines = [`Benchmark: ${result.specId} (v${result.specVersion})`];
  if (!result.complete) {
    lines.push(
      "Run was cancelled: only systems that finished every case are reported.",
    );
  }
  for (const report of result.systems) {
    lines.push("", `System: ${report.systemName}`);
    for (const [name, value] of Object.entries(report.aggregates)) {
      lines.push(`  ${name}: ${formatAggregate(value)}`);
    }
    const executed = report.caseCount - report.errorCount;
    lines.push(`  Cases: ${executed}/${report.caseCount} executed`);
    for (const [kind, count] of Object.entries(report.errorCounts)) {
      lines.push(`    ${kind}: ${count}`);
    }
    for (const [metric, count] of Object.entries(report.metricErrorCounts)) {
      lines.push(`    ${metric} metric errors: ${count}`);
    }
  }
  return lines;
};
