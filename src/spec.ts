import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { isReductionType, reductionTypes } from "./aggregator.js";
import { maxTimeoutMs } from "./config.js";
import { errorMessage, SpecValidationError, type Violation } from "./errors.js";
import { deepFreeze, isRecord } from "./json.js";
import { compilePath, PathSyntaxError } from "./jsonPath.js";
import { isMetricType, metricTypes } from "./metrics.js";
import type { BenchmarkSpec, HttpMethod } from "./types.js";

const httpMethods = [
  "POST",
  "PUT",
  "PATCH",
] as const satisfies readonly HttpMethod[];

const pathSchema = z.string().transform((expression, ctx) => {
  try {
    return compilePath(expression);
  } catch (error) {
    if (error instanceof PathSyntaxError) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
      return z.NEVER;
    }
    throw error;
  }
});

const normalizeSchema = z
  .object({
    lowercase: z.boolean().default(false),
    strip_whitespace: z.boolean().default(false),
    strip_punctuation: z.boolean().default(false),
  })
  .strict();

const metricArgsSchema = z
  .object({
    pred_path: pathSchema.default("$"),
    ref_path: pathSchema.default("$"),
    normalize: normalizeSchema.default({}),
  })
  .strict();

const metricSchema = z.object({
  name: z.string().min(1),
  type: z
    .string()
    .refine(isMetricType, (value) => ({
      message:
        `unknown metric type '${value}' ` +
        `(known: ${metricTypes.join(", ")})`,
    })),
  args: metricArgsSchema.default({}),
});

const aggregateSchema = z.object({
  name: z.string().min(1),
  type: z
    .string()
    .refine(isReductionType, (value) => ({
      message:
        `unknown aggregate type '${value}' ` +
        `(known: ${reductionTypes.join(", ")})`,
    })),
  metric: z.string().min(1),
});

const specDocumentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  version: z.union([z.string().min(1), z.number()]),
  description: z.string().optional(),
  dataset: z.object({
    path: z.string().min(1),
  }),
  contract: z.object({
    protocol: z
      .string()
      .refine((value): value is "http" => value === "http", (value) => ({
        message: `unsupported protocol '${value}' (supported: http)`,
      })),
    request: z.object({
      method: z
        .string()
        .transform((value) => value.toUpperCase())
        .pipe(z.enum(httpMethods)),
      body_json_path: pathSchema,
      headers: z.record(z.string()).default({}),
      timeout_ms: z
        .number()
        .int()
        .positive()
        .max(maxTimeoutMs)
        .optional(),
    }),
    response: z.object({
      output_json_path: pathSchema,
    }),
  }),
  scoring: z.object({
    metrics: z.array(metricSchema).min(1),
    primary_metric: z.string().min(1),
  }),
  reporting: z.object({
    aggregate: z.array(aggregateSchema).min(1),
  }),
});

type SpecDocument = z.output<typeof specDocumentSchema>;

export const formatIssuePath = (
  segments: readonly (string | number)[],
): string =>
  segments.reduce<string>(
    (text, segment) =>
      typeof segment === "number"
        ? `${text}[${segment}]`
        : text
          ? `${text}.${segment}`
          : segment,
    "",
  );

type NamedEntry = {
  name: string;
  index: number;
  entry: Record<string, unknown>;
};

const namedEntries = (list: unknown): NamedEntry[] => {
  if (!Array.isArray(list)) {
    return [];
  }
  const entries: NamedEntry[] = [];
  list.forEach((entry: unknown, index) => {
    if (isRecord(entry) && typeof entry.name === "string") {
      entries.push({ name: entry.name, index, entry });
    }
  });
  return entries;
};

const duplicateViolations = (
  prefix: string,
  entries: { name: string; index: number }[],
  label: string,
): Violation[] => {
  const seen = new Set<string>();
  const violations: Violation[] = [];
  for (const { name, index } of entries) {
    if (seen.has(name)) {
      violations.push({
        path: `${prefix}[${index}].name`,
        message: `duplicate ${label} name '${name}'`,
      });
    }
    seen.add(name);
  }
  return violations;
};

/**
 * Cross-reference checks run on the raw document so they are reported
 * alongside structural problems rather than after them are fixed.
 */
const referenceViolations = (
  document: Record<string, unknown>,
): Violation[] => {
  const scoring = isRecord(document.scoring) ? document.scoring : {};
  const reporting = isRecord(document.reporting) ? document.reporting : {};
  const metrics = namedEntries(scoring.metrics);
  const aggregates = namedEntries(reporting.aggregate);
  const metricNames = new Set(metrics.map((metric) => metric.name));

  const violations = [
    ...duplicateViolations("scoring.metrics", metrics, "metric"),
    ...duplicateViolations("reporting.aggregate", aggregates, "aggregate"),
  ];

  if (
    Array.isArray(scoring.metrics) &&
    typeof scoring.primary_metric === "string" &&
    scoring.primary_metric.length > 0 &&
    !metricNames.has(scoring.primary_metric)
  ) {
    violations.push({
      path: "scoring.primary_metric",
      message:
        `primary metric '${scoring.primary_metric}' ` +
        "is not a defined metric",
    });
  }

  if (Array.isArray(scoring.metrics)) {
    for (const { entry, index } of aggregates) {
      if (
        typeof entry.metric === "string" &&
        entry.metric.length > 0 &&
        !metricNames.has(entry.metric)
      ) {
        violations.push({
          path: `reporting.aggregate[${index}].metric`,
          message: `aggregate references unknown metric '${entry.metric}'`,
        });
      }
    }
  }

  return violations;
};

const toBenchmarkSpec = (document: SpecDocument): BenchmarkSpec =>
  deepFreeze({
    id: document.id,
    name: document.name,
    version: document.version,
    description: document.description,
    datasetPath: document.dataset.path,
    contract: {
      protocol: document.contract.protocol,
      method: document.contract.request.method,
      bodyPath: document.contract.request.body_json_path,
      outputPath: document.contract.response.output_json_path,
      headers: document.contract.request.headers,
      timeoutMs: document.contract.request.timeout_ms,
    },
    metrics: document.scoring.metrics.map((metric) => ({
      name: metric.name,
      type: metric.type,
      args: {
        predPath: metric.args.pred_path,
        refPath: metric.args.ref_path,
        normalize: {
          lowercase: metric.args.normalize.lowercase,
          stripWhitespace: metric.args.normalize.strip_whitespace,
          stripPunctuation: metric.args.normalize.strip_punctuation,
        },
      },
    })),
    primaryMetric: document.scoring.primary_metric,
    aggregates: document.reporting.aggregate.map((aggregate) => ({
      name: aggregate.name,
      type: aggregate.type,
      metric: aggregate.metric,
    })),
  });

export const validateSpec = (
  document: unknown,
  source = "<inline>",
): BenchmarkSpec => {
  if (!isRecord(document)) {
    throw new SpecValidationError(source, [
      {
        path: "",
        message:
          document === null || document === undefined
            ? "document is empty"
            : "document must be a mapping of fields",
      },
    ]);
  }

  const parsed = specDocumentSchema.safeParse(document);
  const violations: Violation[] = parsed.success
    ? []
    : parsed.error.issues.map((issue) => ({
        path: formatIssuePath(issue.path),
        message: issue.message,
      }));
  violations.push(...referenceViolations(document));

  if (!parsed.success || violations.length > 0) {
    throw new SpecValidationError(source, violations);
  }
  return toBenchmarkSpec(parsed.data);
};

/** Parses YAML or JSON text; JSON documents are valid YAML. */
export const parseSpec = (text: string, source = "<inline>"): BenchmarkSpec => {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new SpecValidationError(
      source,
      [
        {
          path: "",
          message: `could not parse document: ${errorMessage(error)}`,
        },
      ],
      { cause: error },
    );
  }
  return validateSpec(document, source);
};

export const loadSpec = async (specPath: string): Promise<BenchmarkSpec> => {
  let text: string;
  try {
    text = await readFile(specPath, "utf8");
  } catch (error) {
    throw new SpecValidationError(
      specPath,
      [{ path: "", message: `could not read file: ${errorMessage(error)}` }],
      { cause: error },
    );
  }
  return parseSpec(text, specPath);
};

export const resolveDatasetPath = (
  specPath: string,
  spec: Pick<BenchmarkSpec, "datasetPath">,
): string =>
  path.isAbsolute(spec.datasetPath)
    ? spec.datasetPath
    : path.resolve(path.dirname(specPath), spec.datasetPath);
