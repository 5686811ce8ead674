import { canonicalJson, type JsonValue } from "./json.js";
import { evaluatePath } from "./jsonPath.js";
import type {
  MetricDefinition,
  MetricOutcome,
  MetricType,
  NormalizeOptions,
} from "./types.js";

export type MetricKind = {
  description: string;
  // Both sides arrive already rendered as text and normalised.
  score: (predicted: string, reference: string) => number;
};

export type MetricRegistry = Readonly<Record<MetricType, Readonly<MetricKind>>>;

const tokenize = (text: string): string[] =>
  text.split(/[\s\p{P}]+/u).filter((token) => token.length > 0);

export const tokenF1 = (predicted: string, reference: string): number => {
  const predictedTokens = tokenize(predicted);
  const referenceTokens = tokenize(reference);

  if (predictedTokens.length === 0 && referenceTokens.length === 0) {
    return 1;
  }
  if (predictedTokens.length === 0 || referenceTokens.length === 0) {
    return 0;
  }

  const available = new Map<string, number>();
  for (const token of referenceTokens) {
    available.set(token, (available.get(token) ?? 0) + 1);
  }

  let overlap = 0;
  for (const token of predictedTokens) {
    const remaining = available.get(token) ?? 0;
    if (remaining > 0) {
      overlap += 1;
      available.set(token, remaining - 1);
    }
  }

  const precision = overlap / predictedTokens.length;
  const recall = overlap / referenceTokens.length;
  if (precision + recall === 0) {
    return 0;
  }
  return (2 * precision * recall) / (precision + recall);
};

export const metricRegistry: MetricRegistry = Object.freeze({
  exact_match: Object.freeze({
    description: "1 when both texts are equal, else 0",
    score: (predicted: string, reference: string) =>
      predicted === reference ? 1 : 0,
  }),
  contains: Object.freeze({
    description: "1 when the reference text occurs in the prediction, else 0",
    score: (predicted: string, reference: string) =>
      predicted.includes(reference) ? 1 : 0,
  }),
  token_f1: Object.freeze({
    description: "token-level F1 overlap between prediction and reference",
    score: tokenF1,
  }),
});

export const metricTypes: readonly string[] = Object.freeze(
  Object.keys(metricRegistry).sort(),
);

export const isMetricType = (value: string): value is MetricType =>
  Object.prototype.hasOwnProperty.call(metricRegistry, value);

export const noNormalization: NormalizeOptions = Object.freeze({
  lowercase: false,
  stripWhitespace: false,
  stripPunctuation: false,
});

export const valueToText = (value: JsonValue): string =>
  typeof value === "string" ? value : canonicalJson(value);

export const normalizeText = (
  text: string,
  options: NormalizeOptions,
): string => {
  let result = text;
  if (options.lowercase) {
    result = result.toLowerCase();
  }
  if (options.stripPunctuation) {
    result = result.replace(/\p{P}/gu, "");
  }
  if (options.stripWhitespace) {
    result = result.trim();
  }
  return result;
};

export const scoreMetric = (
  definition: MetricDefinition,
  predicted: JsonValue,
  reference: JsonValue,
  registry: MetricRegistry = metricRegistry,
): MetricOutcome => {
  const { predPath, refPath, normalize } = definition.args;

  const predictedLookup = evaluatePath(predicted, predPath);
  if (!predictedLookup.found) {
    return {
      ok: false,
      error:
        `prediction path ${predPath.expression} did not resolve: ` +
        predictedLookup.reason,
    };
  }
  const referenceLookup = evaluatePath(reference, refPath);
  if (!referenceLookup.found) {
    return {
      ok: false,
      error:
        `reference path ${refPath.expression} did not resolve: ` +
        referenceLookup.reason,
    };
  }

  const score = registry[definition.type].score(
    normalizeText(valueToText(predictedLookup.value), normalize),
    normalizeText(valueToText(referenceLookup.value), normalize),
  );
  if (!Number.isFinite(score) || score < 0 || score > 1) {
    return {
      ok: false,
      error: `metric ${definition.type} produced out-of-range score ${score}`,
    };
  }
  return { ok: true, score };
};

export const scoreCase = (
  definitions: readonly MetricDefinition[],
  predicted: JsonValue,
  reference: JsonValue,
  registry: MetricRegistry = metricRegistry,
): Record<string, MetricOutcome> => {
  const outcomes: Record<string, MetricOutcome> = {};
  for (const definition of definitions) {
    outcomes[definition.name] = scoreMetric(
      definition,
      predicted,
      reference,
      registry,
    );
  }
  return outcomes;
};
