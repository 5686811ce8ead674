import path from "node:path";
import { ConfigError } from "./errors.js";

export const fallbackTimeoutMs = 30_000;

// Longest delay setTimeout honours; larger values fire after 1ms.
export const maxTimeoutMs = 2_147_483_647;

export const isTimeoutMs = (value: number): boolean =>
  Number.isInteger(value) && value >= 1 && value <= maxTimeoutMs;

export const fallbackConcurrency = 1;

export const parsePositiveInt = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value?.trim()) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const parseTimeoutMs = (
  value: string | undefined,
  fallback: number,
  source: string,
): number => {
  const timeoutMs = parsePositiveInt(value, fallback);
  if (timeoutMs > maxTimeoutMs) {
    throw new ConfigError(
      `${source} must be at most ${maxTimeoutMs} ms, got ${value}`,
    );
  }
  return timeoutMs;
};

export type EngineConfig = {
  timeoutMs: number;
  concurrency: number;
  resultsDir: string;
};

export const readConfig = (
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig => ({
  timeoutMs: parseTimeoutMs(
    env.BENCH_TIMEOUT_MS,
    fallbackTimeoutMs,
    "BENCH_TIMEOUT_MS",
  ),
  concurrency: parsePositiveInt(env.BENCH_CONCURRENCY, fallbackConcurrency),
  resultsDir: path.resolve(
    process.cwd(),
    env.BENCH_RESULTS_DIR?.trim() || "results",
  ),
});
