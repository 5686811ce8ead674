import { errorMessage } from "./errors.js";
import { parseJson, type JsonValue } from "./json.js";
import { evaluatePath } from "./jsonPath.js";
import type { Case, CaseError, Contract, SystemConfig } from "./types.js";

export type ExecutionOutcome =
  | { ok: true; predicted: JsonValue }
  | { ok: false; error: CaseError };

export type ExecuteOptions = {
  defaultTimeoutMs: number;
};

const responsePreviewLimit = 120;

const defaultHeaders: Readonly<Record<string, string>> = {
  "content-type": "application/json",
  accept: "application/json",
};

const describeFetchError = (error: unknown): string => {
  const cause = error instanceof Error ? error.cause : undefined;
  const code =
    cause &&
    typeof cause === "object" &&
    "code" in cause &&
    typeof cause.code === "string"
      ? cause.code
      : undefined;
  return code ? `${errorMessage(error)} (${code})` : errorMessage(error);
};

const preview = (text: string): string =>
  JSON.stringify(
    text.length > responsePreviewLimit
      ? `${text.slice(0, responsePreviewLimit)}...`
      : text,
  );

/**
 * Merges default, contract and system headers, later sources winning.
 * Names are compared case-insensitively and sent lowercased.
 */
export const buildHeaders = (
  contract: Pick<Contract, "headers">,
  system: Pick<SystemConfig, "headers">,
): Record<string, string> => {
  const headers: Record<string, string> = {};
  for (const source of [defaultHeaders, contract.headers, system.headers]) {
    for (const [name, value] of Object.entries(source ?? {})) {
      headers[name.toLowerCase()] = value;
    }
  }
  return headers;
};

export const resolveTimeoutMs = (
  contract: Pick<Contract, "timeoutMs">,
  system: Pick<SystemConfig, "timeoutMs">,
  options: ExecuteOptions,
): number =>
  system.timeoutMs ?? contract.timeoutMs ?? options.defaultTimeoutMs;

/**
 * Calls one system with one case and extracts the prediction. Failures come
 * back as a classified CaseError; nothing here throws for a bad response.
 */
export const executeCase = async (
  contract: Contract,
  system: SystemConfig,
  testCase: Case,
  options: ExecuteOptions,
): Promise<ExecutionOutcome> => {
  const body = evaluatePath(testCase.input, contract.bodyPath);
  if (!body.found) {
    return {
      ok: false,
      error: {
        kind: "extraction_error",
        message:
          `request body path ${contract.bodyPath.expression} did not ` +
          `resolve against case input: ${body.reason}`,
      },
    };
  }

  const timeoutMs = resolveTimeoutMs(contract, system, options);
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  let text: string;
  try {
    const response = await fetch(system.endpoint, {
      method: contract.method,
      headers: buildHeaders(contract, system),
      body: JSON.stringify(body.value),
      signal: controller.signal,
    });
    if (!response.ok) {
      // Release the connection; the error body is not used.
      await response.body?.cancel();
      return {
        ok: false,
        error: {
          kind: "http_error",
          status: response.status,
          message: `${system.endpoint} responded with status ${response.status}`,
        },
      };
    }
    text = await response.text();
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: "network_error",
        message: timedOut
          ? `request to ${system.endpoint} timed out after ${timeoutMs}ms`
          : `request to ${system.endpoint} failed: ${describeFetchError(error)}`,
      },
    };
  } finally {
    clearTimeout(timer);
  }

  const parsed = parseJson(text);
  if (!parsed.ok) {
    const problem =
      parsed.reason === "syntax"
        ? `is not valid JSON (${parsed.error})`
        : `could not be represented: ${parsed.error}`;
    return {
      ok: false,
      error: {
        kind: "parse_error",
        message: `response from ${system.endpoint} ${problem}: ${preview(text)}`,
      },
    };
  }

  const output = evaluatePath(parsed.value, contract.outputPath);
  if (!output.found) {
    return {
      ok: false,
      error: {
        kind: "extraction_error",
        message:
          `output path ${contract.outputPath.expression} did not resolve: ` +
          output.reason,
      },
    };
  }
  return { ok: true, predicted: output.value };
};
