import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { maxTimeoutMs } from "./config.js";
import { errorMessage, SystemConfigError } from "./errors.js";
import type { SystemConfig } from "./types.js";

const interpolateEnv = (value: string, env: NodeJS.ProcessEnv): string =>
  value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_, name: string) => env[name] ?? "");

export const resolveHeaders = (
  headers: Record<string, string> | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> | undefined => {
  if (!headers) {
    return undefined;
  }
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    resolved[key] = interpolateEnv(value, env);
  }
  return resolved;
};

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
};

/** Parses a `name=url` command-line system; the URL may itself contain '='. */
export const parseSystemArg = (value: string): SystemConfig => {
  const separator = value.indexOf("=");
  if (separator === -1) {
    throw new SystemConfigError(`invalid system '${value}': expected name=url`);
  }
  const name = value.slice(0, separator).trim();
  const endpoint = value.slice(separator + 1).trim();
  if (!name) {
    throw new SystemConfigError(`invalid system '${value}': name is empty`);
  }
  if (!isHttpUrl(endpoint)) {
    throw new SystemConfigError(
      `invalid system '${value}': '${endpoint}' is not an http(s) URL`,
    );
  }
  return { name, endpoint };
};

const systemsFileSchema = z.array(
  z.object({
    name: z.string().min(1),
    endpoint: z
      .string()
      .refine(isHttpUrl, { message: "must be an http(s) URL" }),
    headers: z.record(z.string()).optional(),
    timeout_ms: z.number().int().positive().max(maxTimeoutMs).optional(),
  }),
);

export const parseSystemsFile = (
  text: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): SystemConfig[] => {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new SystemConfigError(
      `could not parse systems file ${source}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  const parsed = systemsFileSchema.safeParse(document);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new SystemConfigError(
      `invalid systems file ${source}: ${problems.join("; ")}`,
    );
  }
  return parsed.data.map((entry) => ({
    name: entry.name,
    endpoint: entry.endpoint,
    headers: resolveHeaders(entry.headers, env),
    timeoutMs: entry.timeout_ms,
  }));
};

export const loadSystemsFile = async (
  filePath: string,
): Promise<SystemConfig[]> => {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new SystemConfigError(
      `could not read systems file ${filePath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  return parseSystemsFile(text, filePath);
};

export const assertUniqueSystems = (
  systems: readonly SystemConfig[],
): void => {
  if (systems.length === 0) {
    throw new SystemConfigError("at least one system is required");
  }
  const seen = new Set<string>();
  for (const system of systems) {
    if (seen.has(system.name)) {
      throw new SystemConfigError(`duplicate system name '${system.name}'`);
    }
    seen.add(system.name);
  }
};
