import path from "node:path";
import minimist from "minimist";
import { parsePositiveInt, parseTimeoutMs, readConfig } from "./config.js";
import { loadDataset } from "./dataset.js";
import { formatError, isFatalError, SystemConfigError } from "./errors.js";
import { logError, logInfo, logWarn } from "./log.js";
import { formatSummary, writeResultFile } from "./report.js";
import { BenchmarkRunner } from "./runner.js";
import { loadSpec, resolveDatasetPath } from "./spec.js";
import { loadSystemsFile, parseSystemArg } from "./systems.js";
import type { SystemConfig } from "./types.js";

export const exitCodes = {
  ok: 0,
  failed: 1,
  interrupted: 130,
} as const;

const usage = `
Usage:
  bench-engine validate <spec>
  bench-engine run <spec> --system name=url [--system name=url ...] [options]

Commands:
  validate          Check a benchmark spec and its dataset
  run               Run a benchmark against one or more HTTP systems

Run options:
  --system          System under test as name=url (repeatable)
  --systems         YAML/JSON file listing systems
                    (name, endpoint, headers, timeout_ms)
  --out             Result file path
                    (default: <results dir>/<spec id>-<timestamp>.json)
  --concurrency     Parallel requests (default: BENCH_CONCURRENCY or 1)
  --timeout         Per-request timeout in ms
                    (default: BENCH_TIMEOUT_MS or 30000)
  --verbose         Include every case result in the result file
  --help            Show this help message
`.trim();

const toList = (value: unknown): string[] => {
  const entries = Array.isArray(value)
    ? value.map((entry) => String(entry))
    : [value];
  return entries.filter(
    (entry): entry is string => typeof entry === "string" && entry.length > 0,
  );
};

const formatTimestamp = (iso: string): string => iso.replace(/[:.]/g, "-");

const validateCommand = async (specPath: string): Promise<number> => {
  const spec = await loadSpec(specPath);
  console.log(`✓ Spec valid: ${spec.id} (v${spec.version})`);
  const cases = await loadDataset(resolveDatasetPath(specPath, spec));
  console.log(`✓ Dataset valid: ${cases.length} cases`);
  return exitCodes.ok;
};

const collectSystems = async (
  args: minimist.ParsedArgs,
): Promise<SystemConfig[]> => {
  const systems = toList(args.system).map(parseSystemArg);
  for (const file of toList(args.systems)) {
    systems.push(...(await loadSystemsFile(file)));
  }
  if (systems.length === 0) {
    throw new SystemConfigError(
      "at least one --system or --systems file is required",
    );
  }
  return systems;
};

const runCommand = async (
  specPath: string,
  args: minimist.ParsedArgs,
): Promise<number> => {
  const config = readConfig();
  const systems = await collectSystems(args);
  const concurrency = parsePositiveInt(
    toList(args.concurrency)[0],
    config.concurrency,
  );
  const timeoutMs = parseTimeoutMs(
    toList(args.timeout)[0],
    config.timeoutMs,
    "--timeout",
  );

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logWarn(
      "interrupted: finishing in-flight requests, no new cases will start",
    );
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const runner = new BenchmarkRunner({
      concurrency,
      timeoutMs,
      signal: controller.signal,
      onProgress: ({ completed, total, systemName, caseId, failed }) => {
        const status = failed ? "error" : "ok";
        logInfo(`${completed}/${total} ${systemName} ${caseId} ${status}`);
      },
    });
    const benchmark = await runner.load(specPath);
    logInfo(
      `running ${benchmark.spec.name}: ${benchmark.cases.length} cases x ` +
        `${systems.length} systems (concurrency ${concurrency})`,
    );
    const result = await runner.execute(benchmark, systems);

    for (const line of formatSummary(result)) {
      console.log(line);
    }

    const outPath =
      toList(args.out)[0] ??
      path.join(
        config.resultsDir,
        `${result.specId}-${formatTimestamp(result.generatedAt)}.json`,
      );
    writeResultFile(outPath, result, { verbose: args.verbose === true });
    console.log(`\nResults written to ${outPath}`);

    return result.complete ? exitCodes.ok : exitCodes.interrupted;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
};

export const runCli = async (argv: string[]): Promise<number> => {
  const args = minimist(argv, {
    string: ["system", "systems", "out", "concurrency", "timeout"],
    boolean: ["verbose", "help"],
    alias: { h: "help" },
  });
  const [command, specPath] = args._.map(String);

  if (args.help || !command) {
    console.log(usage);
    return args.help ? exitCodes.ok : exitCodes.failed;
  }
  if (command !== "validate" && command !== "run") {
    logError(`unknown command '${command}'`);
    console.log(usage);
    return exitCodes.failed;
  }
  if (!specPath) {
    logError(`${command} needs a spec path`);
    return exitCodes.failed;
  }

  try {
    return command === "validate"
      ? await validateCommand(specPath)
      : await runCommand(specPath, args);
  } catch (error) {
    if (isFatalError(error)) {
      logError(error.message);
      return exitCodes.failed;
    }
    const details = JSON.stringify(formatError(error), null, 2);
    logError(`unexpected failure: ${details}`);
    return exitCodes.failed;
  }
};
