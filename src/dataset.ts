import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { createInterface } from "node:readline";
import { DatasetError, errorMessage } from "./errors.js";
import { deepFreeze, isJsonObject, parseJson } from "./json.js";
import type { Case } from "./types.js";

const previewLimit = 200;

const preview = (line: string): string =>
  line.length <= previewLimit ? line : `${line.slice(0, previewLimit)}...`;

export const parseCaseLine = (line: string, lineNumber: number): Case => {
  const fail = (problem: string): never => {
    throw new DatasetError(`line ${lineNumber}: ${problem}: ${preview(line)}`, {
      lineNumber,
      line,
    });
  };

  const parsed = parseJson(line);
  if (!parsed.ok) {
    return fail(
      parsed.reason === "syntax"
        ? `invalid JSON (${parsed.error})`
        : `unsupported value (${parsed.error})`,
    );
  }
  const row = parsed.value;
  if (!isJsonObject(row)) {
    return fail("each line must be a JSON object");
  }
  const id = row.id;
  if (typeof id !== "string" || id.length === 0) {
    return fail("'id' must be a non-empty string");
  }
  if (!("input" in row)) {
    return fail("missing 'input'");
  }
  if (!("reference" in row)) {
    return fail("missing 'reference'");
  }
  return deepFreeze({ id, input: row.input, reference: row.reference });
};

/**
 * A JSONL dataset on disk. Iteration streams the file lazily; every new
 * iteration starts again from the first line.
 */
export class Dataset implements AsyncIterable<Case> {
  constructor(readonly filePath: string) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<Case, void, undefined> {
    await this.ensureReadable();

    const stream = createReadStream(this.filePath, { encoding: "utf8" });
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    const seen = new Set<string>();
    let lineNumber = 0;

    try {
      for await (const line of lines) {
        lineNumber += 1;
        if (!line.trim()) {
          continue;
        }
        const testCase = parseCaseLine(line, lineNumber);
        if (seen.has(testCase.id)) {
          throw new DatasetError(
            `line ${lineNumber}: duplicate case id '${testCase.id}'`,
            { lineNumber, line, caseId: testCase.id },
          );
        }
        seen.add(testCase.id);
        yield testCase;
      }
    } catch (error) {
      if (error instanceof DatasetError) {
        throw error;
      }
      throw new DatasetError(
        `could not read dataset ${this.filePath}: ${errorMessage(error)}`,
        {},
        { cause: error },
      );
    } finally {
      lines.close();
      stream.destroy();
    }
  }

  private async ensureReadable(): Promise<void> {
    try {
      const info = await stat(this.filePath);
      if (!info.isFile()) {
        throw new DatasetError(`dataset path is not a file: ${this.filePath}`);
      }
    } catch (error) {
      if (error instanceof DatasetError) {
        throw error;
      }
      throw new DatasetError(
        `dataset file not found: ${this.filePath}`,
        {},
        { cause: error },
      );
    }
  }
}

/** Reads every case up front; a bad line fails the whole load. */
export const loadDataset = async (
  filePath: string,
): Promise<readonly Case[]> => {
  const cases: Case[] = [];
  for await (const testCase of new Dataset(filePath)) {
    cases.push(testCase);
  }
  if (cases.length === 0) {
    throw new DatasetError(`dataset contains no cases: ${filePath}`);
  }
  return Object.freeze(cases);
};
