/**
 * Path expressions over JSON values.
 *
 * Supported syntax:
 *   $               the value itself
 *   $.answer        object field
 *   $.items[0]      array element
 *   $["two words"]  object field with any name (single quotes work too)
 *
 * Segments chain freely, e.g. `$.choices[0].message["content"]`.
 */

import { isJsonObject, type JsonValue } from "./json.js";

export type PathSegment =
  | { kind: "field"; name: string }
  | { kind: "index"; index: number };

export type JsonPath = {
  expression: string;
  segments: readonly PathSegment[];
};

export type PathLookup =
  | { found: true; value: JsonValue }
  | { found: false; reason: string };

export class PathSyntaxError extends Error {
  constructor(
    readonly expression: string,
    readonly position: number,
    detail: string,
  ) {
    super(`invalid path '${expression}' at position ${position}: ${detail}`);
    this.name = "PathSyntaxError";
  }
}

const identifierStart = /[A-Za-z_]/;
const identifierPart = /[A-Za-z0-9_]/;
const digit = /[0-9]/;

const readQuoted = (
  source: string,
  start: number,
  expression: string,
): { name: string; end: number } => {
  const quote = source[start];
  let name = "";
  let i = start + 1;
  while (i < source.length) {
    const char = source[i];
    if (char === "\\") {
      const next = source[i + 1];
      if (next !== quote && next !== "\\") {
        throw new PathSyntaxError(expression, i, "unsupported escape");
      }
      name += next;
      i += 2;
      continue;
    }
    if (char === quote) {
      return { name, end: i + 1 };
    }
    name += char;
    i += 1;
  }
  throw new PathSyntaxError(expression, start, "unterminated quoted name");
};

export const compilePath = (expression: string): JsonPath => {
  const source = expression.trim();
  if (source.length === 0) {
    throw new PathSyntaxError(expression, 0, "path is empty");
  }
  if (source[0] !== "$") {
    throw new PathSyntaxError(expression, 0, "path must start with '$'");
  }

  const segments: PathSegment[] = [];
  let i = 1;
  while (i < source.length) {
    const char = source[i];
    if (char === ".") {
      let end = i + 1;
      if (end >= source.length || !identifierStart.test(source[end])) {
        throw new PathSyntaxError(expression, end, "expected a field name");
      }
      while (end < source.length && identifierPart.test(source[end])) {
        end += 1;
      }
      segments.push({ kind: "field", name: source.slice(i + 1, end) });
      i = end;
      continue;
    }

    if (char === "[") {
      const next = source[i + 1];
      let end: number;
      if (next === '"' || next === "'") {
        const quoted = readQuoted(source, i + 1, expression);
        segments.push({ kind: "field", name: quoted.name });
        end = quoted.end;
      } else if (next !== undefined && digit.test(next)) {
        end = i + 1;
        while (end < source.length && digit.test(source[end])) {
          end += 1;
        }
        const digits = source.slice(i + 1, end);
        if (digits.length > 1 && digits.startsWith("0")) {
          throw new PathSyntaxError(expression, i + 1, "leading zero in index");
        }
        segments.push({ kind: "index", index: Number(digits) });
      } else {
        throw new PathSyntaxError(
          expression,
          i + 1,
          "expected an index or a quoted name",
        );
      }
      if (source[end] !== "]") {
        throw new PathSyntaxError(expression, end, "expected ']'");
      }
      i = end + 1;
      continue;
    }

    throw new PathSyntaxError(expression, i, `unexpected character '${char}'`);
  }

  return { expression: source, segments };
};

const describeType = (value: JsonValue): string => {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
};

export const formatSegments = (segments: readonly PathSegment[]): string =>
  segments.reduce(
    (text, segment) =>
      segment.kind === "index"
        ? `${text}[${segment.index}]`
        : /^[A-Za-z_][A-Za-z0-9_]*$/.test(segment.name)
          ? `${text}.${segment.name}`
          : `${text}[${JSON.stringify(segment.name)}]`,
    "$",
  );

export const evaluatePath = (root: JsonValue, path: JsonPath): PathLookup => {
  let current = root;
  for (let depth = 0; depth < path.segments.length; depth += 1) {
    const segment = path.segments[depth];
    const at = formatSegments(path.segments.slice(0, depth + 1));

    if (segment.kind === "field") {
      if (!isJsonObject(current)) {
        return {
          found: false,
          reason:
            `cannot read field '${segment.name}' of ` +
            `${describeType(current)} at ${at}`,
        };
      }
      if (!Object.prototype.hasOwnProperty.call(current, segment.name)) {
        return {
          found: false,
          reason: `field '${segment.name}' not found at ${at}`,
        };
      }
      current = current[segment.name];
      continue;
    }

    if (!Array.isArray(current)) {
      return {
        found: false,
        reason: `cannot index ${describeType(current)} at ${at}`,
      };
    }
    if (segment.index >= current.length) {
      return {
        found: false,
        reason:
          `index ${segment.index} out of range ` +
          `(length ${current.length}) at ${at}`,
      };
    }
    current = current[segment.index];
  }
  return { found: true, value: current };
};
