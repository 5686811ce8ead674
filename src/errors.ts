export type Violation = {
  path: string;
  message: string;
};

export const formatViolation = ({ path, message }: Violation): string =>
  path ? `${path}: ${message}` : message;

const countProblems = (count: number): string =>
  `${count} problem${count === 1 ? "" : "s"}`;

/** A benchmark spec that cannot be used; carries every problem found. */
export class SpecValidationError extends Error {
  readonly violations: readonly Violation[];

  constructor(
    source: string,
    violations: Violation[],
    options?: ErrorOptions,
  ) {
    super(
      [
        `Invalid benchmark spec ${source} (${countProblems(violations.length)}):`,
        ...violations.map((violation) => `  - ${formatViolation(violation)}`),
      ].join("\n"),
      options,
    );
    this.name = "SpecValidationError";
    this.violations = violations;
  }
}

export type DatasetErrorDetails = {
  lineNumber?: number;
  line?: string;
  caseId?: string;
};

export class DatasetError extends Error {
  readonly lineNumber?: number;
  readonly line?: string;
  readonly caseId?: string;

  constructor(
    message: string,
    details: DatasetErrorDetails = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "DatasetError";
    this.lineNumber = details.lineNumber;
    this.line = details.line;
    this.caseId = details.caseId;
  }
}

export class SystemConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SystemConfigError";
  }
}

/** An engine setting from the environment or a flag that cannot be used. */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type FatalError =
  | SpecValidationError
  | DatasetError
  | SystemConfigError
  | ConfigError;

export const isFatalError = (error: unknown): error is FatalError =>
  error instanceof SpecValidationError ||
  error instanceof DatasetError ||
  error instanceof SystemConfigError ||
  error instanceof ConfigError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const formatError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const extra = error as Error & { code?: string | number; cause?: unknown };
  return {
    name: error.name,
    message: error.message,
    code: extra.code ?? null,
    stack: error.stack ?? null,
    cause:
      extra.cause instanceof Error
        ? formatError(extra.cause)
        : (extra.cause ?? null),
  };
};
