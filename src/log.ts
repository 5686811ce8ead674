// Debug output is off unless DEBUG_BENCH=1.
export const debugEnabled = (): boolean => process.env.DEBUG_BENCH === "1";

const prefix = "[bench]";

export const logInfo = (message: string): void => {
  console.log(`${prefix} ${message}`);
};

export const logWarn = (message: string): void => {
  console.warn(`${prefix} ${message}`);
};

export const logError = (message: string): void => {
  console.error(`${prefix} ${message}`);
};

export const logDebug = (
  label: string,
  payload: Record<string, unknown>,
): void => {
  if (!debugEnabled()) {
    return;
  }
  console.log(`${prefix} ${label}`, JSON.stringify(payload, null, 2));
};
