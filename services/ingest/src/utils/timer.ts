import type { Logger } from "../logger.js";

export interface TimingOptions {
  logger?: Logger;
  /** Log at info instead of debug. */
  showMetrics?: boolean;
  meta?: Record<string, unknown>;
}

function elapsedSince(start: number): number {
  return Number((performance.now() - start).toFixed(4));
}

function report(label: string, ms: number, options: TimingOptions): void {
  const { logger, showMetrics = false, meta } = options;
  if (!logger) return;
  const fields = { ...meta, elapsedMs: ms };
  if (showMetrics) logger.info(`${label} finished`, fields);
  else logger.debug(`${label} finished`, fields);
}

/** Runs `fn` and logs how long it took. */
export function measure<T>(label: string, fn: () => T, options: TimingOptions = {}): T {
  const start = performance.now();
  try {
    return fn();
  } finally {
    report(label, elapsedSince(start), options);
  }
}

export async function measureAsync<T>(
  label: string,
  fn: () => Promise<T>,
  options: TimingOptions = {},
): Promise<T> {
  const start = performance.now();
  try {
    return await fn();
  } finally {
    report(label, elapsedSince(start), options);
  }
}
