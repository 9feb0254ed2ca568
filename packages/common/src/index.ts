export { createTracing, withSpan } from "./tracing.js";
export type { Tracing } from "./tracing.js";
