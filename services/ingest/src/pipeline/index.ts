export { runIngest } from "./run.js";
export type { IngestOptions } from "./run.js";
export type { IngestResult, PageError, PageSource, SourcePage } from "./types.js";
