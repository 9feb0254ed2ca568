import { createTracing } from "@wiki-chunker/common";

export const { initTracing, getTracer, _resetTracing } = createTracing("wiki-chunker-ingest");
