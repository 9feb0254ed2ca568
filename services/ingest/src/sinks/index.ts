import type { Config } from "../config.js";
import { createEmbeddingClient } from "../embeddings/index.js";
import { ConfigError } from "../errors.js";
import type { Logger } from "../logger.js";
import { QdrantClient } from "../qdrant/index.js";
import { CompositeSink } from "./composite.js";
import { JsonStreamSink } from "./json-stream.js";
import { QdrantSink } from "./qdrant.js";
import { SqliteSink } from "./sqlite.js";
import type { ResultSink } from "./types.js";

export { CompositeSink, JsonStreamSink, QdrantSink, SqliteSink };
export type { ResultSink, RunMetadata } from "./types.js";

/** Builds the sinks named in `OUTPUT_SINKS`; several are combined into one composite sink. */
export function createSink(config: Config, logger: Logger): ResultSink {
  const { output } = config;

  const sinks = output.sinks.map((name): ResultSink => {
    switch (name) {
      case "json":
        return new JsonStreamSink({
          outputDir: output.dir,
          filePrefix: output.prefix,
          includeBlocks: output.includeBlocks,
          logger,
        });
      case "sqlite":
        return SqliteSink.inDirectory(output.dir, output.sqlite.file, {
          table: output.sqlite.table,
          payloadField: output.sqlite.payloadField,
          logger,
        });
      case "qdrant": {
        if (!config.embedding) {
          throw new ConfigError("The qdrant sink needs embedding settings");
        }
        const embedding = createEmbeddingClient(config.embedding);
        const qdrant = new QdrantClient({
          url: config.qdrant.url,
          collectionName: config.qdrant.collectionName,
          apiKey: config.qdrant.apiKey,
          vectorSize: embedding.dimensions,
          logger,
        });
        return new QdrantSink(qdrant, embedding, config.qdrant.collectionName, logger);
      }
    }
  });

  return sinks.length === 1 ? sinks[0] : new CompositeSink(sinks, logger);
}
