#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { HELP_TEXT, UsageError, handleFile, handlePage, handleRun, parseArgs } from "./cli.js";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import { initTracing } from "./tracing.js";

async function main(): Promise<number> {
  const { command, source, target } = parseArgs(process.argv.slice(2));

  if (!command || command === "help") {
    console.log(HELP_TEXT);
    return 0;
  }

  loadDotenv();
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  await initTracing();

  switch (command) {
    case "run": {
      const result = await handleRun(source, config, logger);
      return result.pagesFailed > 0 ? 2 : 0;
    }
    case "page": {
      const result = await handlePage(target, config, logger);
      console.log(JSON.stringify(result.chunks, null, 2));
      return 0;
    }
    case "file": {
      const result = await handleFile(target, config, logger);
      console.log(JSON.stringify(result.chunks, null, 2));
      return 0;
    }
    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run with "help" to see available commands.');
      return 1;
  }
}

try {
  process.exitCode = await main();
} catch (error) {
  if (error instanceof UsageError || error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
}
