#!/usr/bin/env node
import { UsageError, stringifyError } from "./common/errors.js";
import { USAGE, buildRunConfig } from "./config.js";
import { Logger } from "./logger.js";
import { report, run } from "./orchestrator.js";

async function main(): Promise<void> {
  const config = buildRunConfig(process.argv.slice(2), process.env);
  if (config.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const logger = new Logger({ minLevel: config.logLevel });
  const result = await run({
    path: config.path,
    criteria: {
      applicationFilter: config.applicationFilter,
      rendererFilter: config.rendererFilter,
      includeFailed: config.includeFailed,
    },
    malformedRowPolicy: config.malformedRowPolicy,
    logger,
  });
  process.stdout.write(`${report(result.stats, config.outputMode)}\n`);
}

main().catch((error) => {
  process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
  if (error instanceof UsageError) {
    process.stderr.write(`${USAGE}\n`);
    process.exit(2);
  }
  process.exit(1);
});
