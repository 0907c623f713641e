import { join } from "node:path";
import { listRenderFiles } from "../extract/renderFiles.js";
import { streamRenderRecords } from "../extract/rowStream.js";
import { Logger } from "../logger.js";
import { completeAggregate, createAggregateState, updateAggregate } from "../stats/aggregate.js";
import type { FilterCriteria, MalformedRowPolicy, RunResult, ScanCounters } from "../types.js";

export interface RunOptions {
  path: string;
  criteria: FilterCriteria;
  malformedRowPolicy?: MalformedRowPolicy;
  logger?: Logger;
}

export async function run(options: RunOptions): Promise<RunResult> {
  const logger = options.logger ?? new Logger({ minLevel: "warn" });
  const malformedRowPolicy = options.malformedRowPolicy ?? "abort";
  const startedAt = new Date().toISOString();

  const files = await listRenderFiles(options.path);
  logger.debug(`Found ${files.length} render logs in ${options.path}: ${files.join(", ") || "-"}`);
  logger.debug(`Filters: ${formatCriteriaForLog(options.criteria)}, on_malformed=${malformedRowPolicy}`);

  const stats = createAggregateState();
  const counters: ScanCounters = { rowsRead: 0, rowsAccepted: 0, rowsMalformed: 0 };

  for (const file of files) {
    const before = { ...counters };
    const records = streamRenderRecords(join(options.path, file), {
      criteria: options.criteria,
      malformedRowPolicy,
      logger,
      counters,
    });
    for await (const record of records) {
      updateAggregate(stats, record);
    }
    logger.debug(
      `${file}: rows=${counters.rowsRead - before.rowsRead} ` +
        `accepted=${counters.rowsAccepted - before.rowsAccepted} ` +
        `malformed=${counters.rowsMalformed - before.rowsMalformed}`,
    );
  }

  completeAggregate(stats);
  logger.info(
    `Run summary: files=${files.length}, rows=${counters.rowsRead}, ` +
      `accepted=${counters.rowsAccepted}, malformed=${counters.rowsMalformed}`,
  );

  return {
    startedAt,
    finishedAt: new Date().toISOString(),
    files,
    stats,
    ...counters,
  };
}

function formatCriteriaForLog(criteria: FilterCriteria): string {
  return (
    `app=${criteria.applicationFilter ?? "*"}, renderer=${criteria.rendererFilter ?? "*"}, ` +
    `include_failed=${criteria.includeFailed}`
  );
}
