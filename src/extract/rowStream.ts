import { createReadStream } from "node:fs";
import { CsvError, parse } from "csv-parse";
import { z } from "zod";
import { MalformedRowError } from "../common/errors.js";
import { acceptRecord } from "../filter.js";
import type { Logger } from "../logger.js";
import type {
  FilterCriteria,
  MalformedRowPolicy,
  RenderRecord,
  ScanCounters,
} from "../types.js";
import { decodeRow } from "./renderRow.js";

export interface RawRow {
  fields: string[];
  /** 1-based ordinal among the file's records; blank lines are not counted. */
  rowNumber: number;
}

const recordSchema = z.array(z.string());

/**
 * Forward-only reader over one CSV file. The underlying file handle is
 * closed before iteration ends, throws, or returns to an abandoning consumer.
 *
 * Stray quotes inside unquoted fields are kept as text. Input the parser
 * cannot recover from (an unclosed quote) ends the file with a
 * `MalformedRowError` for the row being read.
 */
export async function* readRawRows(filePath: string): AsyncGenerator<RawRow> {
  const input = createReadStream(filePath);
  const parser = input.pipe(
    parse({
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    }),
  );
  input.on("error", (error) => parser.destroy(error));

  let rowNumber = 0;
  try {
    for await (const chunk of parser) {
      rowNumber += 1;
      yield { fields: recordSchema.parse(chunk), rowNumber };
    }
  } catch (error) {
    if (error instanceof CsvError) {
      throw new MalformedRowError(error.message, { filePath, rowNumber: rowNumber + 1 });
    }
    throw error;
  } finally {
    parser.destroy();
    if (!input.closed) {
      const closed = new Promise<void>((resolve) => input.once("close", () => resolve()));
      input.destroy();
      await closed;
    }
  }
}

export interface RenderRecordStreamOptions {
  criteria: FilterCriteria;
  malformedRowPolicy: MalformedRowPolicy;
  logger: Logger;
  counters: ScanCounters;
}

/** Decoded rows of one file that pass `criteria`, in file order. */
export async function* streamRenderRecords(
  filePath: string,
  options: RenderRecordStreamOptions,
): AsyncGenerator<RenderRecord> {
  const { criteria, malformedRowPolicy, logger, counters } = options;

  const skipMalformed = (error: unknown): void => {
    if (!(error instanceof MalformedRowError) || malformedRowPolicy === "abort") {
      throw error;
    }
    counters.rowsMalformed += 1;
    logger.warn(`Skipping ${error.message}`);
  };

  try {
    for await (const row of readRawRows(filePath)) {
      counters.rowsRead += 1;
      let record: RenderRecord;
      try {
        record = decodeRow(row.fields, { filePath, rowNumber: row.rowNumber });
      } catch (error) {
        skipMalformed(error);
        continue;
      }

      if (!acceptRecord(record, criteria)) {
        continue;
      }
      counters.rowsAccepted += 1;
      yield record;
    }
  } catch (error) {
    // A reader failure the parser cannot resume from ends the file.
    skipMalformed(error);
    counters.rowsRead += 1;
  }
}
