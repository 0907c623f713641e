import type { RowLocation } from "../types.js";

export class RenderStatsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DirectoryNotFoundError extends RenderStatsError {
  constructor(readonly path: string) {
    super(`${path} is not a valid directory`);
  }
}

export class MalformedRowError extends RenderStatsError {
  readonly location?: RowLocation;

  constructor(
    readonly reason: string,
    location?: RowLocation,
  ) {
    super(
      location
        ? `Malformed row ${location.rowNumber} in ${location.filePath}: ${reason}`
        : `Malformed row: ${reason}`,
    );
    this.location = location;
  }
}

export class StatsNotReadyError extends RenderStatsError {
  constructor() {
    super("Render stats are not available. Run the scan before querying stats.");
  }
}

export class UsageError extends RenderStatsError {}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
