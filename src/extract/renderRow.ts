import { MalformedRowError } from "../common/errors.js";
import { formatNumber, parseFloatValue, parseInteger, parseSuccessFlag } from "../normalize.js";
import type { RenderRecord, RowLocation } from "../types.js";

export const RENDER_ROW_FIELDS = [
  "id",
  "application",
  "renderer",
  "frameCount",
  "success",
  "renderTime",
  "peakRam",
  "peakCpu",
] as const;

export function decodeRow(fields: readonly string[], location?: RowLocation): RenderRecord {
  if (fields.length !== RENDER_ROW_FIELDS.length) {
    throw new MalformedRowError(
      `expected ${RENDER_ROW_FIELDS.length} fields, got ${fields.length}`,
      location,
    );
  }
  const [id, application, renderer, frames, success, renderTime, peakRam, peakCpu] = fields;

  const frameCount = parseInteger(frames);
  if (frameCount === null) {
    throw new MalformedRowError(`frameCount "${frames}" is not an integer`, location);
  }

  return {
    id,
    application,
    renderer,
    frameCount,
    succeeded: parseSuccessFlag(success),
    renderTimeMillis: parseInteger(renderTime),
    peakRamMB: parseFloatValue(peakRam),
    peakCpuPercent: parseFloatValue(peakCpu),
  };
}

export function encodeRow(record: RenderRecord): string[] {
  return [
    record.id,
    record.application,
    record.renderer,
    String(record.frameCount),
    record.succeeded ? "true" : "false",
    formatOptional(record.renderTimeMillis),
    formatOptional(record.peakRamMB),
    formatOptional(record.peakCpuPercent),
  ];
}

function formatOptional(value: number | null): string {
  return value === null ? "" : formatNumber(value);
}
