import type { FilterCriteria, RenderRecord } from "./types.js";

export function matchesNameFilters(record: RenderRecord, criteria: FilterCriteria): boolean {
  if (criteria.applicationFilter !== undefined && criteria.applicationFilter !== record.application) {
    return false;
  }
  if (criteria.rendererFilter !== undefined && criteria.rendererFilter !== record.renderer) {
    return false;
  }
  return true;
}

export function acceptRecord(record: RenderRecord, criteria: FilterCriteria): boolean {
  if (!matchesNameFilters(record, criteria)) {
    return false;
  }
  return record.succeeded || criteria.includeFailed;
}
