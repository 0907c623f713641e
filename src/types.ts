export type OutputMode =
  | "count"
  | "avgtime"
  | "avgcpu"
  | "avgram"
  | "maxram"
  | "maxcpu"
  | "summary";

export type MalformedRowPolicy = "abort" | "skip";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface RunConfig {
  path: string;
  applicationFilter?: string;
  rendererFilter?: string;
  includeFailed: boolean;
  outputMode: OutputMode;
  malformedRowPolicy: MalformedRowPolicy;
  logLevel: LogLevel;
  help: boolean;
}

/** One render job, decoded from a single CSV row. */
export interface RenderRecord {
  readonly id: string;
  readonly application: string;
  readonly renderer: string;
  readonly frameCount: number;
  readonly succeeded: boolean;
  /** `null` when the source field is empty or not an integer. */
  readonly renderTimeMillis: number | null;
  readonly peakRamMB: number | null;
  readonly peakCpuPercent: number | null;
}

export interface FilterCriteria {
  readonly applicationFilter?: string;
  readonly rendererFilter?: string;
  readonly includeFailed: boolean;
}

export interface RowLocation {
  filePath: string;
  rowNumber: number;
}

export interface PeakSample {
  id: string;
  value: number;
}

export interface AggregateState {
  totalCount: number;
  timeSum: number;
  timeCount: number;
  cpuSum: number;
  cpuCount: number;
  maxCpu: PeakSample | null;
  ramSum: number;
  ramCount: number;
  maxRam: PeakSample | null;
  completed: boolean;
}

export interface RenderStatsView {
  count: number;
  avgTime: number;
  avgCpu: number;
  avgRam: number;
  maxRamId: string;
  maxCpuId: string;
}

export interface ScanCounters {
  rowsRead: number;
  rowsAccepted: number;
  rowsMalformed: number;
}

export interface RunResult extends ScanCounters {
  startedAt: string;
  finishedAt: string;
  files: string[];
  stats: AggregateState;
}
