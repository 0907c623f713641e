import { StatsNotReadyError } from "../common/errors.js";
import { formatNumber } from "../normalize.js";
import type { AggregateState, OutputMode, RenderStatsView } from "../types.js";

export const OUTPUT_MODES = [
  "count",
  "avgtime",
  "avgcpu",
  "avgram",
  "maxram",
  "maxcpu",
  "summary",
] as const satisfies readonly OutputMode[];

export function readStats(state: AggregateState | undefined): RenderStatsView {
  if (!state || !state.completed) {
    throw new StatsNotReadyError();
  }
  return {
    count: state.totalCount,
    avgTime: average(state.timeSum / 1000, state.timeCount),
    avgCpu: average(state.cpuSum, state.cpuCount),
    avgRam: average(state.ramSum, state.ramCount),
    maxRamId: state.maxRam?.id ?? "",
    maxCpuId: state.maxCpu?.id ?? "",
  };
}

export function report(state: AggregateState | undefined, mode: OutputMode): string {
  const stats = readStats(state);
  switch (mode) {
    case "count":
      return formatNumber(stats.count);
    case "avgtime":
      return formatNumber(stats.avgTime);
    case "avgcpu":
      return formatNumber(stats.avgCpu);
    case "avgram":
      return formatNumber(stats.avgRam);
    case "maxram":
      return stats.maxRamId;
    case "maxcpu":
      return stats.maxCpuId;
    case "summary":
      return [
        formatNumber(stats.avgTime),
        formatNumber(stats.avgCpu),
        formatNumber(stats.avgRam),
        stats.maxRamId,
        stats.maxCpuId,
      ].join("\n");
  }
}

function average(sum: number, samples: number): number {
  if (samples === 0) {
    return 0;
  }
  return sum / samples;
}
