import type { AggregateState, PeakSample, RenderRecord } from "../types.js";

export function createAggregateState(): AggregateState {
  return {
    totalCount: 0,
    timeSum: 0,
    timeCount: 0,
    cpuSum: 0,
    cpuCount: 0,
    maxCpu: null,
    ramSum: 0,
    ramCount: 0,
    maxRam: null,
    completed: false,
  };
}

/**
 * Folds one accepted record into `state`. Each metric only sees records
 * that carry its field, so averages divide by their own sample count.
 */
export function updateAggregate(state: AggregateState, record: RenderRecord): AggregateState {
  state.totalCount += 1;

  if (record.renderTimeMillis !== null) {
    state.timeSum += record.renderTimeMillis;
    state.timeCount += 1;
  }

  if (record.peakCpuPercent !== null) {
    state.cpuSum += record.peakCpuPercent;
    state.cpuCount += 1;
    state.maxCpu = pickPeak(state.maxCpu, record.id, record.peakCpuPercent);
  }

  if (record.peakRamMB !== null) {
    state.ramSum += record.peakRamMB;
    state.ramCount += 1;
    state.maxRam = pickPeak(state.maxRam, record.id, record.peakRamMB);
  }

  return state;
}

export function completeAggregate(state: AggregateState): AggregateState {
  state.completed = true;
  return state;
}

// Strictly greater: on ties the first record seen keeps the peak.
function pickPeak(current: PeakSample | null, id: string, value: number): PeakSample {
  if (current === null || value > current.value) {
    return { id, value };
  }
  return current;
}
