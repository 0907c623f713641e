export { run, type RunOptions } from "./orchestrator/runCore.js";
export { report, readStats, OUTPUT_MODES } from "./stats/report.js";
