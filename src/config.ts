import { z } from "zod";
import { UsageError } from "./common/errors.js";
import { OUTPUT_MODES } from "./stats/report.js";
import type { RunConfig } from "./types.js";

const schema = z.object({
  path: z.string().min(1),
  applicationFilter: z.string().min(1).optional(),
  rendererFilter: z.string().min(1).optional(),
  includeFailed: z.boolean(),
  outputMode: z.enum(OUTPUT_MODES),
  malformedRowPolicy: z.enum(["abort", "skip"]),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  help: z.boolean(),
});

const DEFAULTS = {
  outputMode: "count",
  malformedRowPolicy: "abort",
  logLevel: "warn",
} as const;

const VALUE_OPTIONS = new Set(["app", "renderer", "on-malformed"]);
const FLAG_OPTIONS = new Set(["failed", "verbose", "debug", "help", "h"]);
const OUTPUT_FLAGS: ReadonlySet<string> = new Set(OUTPUT_MODES.filter((mode) => mode !== "count"));

export const USAGE = [
  "Usage: render-stats [path] [--app NAME] [--renderer NAME] [--failed]",
  "                    [--avgtime | --avgcpu | --avgram | --maxram | --maxcpu | --summary]",
  "                    [--on-malformed abort|skip] [--verbose] [--debug]",
  "",
  "Scans renders_YYYY-MM-DD.csv files in path (default: current directory)",
  "and prints the number of matching renders, or the selected statistic.",
].join("\n");

interface CliRaw {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
  outputFlags: string[];
}

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunConfig {
  const args = parseCliArgs(argv);

  const parsed = schema.safeParse({
    path: args.positionals[0] ?? cwd,
    applicationFilter: readOptionalString(args, "app"),
    rendererFilter: readOptionalString(args, "renderer"),
    includeFailed: args.flags.has("failed"),
    outputMode: readOutputMode(args),
    malformedRowPolicy:
      args.values.get("on-malformed") ??
      readEnvString(env, "RENDER_STATS_ON_MALFORMED", DEFAULTS.malformedRowPolicy),
    logLevel: readLogLevel(args, env),
    help: args.flags.has("help") || args.flags.has("h"),
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new UsageError(`Invalid arguments: ${details}`);
  }
  return parsed.data;
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {
    positionals: [],
    values: new Map(),
    flags: new Set(),
    outputFlags: [],
  };
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("-") || token === "-") {
      out.positionals.push(token);
      continue;
    }
    const body = token.replace(/^--?/, "");
    const eq = body.indexOf("=");
    const key = eq >= 0 ? body.slice(0, eq) : body;

    if (VALUE_OPTIONS.has(key)) {
      if (eq >= 0) {
        out.values.set(key, body.slice(eq + 1));
        continue;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) {
        throw new UsageError(`argument --${key}: expected one argument`);
      }
      out.values.set(key, next);
      i += 1;
      continue;
    }
    if (OUTPUT_FLAGS.has(key)) {
      const previous = out.outputFlags.find((flag) => flag !== key);
      if (previous) {
        throw new UsageError(`argument --${key}: not allowed with argument --${previous}`);
      }
      out.outputFlags.push(key);
      continue;
    }
    if (FLAG_OPTIONS.has(key)) {
      out.flags.add(key);
    }
    // Anything else is ignored.
  }
  return out;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args.values.get(key);
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function readOutputMode(args: CliRaw): string {
  return args.outputFlags[0] ?? DEFAULTS.outputMode;
}

function readLogLevel(args: CliRaw, env: NodeJS.ProcessEnv): string {
  if (args.flags.has("debug")) {
    return "debug";
  }
  if (args.flags.has("verbose")) {
    return "info";
  }
  return readEnvString(env, "RENDER_STATS_LOG_LEVEL", DEFAULTS.logLevel);
}

function readEnvString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  return raw.toLowerCase();
}
