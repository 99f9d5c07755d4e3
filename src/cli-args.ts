// ─── songbook: Argument Parsing ─────────────────────────────────────────────
//
// Flag helpers and per-command argument parsing for the CLI. Parsing never
// exits the process: bad usage comes back as a result carrying exit code 2,
// and the entry point decides what to print.
// ─────────────────────────────────────────────────────────────────────────────

import { BUILD_TARGETS, DEFAULT_TARGET, type BuildTarget } from "./types.js";
import { isBuildTarget } from "./recipes.js";

/** Exit code for bad usage, as make uses. */
export const USAGE_ERROR = 2;

/** Outcome of parsing a command's arguments. */
export type ParsedArgs<T> =
  | { ok: true; value: T }
  | { ok: false; exitCode: typeof USAGE_ERROR; message: string };

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Check for boolean flag (no value). */
export function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some(f => args.includes(f));
}

export function getFlag(args: string[], ...flags: string[]): string | null {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  }
  return null;
}

/**
 * Split arguments into positionals and options nobody asked for.
 * A value flag consumes the argument after it.
 */
function scanArgs(
  args: string[],
  booleanFlags: readonly string[],
  valueFlags: readonly string[],
): { positionals: string[]; unknown: string[]; missingValue: string | null } {
  const positionals: string[] = [];
  const unknown: string[] = [];
  let missingValue: string | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      if (i + 1 >= args.length) missingValue = arg;
      i++;
    } else if (booleanFlags.includes(arg)) {
      continue;
    } else if (arg.startsWith("-")) {
      unknown.push(arg);
    } else {
      positionals.push(arg);
    }
  }
  return { positionals, unknown, missingValue };
}

function usage(message: string): { ok: false; exitCode: typeof USAGE_ERROR; message: string } {
  return { ok: false, exitCode: USAGE_ERROR, message };
}

function checkOptions(scan: ReturnType<typeof scanArgs>): string | null {
  if (scan.unknown.length > 0) return `Unknown option "${scan.unknown[0]}". Run "songbook help" for usage.`;
  if (scan.missingValue) return `Option "${scan.missingValue}" needs a value.`;
  return null;
}

// ─── Build ──────────────────────────────────────────────────────────────────

const BUILD_BOOLEAN_FLAGS = ["-n", "--dry-run"] as const;
const DIRECTORY_FLAGS = ["-C", "--directory"] as const;
const CONFIG_FLAG = "--config";
const BUILD_VALUE_FLAGS = [...DIRECTORY_FLAGS, CONFIG_FLAG];

export interface BuildArgs {
  /** Targets in the order given; the default target when none is named. */
  targets: BuildTarget[];
  dryRun: boolean;
  /** Working directory as given (unresolved). */
  directory: string;
  configFile?: string;
}

/** Parse `songbook [target...] [-n] [-C <dir>] [--config <file>]`. */
export function parseBuildArgs(args: string[]): ParsedArgs<BuildArgs> {
  const scan = scanArgs(args, BUILD_BOOLEAN_FLAGS, BUILD_VALUE_FLAGS);
  const bad = checkOptions(scan);
  if (bad) return usage(bad);

  const unknownTarget = scan.positionals.find(n => !isBuildTarget(n));
  if (unknownTarget !== undefined) {
    return usage(`No rule to make target "${unknownTarget}". Available: ${BUILD_TARGETS.join(", ")}`);
  }

  const targets = scan.positionals.filter(isBuildTarget);
  return {
    ok: true,
    value: {
      targets: targets.length > 0 ? targets : [DEFAULT_TARGET],
      dryRun: hasFlag(args, ...BUILD_BOOLEAN_FLAGS),
      directory: getFlag(args, ...DIRECTORY_FLAGS) ?? ".",
      configFile: getFlag(args, CONFIG_FLAG) ?? undefined,
    },
  };
}

// ─── Targets ────────────────────────────────────────────────────────────────

export interface TargetsArgs {
  directory: string;
  configFile?: string;
}

/** Parse `songbook targets [-C <dir>] [--config <file>]`. */
export function parseTargetsArgs(args: string[]): ParsedArgs<TargetsArgs> {
  const scan = scanArgs(args, [], BUILD_VALUE_FLAGS);
  const bad = checkOptions(scan);
  if (bad) return usage(bad);
  if (scan.positionals.length > 0) return usage(`Unexpected argument "${scan.positionals[0]}".`);

  return {
    ok: true,
    value: {
      directory: getFlag(args, ...DIRECTORY_FLAGS) ?? ".",
      configFile: getFlag(args, CONFIG_FLAG) ?? undefined,
    },
  };
}

// ─── Midify ─────────────────────────────────────────────────────────────────

export interface MidifyArgs {
  path: string;
  outputDir?: string;
}

/** Parse `songbook midify <path> [--out <dir-name>]`. */
export function parseMidifyArgs(args: string[]): ParsedArgs<MidifyArgs> {
  const scan = scanArgs(args, [], ["--out"]);
  const bad = checkOptions(scan);
  if (bad) return usage(bad);

  const path = scan.positionals[0];
  if (!path) return usage("Usage: songbook midify <file | directory> [--out <dir-name>]");

  return { ok: true, value: { path, outputDir: getFlag(args, "--out") ?? undefined } };
}
