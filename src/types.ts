// ─── songbook-build: Core Types ─────────────────────────────────────────────
//
// Build targets, recipe steps, step/target results, and the hook interface
// the sequencer reports through. Midify types live in src/midify/types.ts.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Targets ────────────────────────────────────────────────────────────────

export const BUILD_TARGETS = ["all", "single", "midis", "clean"] as const;

/** A named build target. */
export type BuildTarget = (typeof BUILD_TARGETS)[number];

/** Target used when none is named on the command line. */
export const DEFAULT_TARGET: BuildTarget = "all";

// ─── Steps ──────────────────────────────────────────────────────────────────

/** Run an external program and wait for it to exit. */
export interface ExecStep {
  kind: "exec";
  command: string;
  args: string[];
}

/** Copy one file over another. */
export interface CopyStep {
  kind: "copy";
  from: string;
  to: string;
}

/** Remove every match of the given names/globs, recursively. Missing matches are fine. */
export interface RemoveStep {
  kind: "remove";
  patterns: string[];
}

/** Render MIDI files from MusiXTeX sources in-process. */
export interface MidifyStep {
  kind: "midify";
  /** A source file or a directory of sources. */
  source: string;
  /** Directory name for rendered .mid files, created beside the source. */
  outputDir: string;
}

/** One entry of a target's recipe. */
export type BuildStep = ExecStep | CopyStep | RemoveStep | MidifyStep;

// ─── Results ────────────────────────────────────────────────────────────────

/** Outcome of a single step. */
export interface StepResult {
  step: BuildStep;

  /** True when the step succeeded. */
  ok: boolean;

  /** Process exit code for exec steps; 0 or 1 for in-process steps. */
  exitCode: number;

  /** Wall-clock time spent on the step. */
  durationMs: number;

  /** Failure description, when the step failed without an exit code of its own. */
  error?: string;
}

/** Outcome of a whole target. */
export interface BuildReport {
  target: BuildTarget;
  ok: boolean;

  /** Exit code of the failing step, or 0 when every step succeeded. */
  exitCode: number;

  /** Results of the steps that ran, in order. Steps after a failure are absent. */
  steps: StepResult[];
}

// ─── Process Runner ─────────────────────────────────────────────────────────

/** Spawns external programs. Swapped for a recording runner in tests. */
export interface ProcessRunner {
  /**
   * Run a program to completion in `cwd` and resolve with its exit code.
   * Resolves with 127 when the program cannot be started.
   */
  run(command: string, args: string[], cwd: string): Promise<number>;
}

// ─── Build Hook ─────────────────────────────────────────────────────────────

/**
 * Receives progress from the sequencer. The CLI logs to the console;
 * tests record or discard.
 */
export interface BuildHook {
  /** A target is about to run. */
  onTargetStart(target: BuildTarget, stepCount: number): Promise<void>;

  /** A step is about to run (or, in a dry run, would run). */
  onStepStart(step: BuildStep, index: number): Promise<void>;

  /** A step finished. */
  onStepEnd(result: StepResult, index: number): Promise<void>;

  /** A target finished, successfully or not. */
  onTargetEnd(report: BuildReport): Promise<void>;

  /** Free-form progress line (midify per-file output, warnings). */
  message(text: string): Promise<void>;
}
