// ─── songbook-build: Build Sequencer ────────────────────────────────────────
//
// Runs a target's recipe one step at a time and stops at the first failure.
// No retries, no rollback: whatever earlier steps wrote stays on disk.
//
// Step semantics:
//   exec    exit code of the program (127 when it cannot be started)
//   copy    1 when the source is missing or unreadable
//   remove  never fails on missing files (rm -rf)
//   midify  1 when any document fails to render
// ─────────────────────────────────────────────────────────────────────────────

import { copyFile, rm } from "node:fs/promises";
import { resolve } from "node:path";
import { glob } from "glob";
import type {
  BuildHook,
  BuildReport,
  BuildStep,
  BuildTarget,
  ProcessRunner,
  StepResult,
} from "./types.js";
import type { BuildConfig } from "./config/schema.js";
import { recipeFor } from "./recipes.js";
import { createSpawnProcessRunner } from "./process-runner.js";
import { createSilentBuildHook } from "./build-hooks.js";
import { midify } from "./midify/index.js";

export interface SequencerOptions {
  /** Directory every step runs in. */
  cwd: string;
  config: BuildConfig;
  /** Spawns exec steps. Default: node:child_process. */
  runner?: ProcessRunner;
  /** Progress sink. Default: silent. */
  hook?: BuildHook;
  /** Report steps without running them. */
  dryRun?: boolean;
}

/** What a single step needs to run. */
export interface StepContext {
  cwd: string;
  runner: ProcessRunner;
  hook: BuildHook;
}

/**
 * Run one target. Resolves with a report; never rejects for a failing step.
 */
export async function runTarget(target: BuildTarget, opts: SequencerOptions): Promise<BuildReport> {
  const hook = opts.hook ?? createSilentBuildHook();
  const ctx: StepContext = {
    cwd: opts.cwd,
    runner: opts.runner ?? createSpawnProcessRunner(),
    hook,
  };

  const steps = recipeFor(target, opts.config);
  await hook.onTargetStart(target, steps.length);

  const results: StepResult[] = [];
  let exitCode = 0;

  for (const [index, step] of steps.entries()) {
    await hook.onStepStart(step, index);

    const result: StepResult = opts.dryRun
      ? { step, ok: true, exitCode: 0, durationMs: 0 }
      : await runStep(step, ctx);

    results.push(result);
    await hook.onStepEnd(result, index);

    if (!result.ok) {
      exitCode = result.exitCode;
      break;
    }
  }

  const report: BuildReport = { target, ok: exitCode === 0, exitCode, steps: results };
  await hook.onTargetEnd(report);
  return report;
}

/**
 * Run several targets in order, like `make clean all`.
 * Stops after the first target that fails.
 */
export async function runTargets(targets: BuildTarget[], opts: SequencerOptions): Promise<BuildReport[]> {
  const reports: BuildReport[] = [];
  for (const target of targets) {
    const report = await runTarget(target, opts);
    reports.push(report);
    if (!report.ok) break;
  }
  return reports;
}

/**
 * Execute a single step.
 */
export async function runStep(step: BuildStep, ctx: StepContext): Promise<StepResult> {
  const started = Date.now();
  const done = (exitCode: number, error?: string): StepResult => ({
    step,
    ok: exitCode === 0,
    exitCode,
    durationMs: Date.now() - started,
    ...(error !== undefined ? { error } : {}),
  });

  switch (step.kind) {
    case "exec":
      return done(await ctx.runner.run(step.command, step.args, ctx.cwd));

    case "copy":
      try {
        await copyFile(resolve(ctx.cwd, step.from), resolve(ctx.cwd, step.to));
        return done(0);
      } catch (err) {
        return done(1, err instanceof Error ? err.message : String(err));
      }

    case "remove":
      try {
        await removeMatches(step.patterns, ctx.cwd);
        return done(0);
      } catch (err) {
        return done(1, err instanceof Error ? err.message : String(err));
      }

    case "midify":
      try {
        const report = await midify(step.source, {
          cwd: ctx.cwd,
          outputDir: step.outputDir,
          log: line => ctx.hook.message(line),
        });
        if (report.ok) return done(0);
        const failed = report.files.filter(f => f.status === "failed").map(f => f.file);
        return done(1, `could not render ${failed.join(", ")}`);
      } catch (err) {
        return done(1, err instanceof Error ? err.message : String(err));
      }
  }
}

/** Remove every file or directory matching any of the patterns. */
async function removeMatches(patterns: string[], cwd: string): Promise<void> {
  const matches = await glob(patterns, { cwd });
  for (const match of matches) {
    await rm(resolve(cwd, match), { recursive: true, force: true });
  }
}
