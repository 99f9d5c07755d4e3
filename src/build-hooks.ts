// ─── songbook-build: Build Hooks ────────────────────────────────────────────
//
// BuildHook implementations the sequencer reports progress through.
//
// Implementations:
//   - ConsoleBuildHook: echoes steps like make does (CLI)
//   - SilentBuildHook: no-op (testing)
//   - RecordingBuildHook: keeps every event for assertions (testing)
// ─────────────────────────────────────────────────────────────────────────────

import type { BuildHook, BuildReport, StepResult } from "./types.js";
import { describeStep } from "./recipes.js";

// ─── Console Hook (CLI) ─────────────────────────────────────────────────────

/**
 * Prints each step before it runs and a summary per target.
 * `dryRun` only changes the wording of the summary.
 */
export function createConsoleBuildHook(opts: { dryRun?: boolean } = {}): BuildHook {
  return {
    async onTargetStart(target, stepCount) {
      console.log(`── ${target} (${stepCount} step${stepCount === 1 ? "" : "s"})`);
    },

    async onStepStart(step) {
      console.log(describeStep(step));
    },

    async onStepEnd(result) {
      if (!result.ok) {
        const detail = result.error ? `: ${result.error}` : "";
        console.error(`✗ ${describeStep(result.step)} failed (exit ${result.exitCode})${detail}`);
      }
    },

    async onTargetEnd(report) {
      if (report.ok) {
        const verb = opts.dryRun ? "would run" : "ran";
        console.log(`✓ ${report.target}: ${verb} ${report.steps.length} step(s)`);
      } else {
        console.error(`✗ ${report.target}: stopped after ${report.steps.length} step(s), exit ${report.exitCode}`);
      }
    },

    async message(text) {
      console.log(text);
    },
  };
}

// ─── Silent Hook (testing) ──────────────────────────────────────────────────

export function createSilentBuildHook(): BuildHook {
  return {
    async onTargetStart() {},
    async onStepStart() {},
    async onStepEnd() {},
    async onTargetEnd() {},
    async message() {},
  };
}

// ─── Recording Hook (testing) ───────────────────────────────────────────────

/** A recorded build event for assertions. */
export type BuildEvent =
  | { type: "target-start"; target: string; stepCount: number }
  | { type: "step-start"; index: number; description: string }
  | { type: "step-end"; index: number; result: StepResult }
  | { type: "target-end"; report: BuildReport }
  | { type: "message"; text: string };

/**
 * Records all build events.
 * Use: `const hook = createRecordingBuildHook(); ... hook.events`
 */
export function createRecordingBuildHook(): BuildHook & { events: BuildEvent[] } {
  const events: BuildEvent[] = [];

  return {
    events,

    async onTargetStart(target, stepCount) {
      events.push({ type: "target-start", target, stepCount });
    },

    async onStepStart(step, index) {
      events.push({ type: "step-start", index, description: describeStep(step) });
    },

    async onStepEnd(result, index) {
      events.push({ type: "step-end", index, result });
    },

    async onTargetEnd(report) {
      events.push({ type: "target-end", report });
    },

    async message(text) {
      events.push({ type: "message", text });
    },
  };
}
