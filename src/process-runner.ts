// ─── songbook-build: Process Runner ─────────────────────────────────────────
//
// Spawns the external tools (musixtex, biber, a MIDI script) with inherited
// stdio so their output streams straight to the terminal. A recording runner
// stands in for them in tests.
// ─────────────────────────────────────────────────────────────────────────────

import { spawn } from "node:child_process";
import type { ProcessRunner } from "./types.js";

/** Exit code reported when a program cannot be started (as the shell does). */
export const COMMAND_NOT_FOUND = 127;

/**
 * Runs programs through node:child_process.
 * A process killed by a signal counts as exit code 1.
 */
export function createSpawnProcessRunner(): ProcessRunner {
  return {
    run(command, args, cwd) {
      return new Promise<number>((resolve) => {
        const proc = spawn(command, args, { cwd, stdio: "inherit" });
        proc.on("error", (err: NodeJS.ErrnoException) => {
          console.error(`${command}: ${err.message}`);
          resolve(err.code === "ENOENT" ? COMMAND_NOT_FOUND : 1);
        });
        proc.on("close", (code) => resolve(code ?? 1));
      });
    },
  };
}

// ─── Recording Runner (testing) ─────────────────────────────────────────────

/** A recorded invocation. */
export interface ProcessCall {
  command: string;
  args: string[];
  cwd: string;
}

/**
 * What a fake invocation does: its exit code, and optionally a side effect
 * standing in for the real tool's output files.
 */
export type FakeProcess = (call: ProcessCall) => number | Promise<number>;

/**
 * Records every invocation instead of spawning.
 * `programs` maps a command name to its fake; unlisted commands exit 0.
 */
export function createRecordingProcessRunner(
  programs: Record<string, FakeProcess> = {},
): ProcessRunner & { calls: ProcessCall[] } {
  const calls: ProcessCall[] = [];

  return {
    calls,
    async run(command, args, cwd) {
      const call = { command, args: [...args], cwd };
      calls.push(call);
      const fake = Object.hasOwn(programs, command) ? programs[command] : undefined;
      return fake ? fake(call) : 0;
    },
  };
}
