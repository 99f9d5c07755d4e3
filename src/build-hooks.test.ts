import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleBuildHook, createRecordingBuildHook } from "./build-hooks.js";
import type { BuildReport, StepResult } from "./types.js";

const TYPESET: StepResult = {
  step: { kind: "exec", command: "musixtex", args: ["-l", "-p", "singleDev.tex"] },
  ok: false,
  exitCode: 1,
  durationMs: 5,
};

describe("createConsoleBuildHook", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("announces the target and echoes each step", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const hook = createConsoleBuildHook();

    await hook.onTargetStart("clean", 1);
    await hook.onStepStart({ kind: "remove", patterns: ["*.bbl"] }, 0);

    expect(log.mock.calls).toEqual([["── clean (1 step)"], ["rm -rf *.bbl"]]);
  });

  it("summarises a dry run", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const hook = createConsoleBuildHook({ dryRun: true });
    const report: BuildReport = { target: "all", ok: true, exitCode: 0, steps: [] };

    await hook.onTargetEnd(report);

    expect(log).toHaveBeenCalledWith("✓ all: would run 0 step(s)");
  });

  it("reports failures on stderr", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const hook = createConsoleBuildHook();

    await hook.onStepEnd(TYPESET, 0);
    await hook.onTargetEnd({ target: "single", ok: false, exitCode: 1, steps: [TYPESET] });

    expect(error.mock.calls).toEqual([
      ["✗ musixtex -l -p singleDev.tex failed (exit 1)"],
      ["✗ single: stopped after 1 step(s), exit 1"],
    ]);
  });

  it("stays quiet about successful steps", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    await createConsoleBuildHook().onStepEnd({ ...TYPESET, ok: true, exitCode: 0 }, 0);

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});

describe("createRecordingBuildHook", () => {
  it("records step descriptions", async () => {
    const hook = createRecordingBuildHook();
    await hook.onStepStart({ kind: "copy", from: "main.pdf", to: "out.pdf" }, 3);
    await hook.message("hello");

    expect(hook.events).toEqual([
      { type: "step-start", index: 3, description: "cp main.pdf out.pdf" },
      { type: "message", text: "hello" },
    ]);
  });
});
