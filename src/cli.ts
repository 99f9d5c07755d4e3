#!/usr/bin/env node
// ─── songbook: CLI Entry Point ──────────────────────────────────────────────
//
// Usage:
//   songbook                      # Build the default target (all)
//   songbook all                  # Typeset main.tex with bibliography → out.pdf
//   songbook single               # Typeset singleDev.tex → out.pdf
//   songbook midis                # Render MIDI files from content/
//   songbook clean                # Remove generated files
//   songbook clean all            # Several targets, in order
//   songbook all --dry-run        # Print the steps without running them
//   songbook midify <path>        # Render one file or directory to MIDI
//   songbook targets              # List targets and their steps
// ─────────────────────────────────────────────────────────────────────────────

import { resolve } from "node:path";
import { BUILD_TARGETS, DEFAULT_TARGET } from "./types.js";
import { loadBuildConfig } from "./config/loader.js";
import { describeStep, recipeFor, TARGET_DESCRIPTIONS } from "./recipes.js";
import { createConsoleBuildHook } from "./build-hooks.js";
import { runTargets } from "./sequencer.js";
import { midify } from "./midify/index.js";
import { parseBuildArgs, parseMidifyArgs, parseTargetsArgs, type ParsedArgs } from "./cli-args.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Unwrap parsed arguments, or print the usage problem and exit with its code. */
function orExit<T>(parsed: ParsedArgs<T>): T {
  if (!parsed.ok) {
    console.error(parsed.message);
    process.exit(parsed.exitCode);
  }
  return parsed.value;
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdBuild(args: string[]): Promise<void> {
  const { targets, dryRun, directory, configFile } = orExit(parseBuildArgs(args));
  const cwd = resolve(directory);
  const config = loadBuildConfig(cwd, configFile);

  const reports = await runTargets(targets, {
    cwd,
    config,
    dryRun,
    hook: createConsoleBuildHook({ dryRun }),
  });

  const failed = reports.find(r => !r.ok);
  if (failed) process.exit(failed.exitCode);
}

async function cmdMidify(args: string[]): Promise<void> {
  const { path, outputDir } = orExit(parseMidifyArgs(args));

  const report = await midify(path, {
    outputDir,
    log: line => console.log(line),
  });

  const rendered = report.files.filter(f => f.status === "rendered").length;
  console.log(`\n${rendered} file(s) rendered to ${report.outputDir}`);
  if (!report.ok) process.exit(1);
}

function cmdTargets(args: string[]): void {
  const { directory, configFile } = orExit(parseTargetsArgs(args));
  const cwd = resolve(directory);
  const config = loadBuildConfig(cwd, configFile);

  for (const target of BUILD_TARGETS) {
    const marker = target === DEFAULT_TARGET ? " (default)" : "";
    console.log(`\n${target}${marker} — ${TARGET_DESCRIPTIONS[target]}`);
    for (const step of recipeFor(target, config)) {
      console.log(`    ${describeStep(step)}`);
    }
  }
  console.log();
}

function cmdHelp(): void {
  console.log(`
songbook — Build a MusiXTeX songbook

Usage:
  songbook [target...] [options]   Build targets in order (default: all)
  songbook midify <path>           Render a file or directory to MIDI
  songbook targets                 List targets and their steps
  songbook help                    Show this help

Targets:
${BUILD_TARGETS.map(t => `  ${t.padEnd(8)} ${TARGET_DESCRIPTIONS[t]}`).join("\n")}

Options:
  -n, --dry-run            Print the steps without running them
  -C, --directory <dir>    Run in <dir> instead of the current directory
  --config <file>          Build config (default: songbook.json if present)

Midify options:
  --out <dir-name>         Output directory beside the source (default: midiOutput)

Examples:
  songbook                       # typeset main.tex with bibliography
  songbook clean all             # rebuild from scratch
  songbook single -n             # show what single would run
  songbook midify content/       # render every midifyable song
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case "midify":
      await cmdMidify(args.slice(1));
      break;
    case "targets":
      cmdTargets(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      await cmdBuild(args);
  }
}

main().catch((err) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
