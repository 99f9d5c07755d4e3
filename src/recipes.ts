// ─── songbook-build: Recipes ────────────────────────────────────────────────
//
// The fixed step list behind each target:
//
//   all     musixtex main.tex → biber main → musixtex main.tex → out.pdf
//   single  musixtex singleDev.tex → out.pdf
//   midis   render content/ into midiOutput/
//   clean   rm -rf the generated files
//
// Names and programs come from the build config; the order never changes.
// ─────────────────────────────────────────────────────────────────────────────

import { BUILD_TARGETS, type BuildStep, type BuildTarget, type ExecStep } from "./types.js";
import type { BuildConfig } from "./config/schema.js";

/** Type guard for target names coming from the command line. */
export function isBuildTarget(name: string): name is BuildTarget {
  return (BUILD_TARGETS as readonly string[]).includes(name);
}

/** One-line description of each target, for `songbook targets` and help. */
export const TARGET_DESCRIPTIONS: Record<BuildTarget, string> = {
  all: "typeset the songbook with bibliography, copy the PDF to the output",
  single: "typeset the single-song development document",
  midis: "render MIDI files from the song sources",
  clean: "remove generated files and intermediates",
};

/**
 * Build the step list for a target.
 */
export function recipeFor(target: BuildTarget, config: BuildConfig): BuildStep[] {
  switch (target) {
    case "all": {
      const doc = config.mainDocument;
      return [
        typeset(config, doc),
        commandStep(config.bibliography, [doc]),
        typeset(config, doc),
        { kind: "copy", from: `${doc}.pdf`, to: config.output },
      ];
    }
    case "single": {
      const doc = config.singleDocument;
      return [
        typeset(config, doc),
        { kind: "copy", from: `${doc}.pdf`, to: config.output },
      ];
    }
    case "midis":
      if (config.midi.command) {
        return [commandStep(config.midi.command, [config.midi.source])];
      }
      return [{ kind: "midify", source: config.midi.source, outputDir: config.midi.outputDir }];
    case "clean":
      return [{ kind: "remove", patterns: [...config.clean] }];
  }
}

/**
 * Render a step the way a shell would show it.
 *
 *   exec   → "musixtex -l -p main.tex"
 *   copy   → "cp main.pdf out.pdf"
 *   remove → "rm -rf main.pdf *.bbl"
 *   midify → "midify content → midiOutput"
 */
export function describeStep(step: BuildStep): string {
  switch (step.kind) {
    case "exec":
      return [step.command, ...step.args].map(quoteArg).join(" ");
    case "copy":
      return `cp ${quoteArg(step.from)} ${quoteArg(step.to)}`;
    case "remove":
      return `rm -rf ${step.patterns.join(" ")}`;
    case "midify":
      return `midify ${quoteArg(step.source)} → ${step.outputDir}`;
  }
}

// ─── Internal ───────────────────────────────────────────────────────────────

function typeset(config: BuildConfig, doc: string): ExecStep {
  return commandStep(config.typesetter, [`${doc}.tex`]);
}

function commandStep(command: string[], extraArgs: string[]): ExecStep {
  const [program, ...args] = command;
  return { kind: "exec", command: program, args: [...args, ...extraArgs] };
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}
