// ─── songbook-build ─────────────────────────────────────────────────────────
//
// Build sequencer for MusiXTeX songbooks: typesetting, bibliography,
// MIDI rendering and cleanup.
//
// Usage:
//   import { runTarget, loadBuildConfig } from "songbook-build";
//   const report = await runTarget("all", { cwd, config: loadBuildConfig(cwd) });
// ─────────────────────────────────────────────────────────────────────────────

// Export sequencer
export { runTarget, runTargets, runStep } from "./sequencer.js";
export type { SequencerOptions, StepContext } from "./sequencer.js";

// Export recipes
export { recipeFor, describeStep, isBuildTarget, TARGET_DESCRIPTIONS } from "./recipes.js";

// Export config
export { loadBuildConfig, CONFIG_FILE_NAME } from "./config/loader.js";
export {
  BuildConfigSchema,
  MidiConfigSchema,
  DEFAULT_CLEAN_PATTERNS,
  validateBuildConfig,
  defaultBuildConfig,
} from "./config/schema.js";
export type { BuildConfig, MidiConfig, ConfigError } from "./config/schema.js";

// Export process runners
export {
  createSpawnProcessRunner,
  createRecordingProcessRunner,
  COMMAND_NOT_FOUND,
} from "./process-runner.js";
export type { ProcessCall, FakeProcess } from "./process-runner.js";

// Export build hooks
export {
  createConsoleBuildHook,
  createSilentBuildHook,
  createRecordingBuildHook,
} from "./build-hooks.js";
export type { BuildEvent } from "./build-hooks.js";

// Export midify
export {
  midify,
  loadSources,
  extractMusic,
  isMidifyable,
  parseMusic,
  parseCommandArgs,
  readHeader,
  encodeMidi,
  pitchFromNumber,
  pitchFromArgument,
  letterToMidi,
  keySignature,
  toMidiPitch,
} from "./midify/index.js";
export type {
  MidifyOptions,
  SourceFile,
  MidifyNote,
  MidifyReport,
  MidifyFileResult,
  ParsedMusic,
  ParseWarning,
} from "./midify/index.js";

// Export types
export { BUILD_TARGETS, DEFAULT_TARGET } from "./types.js";
export type {
  BuildTarget,
  BuildStep,
  ExecStep,
  CopyStep,
  RemoveStep,
  MidifyStep,
  StepResult,
  BuildReport,
  ProcessRunner,
  BuildHook,
} from "./types.js";
