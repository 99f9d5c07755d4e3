// ─── Build Config Schema ─────────────────────────────────────────────────────
//
// Optional songbook.json next to the sources. Every field has a default, so
// an empty object (or no file at all) reproduces the stock recipes.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Defaults ────────────────────────────────────────────────────────────────

/** Generated files and intermediates removed by the clean target. */
export const DEFAULT_CLEAN_PATTERNS = [
  "main.pdf",
  "main.aux",
  "singleDev.pdf",
  "singleDev.aux",
  "main.toc",
  "missfont.log",
  "musixtex.log",
  "*.idx",
  "*.ilg",
  "*.ind",
  "main.out",
  "singleDev.out",
  "*.bbl",
  "*.bcf",
  "*.blg",
  "main.run.xml",
  "singleDev.run.xml",
  "midiOutput",
  "comment.cut",
];

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const CommandSchema = z.array(z.string().min(1)).min(1, "command must name a program");

export const MidiConfigSchema = z.object({
  source: z.string().min(1).default("content"),
  outputDir: z.string().min(1).default("midiOutput"),
  /** External MIDI script; when set, the midis target runs it instead of the built-in renderer. */
  command: CommandSchema.optional(),
});

export const BuildConfigSchema = z.object({
  mainDocument: z.string().min(1).default("main"),
  singleDocument: z.string().min(1).default("singleDev"),
  output: z.string().min(1).default("out.pdf"),
  typesetter: CommandSchema.default(["musixtex", "-l", "-p"]),
  bibliography: CommandSchema.default(["biber"]),
  midi: MidiConfigSchema.default({}),
  clean: z.array(z.string().min(1)).default(DEFAULT_CLEAN_PATTERNS),
}).strict();

// ─── Derived Types ───────────────────────────────────────────────────────────

export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type MidiConfig = z.infer<typeof MidiConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a raw build config using the zod schema.
 * Returns an empty array if valid.
 */
export function validateBuildConfig(config: unknown): ConfigError[] {
  const result = BuildConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** The config every recipe uses when no songbook.json is present. */
export function defaultBuildConfig(): BuildConfig {
  return BuildConfigSchema.parse({});
}
