// ─── Midify ─────────────────────────────────────────────────────────────────
//
// Renders MusiXTeX song sources to MIDI. Takes a single file or a directory
// (non-recursive); each document marked \midifyable is written to
// <parent of source>/midiOutput/<file name>.mid.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { extractMusic, isMidifyable, parseMusic } from "./document.js";
import { encodeMidi } from "./encode.js";
import type { MidifyFileResult, MidifyReport } from "./types.js";

export const DEFAULT_OUTPUT_DIR = "midiOutput";

export interface MidifyOptions {
  /** Directory relative paths resolve against. Default: process.cwd(). */
  cwd?: string;
  /** Output directory name, created beside the source. */
  outputDir?: string;
  /** Progress lines. */
  log?: (line: string) => void | Promise<void>;
}

/** A loaded source document. */
export interface SourceFile {
  name: string;
  text: string;
}

/**
 * Read a file, or every regular file directly inside a directory,
 * sorted by name. A path that does not exist has no sources.
 */
export function loadSources(path: string): SourceFile[] {
  if (!existsSync(path)) {
    return [];
  }

  if (statSync(path).isFile()) {
    return [{ name: basename(path), text: readFileSync(path, "utf8") }];
  }

  return readdirSync(path, { withFileTypes: true })
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort()
    .map(name => ({ name, text: readFileSync(join(path, name), "utf8") }));
}

/**
 * Render every midifyable document under `source`.
 * A document that cannot be parsed is reported as failed; the others still render.
 */
export async function midify(source: string, opts: MidifyOptions = {}): Promise<MidifyReport> {
  const log = opts.log ?? (() => {});
  const sourcePath = resolve(opts.cwd ?? process.cwd(), source);
  const outputDir = join(dirname(sourcePath), opts.outputDir ?? DEFAULT_OUTPUT_DIR);

  const sources = loadSources(sourcePath);
  await log(`Loaded ${sources.length} file(s):`);

  const files: MidifyFileResult[] = [];
  for (const { name, text } of sources) {
    await log(`- ${name}: ${text.length} characters`);

    if (!isMidifyable(text)) {
      await log("  Not midifyable, skipping.");
      files.push({ file: name, status: "skipped", noteCount: 0, warnings: [] });
      continue;
    }

    try {
      const parsed = parseMusic(extractMusic(text), name);
      for (const w of parsed.warnings) {
        await log(`  ${w.message}: \\${w.token}`);
      }

      mkdirSync(outputDir, { recursive: true });
      const outputPath = join(outputDir, `${name}.mid`);
      writeFileSync(outputPath, encodeMidi(parsed.notes, parsed.header.meter));
      await log(`  → ${outputPath} (${parsed.notes.length} notes)`);

      files.push({
        file: name,
        status: "rendered",
        outputPath,
        noteCount: parsed.notes.length,
        warnings: parsed.warnings,
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      await log(`  Failed: ${msg}`);
      files.push({ file: name, status: "failed", noteCount: 0, warnings: [], error: msg });
    }
  }

  return {
    source: sourcePath,
    outputDir,
    files,
    ok: files.every(f => f.status !== "failed"),
  };
}

export { extractMusic, isMidifyable, parseMusic, parseCommandArgs, readHeader } from "./document.js";
export { encodeMidi } from "./encode.js";
export {
  pitchFromNumber,
  pitchFromArgument,
  letterToMidi,
  keySignature,
  toMidiPitch,
} from "./pitch.js";
export type * from "./types.js";
