// ─── Midify Types ───────────────────────────────────────────────────────────
//
// Tick-based types for the MusiXTeX → MIDI conversion. A quarter note is
// 64 ticks; pitches are MusiXTeX letters (A–N, a–z) until encoded.
// ─────────────────────────────────────────────────────────────────────────────

/** Ticks per quarter note in rendered files. */
export const TICKS_PER_QUARTER = 64;

/** A note placed on the tick timeline. */
export interface MidifyNote {
  /** MusiXTeX pitch letter, e.g. "c" or "N". */
  pitch: string;
  /** MIDI note number after key signature and accidentals. */
  midi: number;
  /** Absolute start in ticks. */
  startTick: number;
  /** Length in ticks. */
  durationTicks: number;
}

/** Meter from \generalmeter. */
export interface Meter {
  numerator: number;
  denominator: number;
}

/** Global settings read from the music preamble. */
export interface MusicHeader {
  meter: Meter;
  /** Sharps when positive, flats when negative. */
  signature: number;
}

/** Accidentals written inside the current notes group. Exact pitch letters. */
export interface LocalAccidentals {
  sharps: string[];
  flats: string[];
  naturals: string[];
}

/** Non-fatal problem found while walking the music. */
export interface ParseWarning {
  /** Where the problem occurred. */
  location: string;
  /** The offending element. */
  token: string;
  /** What went wrong. */
  message: string;
}

/** Result of walking one music body. */
export interface ParsedMusic {
  header: MusicHeader;
  notes: MidifyNote[];
  /** Position of the cursor after the last element. */
  endTick: number;
  warnings: ParseWarning[];
}

export type MidifyFileStatus = "rendered" | "skipped" | "failed";

/** Outcome for one source file. */
export interface MidifyFileResult {
  file: string;
  status: MidifyFileStatus;
  /** Written .mid path, when rendered. */
  outputPath?: string;
  noteCount: number;
  warnings: ParseWarning[];
  error?: string;
}

/** Outcome of a midify run over a file or directory. */
export interface MidifyReport {
  source: string;
  outputDir: string;
  files: MidifyFileResult[];
  /** True when no file failed. */
  ok: boolean;
}
