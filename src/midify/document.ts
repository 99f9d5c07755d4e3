// ─── Midify: Document Parser ────────────────────────────────────────────────
//
// Reads the music environment of a MusiXTeX document and lays its notes out
// on a tick timeline. Only the subset of MusiXTeX the songbook uses is
// understood: single-staff notes, beamed groups, accidentals and repeats.
// Anything else is reported as a warning and skipped.
// ─────────────────────────────────────────────────────────────────────────────

import { pitchFromArgument, keySignature, toMidiPitch, type KeySignature } from "./pitch.js";
import type {
  LocalAccidentals,
  MidifyNote,
  MusicHeader,
  ParsedMusic,
  ParseWarning,
} from "./types.js";

/** Marker a document must contain to be rendered. */
export const MIDIFY_MARKER = "\\midifyable";

// ─── Command Tables ──────────────────────────────────────────────────────────

/** Elements that close a notes group; local accidentals reset on each. */
const GROUP_SEPARATORS = new Set(["", "notes", "notesp", "nnotes", "nnnotes", "en", "xbar", "alaligne"]);

/** Single-note commands → length in ticks. */
const NOTE_TICKS = new Map<string, number>(Object.entries({
  cl: 32, cu: 32, ca: 32,
  clp: 48, cup: 48, cap: 48,
  ql: 64, qu: 64, qa: 64,
  qlp: 96, qup: 96, qap: 96,
  hl: 128, hu: 128, ha: 128,
  hlp: 192, hup: 192, hap: 192,
  wh: 256,
}));

/** Fixed beamed groups → note count and per-note length. */
const BEAM_GROUPS = new Map<string, { count: number; ticks: number }>(Object.entries({
  Dqbl: { count: 2, ticks: 32 }, Dqbu: { count: 2, ticks: 32 },
  Tqbl: { count: 3, ticks: 32 }, Tqbu: { count: 3, ticks: 32 },
  Qqbl: { count: 4, ticks: 32 }, Qqbu: { count: 4, ticks: 32 },
  Dqbbl: { count: 2, ticks: 16 }, Dqbbu: { count: 2, ticks: 16 },
  Tqbbl: { count: 3, ticks: 16 }, Tqbbu: { count: 3, ticks: 16 },
  Qqbbl: { count: 4, ticks: 16 }, Qqbbu: { count: 4, ticks: 16 },
}));

/** Beam openers → length of the notes hung on the beam with \qb. */
const BEAM_OPENERS = new Map<string, number>(Object.entries({
  ibu: 32, ibl: 32, Ibu: 32, Ibl: 32, tbu: 32, tbl: 32,
  ibbu: 16, ibbl: 16, Ibbu: 16, Ibbl: 16, nbbu: 16, nbbl: 16, tbbu: 16, tbbl: 16,
}));

/** Commands that only affect engraving. */
const IGNORED = new Set(["slur", "tslur", "isluru", "islurd", "sk", "hsk"]);

/** Cursor advance for any command containing "repeat". */
export const REPEAT_GAP_TICKS = 1024;

// ─── Arguments ───────────────────────────────────────────────────────────────

/**
 * Split a command's argument text. A braced group is one argument;
 * every character outside braces is an argument of its own.
 *
 *   "{c}"      → ["c"]
 *   "0{c}"     → ["0", "c"]
 *   "ce"       → ["c", "e"]
 *   "{-2}{j}"  → ["-2", "j"]
 */
export function parseCommandArgs(text: string): string[] {
  const args: string[] = [];
  let current = "";
  let depth = 0;

  for (const ch of text) {
    if (ch === "{") {
      depth++;
      continue;
    }
    if (ch === "}") {
      depth--;
      if (depth === 0) {
        args.push(current);
        current = "";
      }
      continue;
    }
    if (depth > 0) {
      current += ch;
      continue;
    }
    args.push(ch);
  }

  return args;
}

// ─── Extraction ──────────────────────────────────────────────────────────────

export function isMidifyable(text: string): boolean {
  return text.includes(MIDIFY_MARKER);
}

/**
 * Cut the music environment out of a document.
 *
 * Comments are dropped together with their line break and the next line's
 * indentation, so lines join up; then everything between \begin{music} and
 * \endpiece is kept with all spaces removed.
 */
export function extractMusic(text: string): string {
  const joined = text.replace(/(%.*)?\r?\n */g, "");

  const begin = "\\begin{music}";
  const start = joined.indexOf(begin);
  if (start === -1) throw new Error("Missing \\begin{music}");

  let body = joined.slice(start + begin.length);
  const end = body.indexOf("\\endpiece");
  if (end === -1) throw new Error("Missing \\endpiece");

  body = body.slice(0, end).replace(/ /g, "");
  return body.replace("\\generalmeter{\\allabreve}", "\\generalmeter{\\meterfrac44}");
}

/**
 * Read meter and key signature from an extracted music body.
 * The meter is required; the signature defaults to 0.
 */
export function readHeader(body: string): MusicHeader {
  // \meterfrac34 or \meterfrac{12}{8}
  const meter = body.match(/\\generalmeter\{\\meterfrac(?:\{(\d+)\}\{(\d+)\}|(\d)(\d))\}/);
  if (!meter) throw new Error("Missing \\generalmeter{\\meterfrac..}");

  const sig = body.match(/\\generalsignature\{?(-?\d)/);
  return {
    meter: {
      numerator: parseInt(meter[1] ?? meter[3], 10),
      denominator: parseInt(meter[2] ?? meter[4], 10),
    },
    signature: sig ? parseInt(sig[1], 10) : 0,
  };
}

// ─── Timeline ────────────────────────────────────────────────────────────────

/**
 * Walk the elements after \startpiece and place every note.
 * Problems with individual elements become warnings.
 */
export function parseMusic(body: string, location = "music"): ParsedMusic {
  const header = readHeader(body);

  const startMarker = "\\startpiece";
  const start = body.indexOf(startMarker);
  if (start === -1) throw new Error("Missing \\startpiece");

  const key = keySignature(header.signature);
  const walker = new TimelineWalker(key);
  const warnings: ParseWarning[] = [];

  const elements = body.slice(start + startMarker.length).split("\\");
  elements.forEach((element, i) => {
    try {
      walker.step(element);
    } catch (err) {
      warnings.push({
        location: `${location} element ${i + 1}`,
        token: element,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return { header, notes: walker.notes, endTick: walker.tick, warnings };
}

/** Cursor state while walking the elements of one piece. */
class TimelineWalker {
  readonly notes: MidifyNote[] = [];
  tick = 0;
  private local: LocalAccidentals = emptyAccidentals();
  private beamTicks = 0;

  constructor(private readonly key: KeySignature) {}

  step(element: string): void {
    if (GROUP_SEPARATORS.has(element.toLowerCase())) {
      this.local = emptyAccidentals();
      return;
    }

    const name = element.match(/^[a-zA-Z]+/)?.[0];
    if (!name) throw new Error("Unknown element");
    const args = parseCommandArgs(element.slice(name.length));

    const noteTicks = NOTE_TICKS.get(name);
    if (noteTicks !== undefined) {
      this.place(argAt(args, 0), noteTicks);
      return;
    }

    const group = BEAM_GROUPS.get(name);
    if (group) {
      const pitches = args.length === 1 ? parseCommandArgs(args[0]) : args;
      const resolved = Array.from({ length: group.count }, (_, i) => pitchFromArgument(argAt(pitches, i)));
      for (const pitch of resolved) this.placeResolved(pitch, group.ticks);
      return;
    }

    const opener = BEAM_OPENERS.get(name);
    if (opener !== undefined) {
      this.beamTicks = opener;
      return;
    }

    switch (name) {
      case "sh":
        this.local.sharps.push(pitchFromArgument(argAt(args, 0)));
        return;
      case "fl":
        this.local.flats.push(pitchFromArgument(argAt(args, 0)));
        return;
      case "na":
        this.local.naturals.push(pitchFromArgument(argAt(args, 0)));
        return;
      case "qb":
        this.place(argAt(args, 1), this.requireBeam());
        return;
      case "qbp": {
        const ticks = this.requireBeam();
        this.place(argAt(args, 1), ticks + Math.floor(ticks / 2));
        return;
      }
    }

    if (name.includes("repeat")) {
      this.tick += REPEAT_GAP_TICKS;
      return;
    }
    if (IGNORED.has(name)) return;

    throw new Error("Unknown element");
  }

  private place(arg: string, ticks: number): void {
    this.placeResolved(pitchFromArgument(arg), ticks);
  }

  private placeResolved(pitch: string, ticks: number): void {
    this.notes.push({
      pitch,
      midi: toMidiPitch(pitch, this.key, this.local),
      startTick: this.tick,
      durationTicks: ticks,
    });
    this.tick += ticks;
  }

  private requireBeam(): number {
    if (this.beamTicks === 0) throw new Error("Beam note outside a beam");
    return this.beamTicks;
  }
}

function emptyAccidentals(): LocalAccidentals {
  return { sharps: [], flats: [], naturals: [] };
}

function argAt(args: string[], index: number): string {
  if (index >= args.length) throw new Error(`Missing argument ${index + 1}`);
  return args[index];
}
