// ─── Midify: Pitches ────────────────────────────────────────────────────────
//
// MusiXTeX names staff positions with letters: A–N for the low register,
// a–z above, each letter one diatonic step up from the previous. "A" is A0.
// Numeric pitches count staff steps from "e" (0 = e, -1 = d, 1 = f).
// ─────────────────────────────────────────────────────────────────────────────

import type { LocalAccidentals } from "./types.js";

/** Every pitch letter, lowest first. */
export const PITCH_LETTERS = "ABCDEFGHIJKLMNabcdefghijklmnopqrstuvwxyz";

/** Semitones above A for each diatonic step A B C D E F G. */
const STEP_SEMITONES = [0, 2, 3, 5, 7, 8, 10];

/** MIDI number of "A". */
const LOWEST_MIDI = 21;

const ZERO_INDEX = PITCH_LETTERS.indexOf("e");

/** Key signature order as numeric pitches: F C G D A E B. */
export const SHARP_ORDER = [8, 5, 9, 6, 3, 7, 4];

/** Key signature order as numeric pitches: B E A D G C F. */
export const FLAT_ORDER = [4, 7, 3, 6, 2, 5, 1];

const NUMBER_PATTERN = /^-?\d+$/;

/**
 * Convert a numeric staff position to its letter.
 *
 *   0 → "e", 5 → "j", 21 → "z", -4 → "a", -5 → "N"
 */
export function pitchFromNumber(num: number): string {
  const index = ZERO_INDEX + num;
  if (num >= 22 || index < 0) {
    throw new Error(`Cannot convert number ${num} to pitch`);
  }
  return PITCH_LETTERS[index];
}

/**
 * Read a pitch argument: either a number or a single pitch letter.
 */
export function pitchFromArgument(arg: string): string {
  if (NUMBER_PATTERN.test(arg)) return pitchFromNumber(parseInt(arg, 10));
  if (arg.length === 1 && PITCH_LETTERS.includes(arg)) return arg;
  throw new Error(`Invalid pitch: "${arg}"`);
}

/** MIDI number of a letter with no accidental. "c" → 48, "j" → 60. */
export function letterToMidi(letter: string): number {
  const index = PITCH_LETTERS.indexOf(letter);
  if (index === -1 || letter.length !== 1) {
    throw new Error(`Invalid pitch: "${letter}"`);
  }
  return LOWEST_MIDI + 12 * Math.floor(index / 7) + STEP_SEMITONES[index % 7];
}

/** Diatonic step class (0 = A … 6 = G), shared by a letter in every octave. */
export function stepClass(letter: string): number {
  return PITCH_LETTERS.indexOf(letter) % 7;
}

/** Key signature as step classes that are raised or lowered. */
export interface KeySignature {
  sharps: number[];
  flats: number[];
}

/** Step classes altered by a \generalsignature value. */
export function keySignature(signature: number): KeySignature {
  const count = Math.min(Math.abs(signature), 7);
  const order = signature >= 0 ? SHARP_ORDER : FLAT_ORDER;
  const classes = order.slice(0, count).map(n => stepClass(pitchFromNumber(n)));
  return signature >= 0
    ? { sharps: classes, flats: [] }
    : { sharps: [], flats: classes };
}

/**
 * Resolve a letter to its sounding MIDI number.
 *
 * Local accidentals apply to the exact letter and win over the key
 * signature; an explicit natural cancels both.
 */
export function toMidiPitch(
  letter: string,
  key: KeySignature,
  local: LocalAccidentals,
): number {
  const base = letterToMidi(letter);
  if (local.naturals.includes(letter)) return base;
  if (local.sharps.includes(letter)) return base + 1;
  if (local.flats.includes(letter)) return base - 1;

  const cls = stepClass(letter);
  if (key.sharps.includes(cls)) return base + 1;
  if (key.flats.includes(cls)) return base - 1;
  return base;
}
