// ─── Midify: SMF Encoder ────────────────────────────────────────────────────
//
// Writes placed notes as a format-1 Standard MIDI File with a single track:
// time signature, note on/off pairs on channel 0, end of track.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiData, type MidiEvent } from "midi-file";
import { TICKS_PER_QUARTER, type Meter, type MidifyNote } from "./types.js";

/** Velocity for every note on and note off. */
export const NOTE_VELOCITY = 64;

interface TimedEvent {
  tick: number;
  /** Note offs sort before note ons at the same tick. */
  order: number;
  event: MidiEvent;
}

/**
 * Encode notes into SMF bytes.
 */
export function encodeMidi(notes: MidifyNote[], meter: Meter): Uint8Array {
  const timed: TimedEvent[] = [];
  for (const n of notes) {
    timed.push({
      tick: n.startTick,
      order: 1,
      event: { deltaTime: 0, type: "noteOn", channel: 0, noteNumber: n.midi, velocity: NOTE_VELOCITY },
    });
    timed.push({
      tick: n.startTick + n.durationTicks,
      order: 0,
      event: { deltaTime: 0, type: "noteOff", channel: 0, noteNumber: n.midi, velocity: NOTE_VELOCITY },
    });
  }
  timed.sort((a, b) => a.tick - b.tick || a.order - b.order);

  const events: MidiEvent[] = [{
    deltaTime: 0,
    meta: true,
    type: "timeSignature",
    numerator: meter.numerator,
    denominator: meter.denominator,
    metronome: 24,
    thirtyseconds: 8,
  }];

  let prevTick = 0;
  for (const t of timed) {
    t.event.deltaTime = t.tick - prevTick;
    prevTick = t.tick;
    events.push(t.event);
  }
  events.push({ deltaTime: 0, meta: true, type: "endOfTrack" });

  const data: MidiData = {
    header: { format: 1, numTracks: 1, ticksPerBeat: TICKS_PER_QUARTER },
    tracks: [events],
  };
  return new Uint8Array(writeMidi(data));
}
