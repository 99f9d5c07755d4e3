import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
  parseCommandArgs,
  isMidifyable,
  extractMusic,
  readHeader,
  parseMusic,
} from "./document.js";

const SAMPLE_SONG = readFileSync(
  fileURLToPath(new URL("./__fixtures__/waltz.tex", import.meta.url)),
  "utf8",
);

describe("parseCommandArgs", () => {
  it("braced groups are single arguments", () => {
    expect(parseCommandArgs("{c}")).toEqual(["c"]);
    expect(parseCommandArgs("{-2}{j}")).toEqual(["-2", "j"]);
  });

  it("characters outside braces are separate arguments", () => {
    expect(parseCommandArgs("ce")).toEqual(["c", "e"]);
    expect(parseCommandArgs("0{c}")).toEqual(["0", "c"]);
  });

  it("nested braces collapse into the outer group", () => {
    expect(parseCommandArgs("{{ab}}")).toEqual(["ab"]);
  });

  it("empty text has no arguments", () => {
    expect(parseCommandArgs("")).toEqual([]);
  });
});

describe("isMidifyable", () => {
  it("looks for the marker", () => {
    expect(isMidifyable(SAMPLE_SONG)).toBe(true);
    expect(isMidifyable("\\begin{music}\\endpiece")).toBe(false);
  });
});

describe("extractMusic", () => {
  it("joins lines, drops comments and spaces", () => {
    const body = extractMusic(SAMPLE_SONG);
    expect(body.startsWith("\\generalmeter{\\meterfrac34}\\generalsignature{1}\\startpiece\\Notes\\qu{c}")).toBe(true);
    expect(body.endsWith("\\Notes\\wh{N}\\en")).toBe(true);
  });

  it("reads alla breve as 4/4", () => {
    const body = extractMusic("\\begin{music}\\generalmeter{\\allabreve}\\startpiece\\endpiece");
    expect(body).toBe("\\generalmeter{\\meterfrac44}\\startpiece");
  });

  it("throws without a music environment", () => {
    expect(() => extractMusic("\\midifyable")).toThrow("Missing \\begin{music}");
  });

  it("throws without \\endpiece", () => {
    expect(() => extractMusic("\\begin{music}\\startpiece")).toThrow("Missing \\endpiece");
  });
});

describe("readHeader", () => {
  it("reads meter and signature", () => {
    expect(readHeader("\\generalmeter{\\meterfrac68}\\generalsignature{-3}")).toEqual({
      meter: { numerator: 6, denominator: 8 },
      signature: -3,
    });
  });

  it("accepts braced meter digits", () => {
    expect(readHeader("\\generalmeter{\\meterfrac{12}{8}}").meter).toEqual({ numerator: 12, denominator: 8 });
  });

  it("defaults the signature to 0", () => {
    expect(readHeader("\\generalmeter{\\meterfrac44}").signature).toBe(0);
  });

  it("requires a meter", () => {
    expect(() => readHeader("\\generalsignature{2}")).toThrow("Missing \\generalmeter");
  });
});

describe("parseMusic", () => {
  const head = "\\generalmeter{\\meterfrac44}";

  it("places every note of the sample song", () => {
    const parsed = parseMusic(extractMusic(SAMPLE_SONG));
    expect(parsed.warnings).toEqual([]);
    expect(parsed.header).toEqual({ meter: { numerator: 3, denominator: 4 }, signature: 1 });
    expect(parsed.notes.map(n => [n.pitch, n.midi, n.startTick, n.durationTicks])).toEqual([
      ["c", 48, 0, 64],
      ["d", 50, 64, 64],
      ["e", 52, 128, 32],
      ["f", 54, 160, 32],
      ["c", 49, 192, 128],
      ["c", 49, 320, 64],
      ["d", 50, 384, 32],
      ["e", 52, 416, 32],
      ["j", 60, 448, 32],
      ["k", 62, 480, 32],
      ["N", 43, 1536, 256],
    ]);
    expect(parsed.endTick).toBe(1792);
  });

  it("resets local accidentals at the end of a notes group", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\sh{c}\\qu{c}\\en\\Notes\\qu{c}\\en`);
    expect(parsed.notes.map(n => n.midi)).toEqual([49, 48]);
  });

  it("applies flat key signatures", () => {
    const parsed = parseMusic("\\generalmeter{\\meterfrac44}\\generalsignature{-2}\\startpiece\\Notes\\qu{i}\\qu{l}\\qu{j}\\en");
    expect(parsed.notes.map(n => n.midi)).toEqual([58, 63, 60]);
  });

  it("lengthens dotted beam notes by half", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\ibbu0{c}\\qbp0{c}\\tbbu0\\qb0{d}\\en`);
    expect(parsed.notes.map(n => [n.startTick, n.durationTicks])).toEqual([[0, 24], [24, 16]]);
  });

  it("splits a single braced argument of a beamed group", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\Qqbbl{cdef}\\en`);
    expect(parsed.notes.map(n => [n.pitch, n.startTick, n.durationTicks])).toEqual([
      ["c", 0, 16], ["d", 16, 16], ["e", 32, 16], ["f", 48, 16],
    ]);
  });

  it("ignores slurs and skips", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\isluru0{c}\\qu{c}\\tslur0{d}\\qu{d}\\hsk\\en`);
    expect(parsed.warnings).toEqual([]);
    expect(parsed.notes).toHaveLength(2);
  });

  it("collects unknown elements as warnings", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\qu{c}\\bar\\en`, "song.tex");
    expect(parsed.warnings).toEqual([
      { location: "song.tex element 4", token: "bar", message: "Unknown element" },
    ]);
    expect(parsed.notes).toHaveLength(1);
  });

  it("treats object property names as unknown commands", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\constructor{c}\\qu{d}\\toString{e}\\en`);
    expect(parsed.warnings.map(w => [w.location, w.message])).toEqual([
      ["music element 3", "Unknown element"],
      ["music element 5", "Unknown element"],
    ]);
    expect(parsed.notes.map(n => [n.pitch, n.startTick, n.durationTicks])).toEqual([["d", 0, 64]]);
    expect(parsed.endTick).toBe(64);
  });

  it("warns about invalid pitches and keeps going", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\qu{cd}\\qu{e}\\en`);
    expect(parsed.warnings.map(w => w.message)).toEqual(['Invalid pitch: "cd"']);
    expect(parsed.notes.map(n => [n.pitch, n.startTick])).toEqual([["e", 0]]);
  });

  it("warns about beam notes outside a beam", () => {
    const parsed = parseMusic(`${head}\\startpiece\\Notes\\qb0{c}\\en`);
    expect(parsed.warnings.map(w => w.message)).toEqual(["Beam note outside a beam"]);
    expect(parsed.notes).toEqual([]);
  });

  it("requires \\startpiece", () => {
    expect(() => parseMusic(`${head}\\Notes\\qu{c}\\en`)).toThrow("Missing \\startpiece");
  });
});
