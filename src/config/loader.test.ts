import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadBuildConfig } from "./loader.js";
import { validateBuildConfig, defaultBuildConfig, DEFAULT_CLEAN_PATTERNS } from "./schema.js";

describe("defaultBuildConfig", () => {
  it("reproduces the stock recipe settings", () => {
    expect(defaultBuildConfig()).toEqual({
      mainDocument: "main",
      singleDocument: "singleDev",
      output: "out.pdf",
      typesetter: ["musixtex", "-l", "-p"],
      bibliography: ["biber"],
      midi: { source: "content", outputDir: "midiOutput" },
      clean: DEFAULT_CLEAN_PATTERNS,
    });
  });
});

describe("validateBuildConfig", () => {
  it("accepts an empty object", () => {
    expect(validateBuildConfig({})).toEqual([]);
  });

  it("rejects an empty command", () => {
    expect(validateBuildConfig({ typesetter: [] })).toEqual([
      { field: "typesetter", message: "command must name a program" },
    ]);
  });

  it("reports nested fields with a dotted path", () => {
    const errors = validateBuildConfig({ midi: { source: 3 } });
    expect(errors).toHaveLength(1);
    expect(errors[0].field).toBe("midi.source");
  });

  it("rejects unknown keys", () => {
    const errors = validateBuildConfig({ mainDoc: "book" });
    expect(errors).toHaveLength(1);
    expect(errors[0].field).toBe("root");
  });
});

describe("loadBuildConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "songbook-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when songbook.json is absent", () => {
    expect(loadBuildConfig(dir)).toEqual(defaultBuildConfig());
  });

  it("merges songbook.json over the defaults", () => {
    writeFileSync(join(dir, "songbook.json"), JSON.stringify({ mainDocument: "book" }));
    const config = loadBuildConfig(dir);
    expect(config.mainDocument).toBe("book");
    expect(config.singleDocument).toBe("singleDev");
  });

  it("loads an explicit file relative to the directory", () => {
    writeFileSync(join(dir, "alt.json"), JSON.stringify({ output: "book.pdf" }));
    expect(loadBuildConfig(dir, "alt.json").output).toBe("book.pdf");
  });

  it("throws when an explicit file is missing", () => {
    expect(() => loadBuildConfig(dir, "missing.json")).toThrow("Config not found");
  });

  it("throws on malformed JSON", () => {
    writeFileSync(join(dir, "songbook.json"), "{ not json");
    expect(() => loadBuildConfig(dir)).toThrow("Invalid config");
  });

  it("lists schema issues by field", () => {
    writeFileSync(join(dir, "songbook.json"), JSON.stringify({ bibliography: [] }));
    expect(() => loadBuildConfig(dir)).toThrow("bibliography: command must name a program");
  });
});
