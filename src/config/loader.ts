// ─── Build Config Loader ─────────────────────────────────────────────────────
//
// Reads songbook.json from the build directory, validates it with Zod,
// and falls back to the defaults when the file is absent.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { BuildConfigSchema, defaultBuildConfig, type BuildConfig } from "./schema.js";

export const CONFIG_FILE_NAME = "songbook.json";

/**
 * Load the build config for `dir`.
 *
 * With an explicit `file` the config must exist; without one a missing
 * songbook.json means defaults.
 */
export function loadBuildConfig(dir: string, file?: string): BuildConfig {
  const filePath = file
    ? (isAbsolute(file) ? file : join(dir, file))
    : join(dir, CONFIG_FILE_NAME);

  if (!existsSync(filePath)) {
    if (file) throw new Error(`Config not found: ${filePath}`);
    return defaultBuildConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid config ${filePath}: ${msg}`);
  }

  const result = BuildConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${filePath}:\n${issues}`);
  }

  return result.data;
}
