/**
 * @file Config file resolution
 */
import path from "node:path";
import { stat } from "node:fs/promises";

/** Supported executable config extensions (resolution order). */
export const CONFIG_EXTS = [".mjs", ".mts", ".ts", ".cjs", ".js"] as const;
/** Default, extensionless config file stem used across the project. */
export const DEFAULT_CONFIG_STEM = "idlease.config" as const;

async function kind(p: string): Promise<"file" | "dir" | null> {
  try {
    const s = await stat(p);
    if (s.isFile()) {
      return "file";
    }
    return s.isDirectory() ? "dir" : null;
  } catch {
    return null;
  }
}

async function firstWithExt(stem: string): Promise<string | null> {
  for (const ext of CONFIG_EXTS) {
    const cand = `${stem}${ext}`;
    if ((await kind(cand)) === "file") {
      return cand;
    }
  }
  return null;
}

/** Resolve a config path: allow directory, bare stem, or explicit file. */
export async function resolveConfigPath(input?: string): Promise<string | null> {
  const base = input ? path.resolve(input) : path.resolve(DEFAULT_CONFIG_STEM);
  const k = await kind(base);
  if (k === "file") {
    return base;
  }
  if (k === "dir") {
    return firstWithExt(path.join(base, DEFAULT_CONFIG_STEM));
  }
  if (path.extname(base) && CONFIG_EXTS.some((e) => e === path.extname(base))) {
    return null;
  }
  return firstWithExt(base);
}
