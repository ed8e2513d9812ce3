/**
 * @file Specs: layered config loading (file <- env <- overrides)
 */
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";

import { describeConfig, loadAppConfig } from "./index";
import { ConfigError } from "./errors";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "spec-config-index-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("config/loadAppConfig", () => {
  it("layers file, environment and overrides in that order", async () =>
    withTempDir(async (dir) => {
      const file = path.join(dir, "idlease.config.cjs");
      await writeFile(file, "module.exports = { pool: { min: 100, max: 200, timeoutMs: 1000 }, server: { port: 4000 } };\n");
      const cfg = await loadAppConfig({
        configPath: file,
        env: { MAX: "150", TIMEOUT: "soon", PORT: "5000" },
        overrides: { server: { port: 6000 } },
      });
      expect(cfg).toEqual({
        pool: { min: 100, max: 150, timeoutMs: 1000 },
        server: { port: 6000, host: "0.0.0.0" },
      });
      expect(describeConfig(cfg)).toBe("ids 100-150, lease 1000ms, listen 0.0.0.0:6000");
    }));

  it("reports an invalid config file", async () =>
    withTempDir(async (dir) => {
      const file = path.join(dir, "idlease.config.cjs");
      await writeFile(file, "module.exports = { pool: { timeoutMs: -5 } };\n");
      await expect(loadAppConfig({ configPath: file })).rejects.toThrow(ConfigError);
    }));

  it("rejects env bounds that cross", async () => {
    await expect(loadAppConfig({ configPath: undefined, env: { MIN: "10", MAX: "5" } })).rejects.toThrow(
      "pool: min must not exceed max",
    );
  });
});
