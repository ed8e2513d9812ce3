/**
 * @file Specs: CLI argument parsing
 */
import { parseArgs } from "./args";

describe("cli/args", () => {
  it("defaults to serve with the live view", () => {
    expect(parseArgs([])).toEqual({ ok: true, args: { command: "serve", ui: true, overrides: { pool: {}, server: {} } } });
  });

  it("maps flags onto config overrides", () => {
    const res = parseArgs(["serve", "-c", "./cfg.mjs", "-p", "8080", "-H", "127.0.0.1", "--min", "5", "--max", "9", "--timeout", "250", "--no-ui"]);
    expect(res).toEqual({
      ok: true,
      args: {
        command: "serve",
        configPath: "./cfg.mjs",
        ui: false,
        overrides: { pool: { min: 5, max: 9, timeoutMs: 250 }, server: { port: 8080, host: "127.0.0.1" } },
      },
    });
  });

  it("recognizes help", () => {
    const res = parseArgs(["--help"]);
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.args.command).toBe("help");
    }
  });

  it("reports bad or missing values", () => {
    expect(parseArgs(["--port", "http"])).toEqual({ ok: false, error: "--port expects a non-negative integer" });
    expect(parseArgs(["--config"])).toEqual({ ok: false, error: "Missing value for --config" });
    expect(parseArgs(["--bogus"])).toEqual({ ok: false, error: "Unknown argument: --bogus" });
  });
});
