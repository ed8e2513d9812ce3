/**
 * @file CLI argument parsing (no dependencies; flags mirror config fields)
 */
import type { RawAppConfig } from "../config";

export type CliArgs = {
  command: "serve" | "help";
  configPath?: string;
  overrides: RawAppConfig;
  /** Render the Ink status view (disable with --no-ui or when stdout is not a TTY). */
  ui: boolean;
};

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

const INT_FLAGS = {
  "--port": "port",
  "-p": "port",
  "--min": "min",
  "--max": "max",
  "--timeout": "timeoutMs",
} as const;

function isIntFlag(a: string): a is keyof typeof INT_FLAGS {
  return Object.prototype.hasOwnProperty.call(INT_FLAGS, a);
}

/** Parse argv (without node and script) into a command and config overrides. */
export function parseArgs(argv: readonly string[]): ParseResult {
  const pool: NonNullable<RawAppConfig["pool"]> = {};
  const server: NonNullable<RawAppConfig["server"]> = {};
  const out: { command: CliArgs["command"]; configPath?: string; ui: boolean } = { command: "serve", ui: true };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--help" || a === "-h" || a === "help") {
      out.command = "help";
      continue;
    }
    if (a === "serve") {
      continue;
    }
    if (a === "--no-ui") {
      out.ui = false;
      continue;
    }
    const v = argv[i + 1];
    if (a === "--config" || a === "-c" || a === "--host" || a === "-H") {
      if (v === undefined || v.startsWith("-")) {
        return { ok: false, error: `Missing value for ${a}` };
      }
      i++;
      if (a === "--config" || a === "-c") {
        out.configPath = v;
      } else {
        server.host = v;
      }
      continue;
    }
    if (isIntFlag(a)) {
      if (v === undefined || !/^\d+$/.test(v)) {
        return { ok: false, error: `${a} expects a non-negative integer` };
      }
      i++;
      const key = INT_FLAGS[a];
      if (key === "port") {
        server.port = Number(v);
      } else {
        pool[key] = Number(v);
      }
      continue;
    }
    return { ok: false, error: `Unknown argument: ${a}` };
  }
  return { ok: true, args: { ...out, overrides: { pool, server } } };
}

export const USAGE = `
Usage: idlease [serve] [options]

Leases small integer ids from a fixed range; clients renew with heartbeats.

Endpoints:
  GET /next             Lease the next free id -> { id, exp }
  GET /heartbeat/:id    Renew a lease -> { id, exp } or { error: { code, msg } }
  GET /stats            Pool occupancy

Options:
  --config, -c <path>   Path to executable config (idlease.config.*)
  --port, -p <number>   Listen port (env PORT, default 3000)
  --host, -H <host>     Listen host (default 0.0.0.0)
  --min <number>        Lowest id (env MIN, default 1)
  --max <number>        Highest id (env MAX, default 65535)
  --timeout <ms>        Lease duration (env TIMEOUT, default 3000)
  --no-ui               Print one status line instead of the live view
  --help, -h            Show this help
`;
