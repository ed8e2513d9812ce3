/**
 * @file idlease CLI entry (Ink + React)
 */
import React from "react";
import { render } from "ink";
import { App } from "./ui/App";
import { statusLine } from "./ui/format";
import { USAGE, parseArgs } from "./args";
import { describeConfig, loadAppConfig } from "../config";
import { startServer, type RunningServer } from "../http-server";

async function main() {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }
  const { args } = parsed;
  if (args.command === "help") {
    console.log(USAGE);
    return;
  }
  const cfg = await loadAppConfig({ configPath: args.configPath, env: process.env, overrides: args.overrides });
  if (!args.ui || !process.stdout.isTTY) {
    const server = await startServer(cfg);
    console.log(`${describeConfig(cfg)}; ${statusLine(server.allocator.stats())}`);
    return;
  }
  const running: { server?: RunningServer } = {};
  const start = async () => {
    running.server = await startServer(cfg, { quiet: true });
    return running.server;
  };
  const { waitUntilExit } = render(<App start={start} />);
  await waitUntilExit();
  await running.server?.close();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
