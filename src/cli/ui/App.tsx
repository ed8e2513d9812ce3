/**
 * @file Live status view for `idlease serve`
 */
import React, { useEffect, useState } from "react";
import { Box, Text, useApp } from "ink";
import type { PoolStats } from "../../allocator";
import type { RunningServer } from "../../http-server";
import { HLine, Hint, Loading, Title } from "./components/ui";
import { formatUtilization, statusLine, usageBar } from "./format";

type AppProps = {
  /** Starts the server; called once on mount. */
  start: () => Promise<RunningServer>;
  refreshMs?: number;
};

type ViewState =
  | { phase: "starting" }
  | { phase: "running"; server: RunningServer; stats: PoolStats }
  | { phase: "failed"; message: string };

/** Pool occupancy panel for a running server. */
export function StatusView({ server, stats }: { server: RunningServer; stats: PoolStats }) {
  return (
    <Box flexDirection="column">
      <Title label="idlease" subtitle={`listening on http://${server.host}:${server.port}`} />
      <HLine />
      <Text>
        capacity {stats.capacity} · lease {stats.timeoutMs}ms
      </Text>
      <Text>
        {usageBar(stats)} {formatUtilization(stats)}
      </Text>
      <Text>{statusLine(stats)}</Text>
      {stats.poisoned ? <Text color="red">pool is poisoned; restart the process</Text> : null}
      <HLine />
      <Hint>Ctrl+C to stop</Hint>
    </Box>
  );
}

/** Start the server and keep its pool stats on screen. */
export function App({ start, refreshMs = 1000 }: AppProps) {
  const { exit } = useApp();
  const [view, setView] = useState<ViewState>({ phase: "starting" });

  useEffect(() => {
    const alive = { current: true };
    start().then(
      (server) => {
        if (alive.current) {
          setView({ phase: "running", server, stats: server.allocator.stats() });
        }
      },
      (e: unknown) => {
        const message = e instanceof Error ? e.message : String(e);
        setView({ phase: "failed", message });
        exit(e instanceof Error ? e : new Error(message));
      },
    );
    return () => {
      alive.current = false;
    };
  }, [start, exit]);

  const running = view.phase === "running" ? view.server : null;
  useEffect(() => {
    if (!running) {
      return;
    }
    const timer = setInterval(() => {
      setView({ phase: "running", server: running, stats: running.allocator.stats() });
    }, refreshMs);
    return () => clearInterval(timer);
  }, [running, refreshMs]);

  if (view.phase === "starting") {
    return <Loading message="Starting idlease..." />;
  }
  if (view.phase === "failed") {
    return <Text color="red">Failed to start: {view.message}</Text>;
  }
  return <StatusView server={view.server} stats={view.stats} />;
}
