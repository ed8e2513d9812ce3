/**
 * @file E2E: server boot and bind failures (loopback only)
 */
import { createServer, type Server } from "node:net";
import type { AddressInfo } from "node:net";
import { vi } from "vitest";
import { manualClock } from "../src/coordination/clock";
import { startServer } from "../src/http-server";
import type { AppConfig } from "../src/http-server";

function listenOnFreePort(): Promise<Server> {
  return new Promise((resolve, reject) => {
    const blocker = createServer();
    blocker.once("error", reject);
    blocker.listen(0, "127.0.0.1", () => resolve(blocker));
  });
}

function closeServer(s: Server): Promise<void> {
  return new Promise((resolve, reject) => s.close((err) => (err ? reject(err) : resolve())));
}

function config(port: number): AppConfig {
  return {
    pool: { min: 1, max: 4, timeoutMs: 1000 },
    server: { port, host: "127.0.0.1", clock: manualClock(0), logger: { warn: vi.fn(), error: vi.fn() } },
  };
}

describe("http/start", () => {
  it("rejects when the port is already taken", async () => {
    const blocker = await listenOnFreePort();
    const addr: AddressInfo | string | null = blocker.address();
    try {
      if (addr === null || typeof addr === "string") {
        throw new Error("blocker has no TCP address");
      }
      await expect(startServer(config(addr.port), { quiet: true })).rejects.toMatchObject({ code: "EADDRINUSE" });
    } finally {
      await closeServer(blocker);
    }
  });

  it("listens on an ephemeral port and closes cleanly", async () => {
    const running = await startServer(config(0), { quiet: true });
    try {
      expect(running.port).toBeGreaterThan(0);
      expect(running.host).toBe("127.0.0.1");
      expect(running.allocator.acquireNext()).toEqual({ ok: true, id: 1, exp: 1000 });
    } finally {
      await running.close();
    }
  });
});
