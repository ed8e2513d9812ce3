/**
 * @file E2E: lease lifecycle over the HTTP surface (in-process app.request)
 */
import { vi } from "vitest";
import { createAllocator } from "../src/allocator";
import { manualClock } from "../src/coordination/clock";
import { createApp } from "../src/http-server";
import { httpError } from "../src/http-server/common/errors";
import { createPool } from "../src/pool";

function setup(min = 1, max = 3, timeoutMs = 2000) {
  const clock = manualClock(0);
  const allocator = createAllocator({
    pool: { min, max, timeoutMs },
    clock,
    logger: { warn: vi.fn(), error: vi.fn() },
  });
  const app = createApp(allocator);
  const get = async (path: string) => {
    const res = await app.request(path);
    const body: unknown = await res.json();
    return { status: res.status, body };
  };
  return { clock, allocator, app, get };
}

describe("http/e2e leases", () => {
  it("serves the acquire / heartbeat / expiry scenario as JSON payloads", async () => {
    const { clock, get } = setup();
    expect(await get("/next")).toEqual({ status: 200, body: { id: 1, exp: 2000 } });
    expect(await get("/next")).toEqual({ status: 200, body: { id: 2, exp: 2000 } });
    expect(await get("/next")).toEqual({ status: 200, body: { id: 3, exp: 2000 } });
    expect(await get("/next")).toEqual({ status: 200, body: { error: { code: 1, msg: "No id available!" } } });

    clock.set(1000);
    expect(await get("/heartbeat/1")).toEqual({ status: 200, body: { id: 1, exp: 3000 } });

    clock.set(2500);
    expect(await get("/heartbeat/2")).toEqual({ status: 200, body: { error: { code: 2, msg: "Id expired!" } } });
    expect(await get("/next")).toEqual({ status: 200, body: { id: 2, exp: 4500 } });
    expect(await get("/stats")).toEqual({
      status: 200,
      body: { capacity: 3, available: 1, leased: 2, timeoutMs: 2000, poisoned: false },
    });
  });

  it("answers IdNonexistent for ids never leased or outside the range", async () => {
    const { get } = setup();
    const nonexistent = { status: 200, body: { error: { code: 3, msg: "Id nonexistent!" } } };
    expect(await get("/heartbeat/1")).toEqual(nonexistent);
    expect(await get("/heartbeat/0")).toEqual(nonexistent);
    expect(await get("/heartbeat/70000")).toEqual(nonexistent);
  });

  it("rejects malformed ids at the transport with 400", async () => {
    const { get } = setup();
    const invalid = { status: 400, body: { error: { message: "Invalid id" } } };
    expect(await get("/heartbeat/abc")).toEqual(invalid);
    expect(await get("/heartbeat/-1")).toEqual(invalid);
    expect(await get("/heartbeat/1.5")).toEqual(invalid);
    expect(await get("/heartbeat/99999999999999999999")).toEqual(invalid);
  });

  it("answers health and unknown routes", async () => {
    const { get } = setup();
    expect(await get("/health")).toEqual({ status: 200, body: { ok: true } });
    expect(await get("/nope")).toEqual({ status: 404, body: { error: { message: "Not Found" } } });
  });

  it("answers an HttpError with its own status", async () => {
    const { app } = setup();
    app.get("/conflict", () => {
      throw httpError(409, "already taken");
    });
    const res = await app.request("/conflict");
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: { message: "already taken" } });
  });

  it("turns a poisoned pool into 500 responses", async () => {
    const pool = createPool({ min: 1, max: 2, timeoutMs: 1000 });
    const allocator = createAllocator({ pool, clock: manualClock(0), logger: { warn: vi.fn(), error: vi.fn() } });
    const app = createApp(allocator);
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    try {
      await app.request("/next");
      pool.available.push(1);
      const res = await app.request("/next");
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: { message: "pool invariant violated: expected 2 identifiers, found 1 available + 2 leased" },
      });
      expect((await app.request("/heartbeat/1")).status).toBe(500);
      expect(spy).toHaveBeenCalledTimes(2);
    } finally {
      spy.mockRestore();
    }
  });

  it("adds CORS headers when enabled", async () => {
    const allocator = createAllocator({ pool: { min: 1, max: 1, timeoutMs: 1000 }, clock: manualClock(0) });
    const app = createApp(allocator, { cors: true });
    const res = await app.request("/health", { headers: { Origin: "http://example.test" } });
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });
});
