/**
 * @file Pure formatting helpers for the status view
 */
import type { PoolStats } from "../../allocator";

/** Leased share of the pool as a percentage string with one decimal. */
export function formatUtilization(stats: PoolStats): string {
  if (stats.capacity === 0) {
    return "0.0%";
  }
  return `${((stats.leased / stats.capacity) * 100).toFixed(1)}%`;
}

/** Fixed-width usage bar, e.g. `[####------]`. */
export function usageBar(stats: PoolStats, width = 20): string {
  const filled = stats.capacity === 0 ? 0 : Math.round((stats.leased / stats.capacity) * width);
  return `[${"#".repeat(filled)}${"-".repeat(width - filled)}]`;
}

/** One-line summary used by --no-ui and the live view footer. */
export function statusLine(stats: PoolStats): string {
  const line = `${stats.leased}/${stats.capacity} leased, ${stats.available} available (${formatUtilization(stats)})`;
  return stats.poisoned ? `${line}, last known before poisoning` : line;
}
