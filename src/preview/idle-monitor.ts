// src/preview/idle-monitor.ts — Auto-exit after a period without heartbeats

import type { ActivityClock } from "./state.js";

export const IDLE_CHECK_INTERVAL_MS = 1000;

export interface IdleMonitor {
  stop(): void;
}

/**
 * Check the clock every `intervalMs`; call `onIdle` once when it has been
 * idle for at least `timeoutMs`, then stop.
 */
export function startIdleMonitor(
  clock: ActivityClock,
  timeoutMs: number,
  onIdle: () => void,
  intervalMs: number = IDLE_CHECK_INTERVAL_MS,
): IdleMonitor {
  const timer = setInterval(() => {
    if (clock.idleFor() < timeoutMs) return;
    clearInterval(timer);
    onIdle();
  }, intervalMs);
  return { stop: () => clearInterval(timer) };
}
