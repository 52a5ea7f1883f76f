// src/preview/state.ts — State shared between the watcher, the HTTP server and the idle monitor

/** Monotonic site version; starts at 1 and advances once per successful rebuild. */
export class VersionCounter {
  private value = 1;

  current(): number {
    return this.value;
  }

  bump(): number {
    this.value += 1;
    return this.value;
  }
}

/** Last time a preview page reported in, used by auto-exit. */
export class ActivityClock {
  private lastSeen: number;

  constructor(private readonly now: () => number = Date.now) {
    this.lastSeen = now();
  }

  touch(): void {
    this.lastSeen = this.now();
  }

  idleFor(): number {
    return Math.max(0, this.now() - this.lastSeen);
  }
}
