// src/preview/rebuild-scheduler.ts — Coalesces watcher events into serialized rebuilds

export const QUIET_PERIOD_MS = 200;
export const MAX_WINDOW_MS = 2000;

export interface RebuildSchedulerOptions {
  rebuild: () => void | Promise<void>;
  onSuccess: () => void;
  onError: (err: unknown) => void;
  quietMs?: number;
  maxWindowMs?: number;
}

/**
 * The first change opens a window; every further change restarts the quiet
 * timer, but the window never stays open longer than `maxWindowMs`. Each
 * window triggers exactly one rebuild. Changes that arrive while a rebuild
 * runs open a new window once it finishes.
 */
export class RebuildScheduler {
  private readonly quietMs: number;
  private readonly maxWindowMs: number;
  private timer: NodeJS.Timeout | undefined;
  private windowStart: number | undefined;
  private running: Promise<void> | undefined;
  private changedWhileRunning = false;
  private closed = false;

  constructor(private readonly options: RebuildSchedulerOptions) {
    this.quietMs = options.quietMs ?? QUIET_PERIOD_MS;
    this.maxWindowMs = options.maxWindowMs ?? MAX_WINDOW_MS;
  }

  notify(): void {
    if (this.closed) return;
    if (this.running) {
      this.changedWhileRunning = true;
      return;
    }

    const now = Date.now();
    if (this.windowStart === undefined) this.windowStart = now;
    const remaining = Math.max(0, this.windowStart + this.maxWindowMs - now);
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => this.flush(), Math.min(this.quietMs, remaining));
  }

  get rebuilding(): boolean {
    return this.running !== undefined;
  }

  /** Resolves once the rebuild in flight (if any) has finished. */
  async idle(): Promise<void> {
    while (this.running) await this.running;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    await this.idle();
  }

  private flush(): void {
    this.timer = undefined;
    this.windowStart = undefined;
    this.running = this.run().finally(() => {
      this.running = undefined;
      if (this.changedWhileRunning) {
        this.changedWhileRunning = false;
        this.notify();
      }
    });
  }

  private async run(): Promise<void> {
    try {
      await this.options.rebuild();
      this.options.onSuccess();
    } catch (err: unknown) {
      this.options.onError(err);
    }
  }
}
