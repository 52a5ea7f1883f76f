// src/log.ts — stderr diagnostics
// stdout carries results only (build summary, preview URL, daemon handshake).

import type { Warning } from "./types.js";

export function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

/** Verbose logger: writes to stderr only when verbose is enabled. */
export function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export function formatWarning(w: Warning): string {
  return `[${w.level}] ${w.module}: ${w.message}`;
}

export function reportWarnings(warnings: readonly Warning[], quiet = false): void {
  if (quiet) return;
  for (const w of warnings) stderr(formatWarning(w));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
