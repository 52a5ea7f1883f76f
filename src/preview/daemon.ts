// src/preview/daemon.ts — Detach the preview server into a background process

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

export const DAEMON_HANDSHAKE_TIMEOUT_MS = 5000;

export interface DaemonHandshake {
  /** `URL=...` line, verbatim. */
  url?: string;
  /** `PID=...` line, verbatim. */
  pid?: string;
}

/** Same arguments with the first `--daemon` swapped for `--daemon-child`; other copies are dropped. */
export function daemonChildArgs(argv: readonly string[]): string[] {
  const args: string[] = [];
  let replaced = false;
  for (const arg of argv) {
    if (arg !== "--daemon") {
      args.push(arg);
    } else if (!replaced) {
      args.push("--daemon-child");
      replaced = true;
    }
  }
  if (!replaced) args.push("--daemon-child");
  return args;
}

/**
 * Read the child's stdout until both handshake lines have arrived, the stream
 * ends, or the timeout elapses. Whatever was seen is returned.
 */
export function awaitDaemonHandshake(
  stream: Readable,
  timeoutMs: number = DAEMON_HANDSHAKE_TIMEOUT_MS,
): Promise<DaemonHandshake> {
  return new Promise((resolve) => {
    const handshake: DaemonHandshake = {};
    const lines = createInterface({ input: stream });
    let settled = false;

    const finish = () => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      lines.close();
      resolve(handshake);
    };
    const timer = setTimeout(finish, timeoutMs);

    lines.on("line", (line) => {
      if (line.startsWith("URL=")) handshake.url = line;
      else if (line.startsWith("PID=")) handshake.pid = line;
      if (handshake.url !== undefined && handshake.pid !== undefined) finish();
    });
    lines.on("close", finish);
  });
}

/**
 * Re-run the current entry point as a detached daemon child and relay its
 * handshake. The child outlives this process.
 */
export async function spawnPreviewDaemon(
  argv: readonly string[] = process.argv.slice(2),
  entry: string = process.argv[1] ?? "",
): Promise<DaemonHandshake> {
  const child = spawn(process.execPath, [...process.execArgv, entry, ...daemonChildArgs(argv)], {
    detached: true,
    stdio: ["ignore", "pipe", "inherit"],
  });
  const spawned = new Promise<void>((resolve, reject) => {
    child.once("spawn", resolve);
    child.once("error", (err) => reject(new Error(`Failed to spawn preview daemon: ${err.message}`)));
  });
  await spawned;

  const handshake = await awaitDaemonHandshake(child.stdout);
  child.stdout.destroy();
  child.unref();
  return handshake;
}
