// src/preview/watcher.ts — Recursive change feed for the input tree

import { watch, type FSWatcher } from "chokidar";
import { formatWarning, stderr } from "../log.js";

export interface SourceWatcher {
  close(): Promise<void>;
}

/**
 * Report every add, change or unlink under `root` to `onChange`. Resolves
 * once the initial scan is done and later edits are sure to be seen.
 * Watch errors are logged and watching continues.
 */
export function watchSourceTree(root: string, onChange: (path: string) => void): Promise<SourceWatcher> {
  const watcher: FSWatcher = watch(root, { ignoreInitial: true, persistent: true });
  watcher.on("all", (_event, path) => onChange(path));
  watcher.on("error", (err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    stderr(formatWarning({ level: "error", module: "preview", message: `Preview watcher error: ${msg}` }));
  });
  return new Promise((resolve) => {
    watcher.once("ready", () => resolve({ close: () => watcher.close() }));
  });
}
