// src/preview/open-browser.ts — Hand the preview URL to the platform's opener

import { spawn } from "node:child_process";
import { formatWarning, stderr } from "../log.js";

export function openerCommand(platform: NodeJS.Platform = process.platform): { command: string; args: string[] } {
  if (platform === "darwin") return { command: "open", args: [] };
  if (platform === "win32") return { command: "cmd", args: ["/c", "start", '""'] };
  return { command: "xdg-open", args: [] };
}

/** Best effort: a missing opener is reported, never fatal. */
export function openBrowser(url: string): void {
  const { command, args } = openerCommand();
  const child = spawn(command, [...args, url], { detached: true, stdio: "ignore" });
  child.on("error", (err) => {
    stderr(formatWarning({ level: "warn", module: "preview", message: `Failed to open browser: ${err.message}` }));
  });
  child.unref();
}
