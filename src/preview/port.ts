// src/preview/port.ts — Bind the preview server on loopback

import type { Server } from "node:http";
import { DEFAULT_PORT } from "../config.js";
import { stderr } from "../log.js";

export const PREVIEW_HOST = "127.0.0.1";

function listenOnce(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      const address = server.address();
      if (address !== null && typeof address === "object") resolve(address.port);
      else reject(new Error(`Preview server is not bound to a TCP port: ${String(address)}`));
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

/**
 * Listen on `preferredPort`. Only the default port falls back to a random
 * free one when busy; any other port failing to bind is fatal.
 * Returns the bound port.
 */
export async function listenPreview(
  server: Server,
  preferredPort: number,
  host: string = PREVIEW_HOST,
  log: (msg: string) => void = stderr,
): Promise<number> {
  try {
    return await listenOnce(server, preferredPort, host);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    if (preferredPort !== DEFAULT_PORT) {
      throw new Error(`Failed to bind preview server on ${preferredPort}: ${msg}`);
    }
    try {
      const port = await listenOnce(server, 0, host);
      log(`Port ${preferredPort} is in use, picked a random available port.`);
      return port;
    } catch (fallbackErr: unknown) {
      const fallbackMsg = fallbackErr instanceof Error ? fallbackErr.message : String(fallbackErr);
      throw new Error(
        `Failed to bind preview server on ${preferredPort} and auto-select fallback port: ${fallbackMsg}`,
      );
    }
  }
}
