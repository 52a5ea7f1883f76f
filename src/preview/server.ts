// src/preview/server.ts — Static file server with version and heartbeat endpoints

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import sirv from "sirv";
import { HEARTBEAT_ENDPOINT, VERSION_ENDPOINT } from "../types.js";
import type { ActivityClock, VersionCounter } from "./state.js";

export interface PreviewServerOptions {
  /** Directory holding the rendered site. */
  root: string;
  version: VersionCounter;
  /** Present only when auto-exit is enabled. */
  activity?: ActivityClock;
}

export type RequestListener = (req: IncomingMessage, res: ServerResponse) => void;

function pathnameOf(req: IncomingMessage): string {
  try {
    return new URL(req.url ?? "/", "http://127.0.0.1").pathname;
  } catch {
    return "/";
  }
}

function notFound(res: ServerResponse): void {
  res.writeHead(404, { "Content-Type": "text/plain; charset=utf-8" });
  res.end("Not Found");
}

function methodNotAllowed(res: ServerResponse, allow: string): void {
  res.writeHead(405, { Allow: allow, "Content-Type": "text/plain; charset=utf-8" });
  res.end("Method Not Allowed");
}

export function createPreviewHandler(options: PreviewServerOptions): RequestListener {
  // dev mode: every request hits the disk, so rebuilt files are served at once
  const serveStatic = sirv(options.root, { dev: true, dotfiles: true });

  return (req, res) => {
    const pathname = pathnameOf(req);

    if (pathname === VERSION_ENDPOINT) {
      if (req.method !== "GET" && req.method !== "HEAD") return methodNotAllowed(res, "GET, HEAD");
      res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8", "Cache-Control": "no-store" });
      res.end(String(options.version.current()));
      return;
    }

    if (pathname === HEARTBEAT_ENDPOINT) {
      if (req.method !== "GET" && req.method !== "POST") return methodNotAllowed(res, "GET, POST");
      options.activity?.touch();
      res.writeHead(204);
      res.end();
      return;
    }

    serveStatic(req, res, () => notFound(res));
  };
}

export function createPreviewServer(options: PreviewServerOptions): Server {
  return createServer(createPreviewHandler(options));
}

/** Stop accepting connections, let in-flight requests finish, drop idle keep-alive sockets. */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}
