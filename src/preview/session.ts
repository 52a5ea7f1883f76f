// src/preview/session.ts — Preview orchestrator
// Initial build → watch + rebuild → serve → (optional) auto-exit → cleanup.

import { mkdtempSync, rmSync } from "node:fs";
import type { Server } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { errorMessage, formatWarning, reportWarnings, stderr, vlog } from "../log.js";
import { buildSite } from "../pipeline.js";
import { outputRelPath } from "../site-map.js";
import type { Template } from "../template.js";
import type { RenderOptions } from "../types.js";
import { startIdleMonitor, type IdleMonitor } from "./idle-monitor.js";
import { listenPreview, PREVIEW_HOST } from "./port.js";
import { RebuildScheduler } from "./rebuild-scheduler.js";
import { closeServer, createPreviewServer } from "./server.js";
import { ActivityClock, VersionCounter } from "./state.js";
import { watchSourceTree, type SourceWatcher } from "./watcher.js";

export interface PreviewSessionOptions {
  inputRoot: string;
  template: Template;
  exclude: string[];
  /** `undefined` renders every CSV row. */
  csvMaxRows?: number;
  port: number;
  /** Idle timeout in seconds; auto-exit is off when unset. */
  autoExitSeconds?: number;
  /** Absolute path of the page the start URL points at. */
  startPage?: string;
  quiet?: boolean;
  verbose?: boolean;
  /** Called on every state transition, starting with `building`. */
  onStateChange?: (state: PreviewState) => void;
}

export type PreviewState = "building" | "serving" | "rebuilding" | "stopped";

function encodeUrlPath(rel: string): string {
  return rel.split("/").map(encodeURIComponent).join("/");
}

export class PreviewSession {
  private monitor: IdleMonitor | undefined;
  private closing: Promise<void> | undefined;
  private resolveStopped: () => void = () => {};
  private isStopped = false;
  /** Settles once the session has shut down, by auto-exit or `close()`. */
  readonly stopped: Promise<void>;

  private constructor(
    readonly outputDir: string,
    readonly url: string,
    readonly port: number,
    readonly version: VersionCounter,
    private readonly server: Server,
    private readonly watcher: SourceWatcher,
    private readonly scheduler: RebuildScheduler,
    private readonly emitState: (state: PreviewState) => void,
  ) {
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  static async start(options: PreviewSessionOptions): Promise<PreviewSession> {
    const verbose = options.verbose ?? false;
    const emitState = (state: PreviewState) => options.onStateChange?.(state);
    emitState("building");
    const outputDir = mkdtempSync(join(tmpdir(), "rendar-preview-"));
    const autoExit = options.autoExitSeconds !== undefined;
    const renderOptions: RenderOptions = {
      template: options.template,
      liveReload: true,
      heartbeat: autoExit,
      exclude: options.exclude,
      csvMaxRows: options.csvMaxRows,
      verbose,
    };

    const version = new VersionCounter();
    const activity = autoExit ? new ActivityClock() : undefined;
    const server = createPreviewServer({ root: outputDir, version, activity });
    let watcher: SourceWatcher | undefined;
    let scheduler: RebuildScheduler | undefined;

    try {
      vlog(verbose, `Building preview of ${options.inputRoot} into ${outputDir}`);
      const initial = buildSite(options.inputRoot, outputDir, renderOptions);
      reportWarnings(initial.warnings, options.quiet);

      const activeScheduler = new RebuildScheduler({
        rebuild: () => {
          emitState("rebuilding");
          vlog(verbose, "Change detected, rebuilding preview");
          reportWarnings(buildSite(options.inputRoot, outputDir, renderOptions).warnings, options.quiet);
        },
        onSuccess: () => {
          const current = version.bump();
          vlog(verbose, `Preview version ${current}`);
          emitState("serving");
        },
        onError: (err) => {
          stderr(
            formatWarning({
              level: "error",
              module: "preview",
              message: `Failed to rebuild preview: ${errorMessage(err)}`,
            }),
          );
          emitState("serving");
        },
      });
      scheduler = activeScheduler;
      watcher = await watchSourceTree(options.inputRoot, () => activeScheduler.notify());

      const port = await listenPreview(server, options.port);
      const rel =
        options.startPage === undefined
          ? undefined
          : outputRelPath(options.startPage, options.inputRoot, initial.indexDirs);
      const url = `http://${PREVIEW_HOST}:${port}/${rel === undefined ? "" : encodeUrlPath(rel)}`;

      const session = new PreviewSession(
        outputDir,
        url,
        port,
        version,
        server,
        watcher,
        activeScheduler,
        emitState,
      );
      emitState("serving");
      if (activity && options.autoExitSeconds !== undefined) {
        // Idle time counts from the moment pages can be served
        activity.touch();
        session.monitor = startIdleMonitor(activity, options.autoExitSeconds * 1000, () => {
          vlog(verbose, "No active preview pages, shutting down");
          session.close().catch((err: unknown) => {
            stderr(formatWarning({ level: "error", module: "preview", message: errorMessage(err) }));
          });
        });
      }
      return session;
    } catch (err: unknown) {
      await closeServer(server);
      await watcher?.close();
      await scheduler?.close();
      rmSync(outputDir, { recursive: true, force: true });
      throw err;
    }
  }

  get status(): PreviewState {
    if (this.isStopped) return "stopped";
    return this.scheduler.rebuilding ? "rebuilding" : "serving";
  }

  /** Idempotent. Stops the monitor, server and watcher, then removes the output. */
  close(): Promise<void> {
    if (!this.closing) this.closing = this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.monitor?.stop();
    try {
      await closeServer(this.server);
      await this.watcher.close();
      await this.scheduler.close();
    } finally {
      rmSync(this.outputDir, { recursive: true, force: true });
      this.isStopped = true;
      this.emitState("stopped");
      this.resolveStopped();
    }
  }
}
