// src/bin/preview.ts — `rendar preview`

import {
  loadConfig,
  normalizeCsvMaxRows,
  resolveExcludes,
  resolvePreviewOpen,
  resolvePreviewPort,
  resolveTemplatePath,
  type ParsedArgs,
} from "../config.js";
import { errorMessage, formatWarning, reportWarnings, stderr } from "../log.js";
import { spawnPreviewDaemon } from "../preview/daemon.js";
import { openBrowser } from "../preview/open-browser.js";
import { isExcludedPath, resolvePreviewPaths } from "../preview/paths.js";
import { PreviewSession } from "../preview/session.js";
import { loadTemplate } from "../template.js";
import { UsageError, type Warning } from "../types.js";

/** Resolves once the preview server has shut down. */
export async function runPreview(args: ParsedArgs): Promise<void> {
  if (args.daemon && args.daemonChild) {
    throw new UsageError("Cannot use --daemon and --daemon-child together");
  }
  if (args.daemon) {
    const handshake = await spawnPreviewDaemon();
    if (handshake.url !== undefined) process.stdout.write(handshake.url + "\n");
    if (handshake.pid !== undefined) process.stdout.write(handshake.pid + "\n");
    return;
  }

  const config = loadConfig(args.config);
  const { inputRoot, startPage } = resolvePreviewPaths(
    process.cwd(),
    args.input ?? config?.input,
    args.startOn,
  );
  const template = loadTemplate(resolveTemplatePath(args.template, config));
  const warnings: Warning[] = [];
  template.validate(warnings);
  reportWarnings(warnings, args.quiet);

  const exclude = resolveExcludes(args.exclude, config);
  if (startPage !== undefined && isExcludedPath(startPage, inputRoot, exclude)) {
    throw new UsageError(`Start page ${startPage} is excluded by pattern`);
  }

  const session = await PreviewSession.start({
    inputRoot,
    template,
    exclude,
    csvMaxRows: normalizeCsvMaxRows(args.csvMaxRows),
    port: resolvePreviewPort(args.port, config),
    autoExitSeconds: args.autoExit,
    startPage,
    quiet: args.quiet,
    verbose: args.verbose,
  });

  if (args.daemonChild) {
    process.stdout.write(`URL=${session.url}\nPID=${process.pid}\n`);
  } else {
    process.stdout.write(`Preview server running at ${session.url}\n`);
  }
  if (resolvePreviewOpen(args.open, args.daemonChild, config)) openBrowser(session.url);

  const shutdown = () => {
    session.close().catch((err: unknown) => {
      stderr(formatWarning({ level: "error", module: "preview", message: errorMessage(err) }));
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  await session.stopped;
}
