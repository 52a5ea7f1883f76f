#!/usr/bin/env node
// CLI entry point for rendar

import { parseCliArgs } from "../config.js";
import { errorMessage } from "../log.js";
import { ENGINE_VERSION } from "../types.js";

const HELP_TEXT = `
rendar v${ENGINE_VERSION}

Render a Markdown tree into a static HTML site.

Usage:
  rendar build --out <dir>              Render the input tree into <dir>
  rendar check                          Report broken links without writing output (for CI)
  rendar preview                        Serve a live-reloading preview on 127.0.0.1

Options:
  --input, -i <dir>    Input directory (default: current directory)
  --out, -o <dir>      Output directory (build only, required)
  --config, -c <file>  Config file (default: ./rendar.toml when present)
  --template <file>    HTML template with {{title}}, {{content}}, {{extra_body}} placeholders
  --exclude <glob>     Skip matching paths, relative to the input (repeatable)
  --csv-max-rows <n>   Maximum CSV rows per table, 0 for unlimited (default: 1000)
  --quiet, -q          Suppress warnings
  --verbose, -v        Print build details
  --help, -h           Show this help text
  --version            Print the version

Preview options:
  --start-on <path>    Page or directory to open first
  --open, --no-open    Open the browser after starting (default: from config, else no)
  --port <n>           Port to listen on (default: 3000, random when 3000 is busy)
  --auto-exit [secs]   Exit once no preview page has been open for secs (default: 30)
  --daemon             Run in the background and print URL= and PID= lines

Examples:
  rendar build --input docs --out site
  rendar check --exclude "drafts/**"
  rendar preview --start-on docs/guide --open
  rendar preview --daemon --auto-exit
`.trim();

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.version) {
    process.stdout.write(ENGINE_VERSION + "\n");
    process.exit(0);
  }

  if (args.help || args.command === undefined) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(args.help ? 0 : 1);
  }

  switch (args.command) {
    case "build": {
      const { runBuild } = await import("./build.js");
      runBuild(args);
      process.exit(0);
    }
    case "check": {
      const { runCheck } = await import("./check.js");
      const failed = runCheck(args);
      process.exit(failed ? 1 : 0);
    }
    case "preview": {
      const { runPreview } = await import("./preview.js");
      await runPreview(args);
      process.exit(0);
    }
    default:
      process.stderr.write(`[error] Unknown command: ${args.command}\n\n${HELP_TEXT}\n`);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`[error] ${errorMessage(err)}\n`);
  process.exit(1);
});
