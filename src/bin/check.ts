// src/bin/check.ts — `rendar check`
// Renders every page in memory and fails when any link target is missing.

import { loadConfig, resolveExcludes, resolveInput, type ParsedArgs } from "../config.js";
import { reportWarnings, stderr } from "../log.js";
import { checkSite } from "../pipeline.js";

/**
 * Returns true when the check failed (for the exit code).
 */
export function runCheck(args: ParsedArgs): boolean {
  const config = loadConfig(args.config);
  const input = resolveInput(args.input, config);
  const result = checkSite(input, { exclude: resolveExcludes(args.exclude, config) });

  reportWarnings(result.warnings, args.quiet);
  if (result.linkWarnings > 0 && !args.quiet) {
    stderr(`${result.linkWarnings} broken link${result.linkWarnings === 1 ? "" : "s"} found`);
  }
  return result.linkWarnings > 0;
}
