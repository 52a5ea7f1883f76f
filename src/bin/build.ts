// src/bin/build.ts — `rendar build`

import {
  loadConfig,
  normalizeCsvMaxRows,
  resolveExcludes,
  resolveInput,
  resolveTemplatePath,
  type ParsedArgs,
} from "../config.js";
import { reportWarnings } from "../log.js";
import { buildSite } from "../pipeline.js";
import { loadTemplate } from "../template.js";
import { UsageError, type Warning } from "../types.js";

export function runBuild(args: ParsedArgs): void {
  if (args.out === undefined) throw new UsageError("Missing required option --out <dir>");

  const config = loadConfig(args.config);
  const input = resolveInput(args.input, config);
  const template = loadTemplate(resolveTemplatePath(args.template, config));
  const warnings: Warning[] = [];
  template.validate(warnings);

  const result = buildSite(input, args.out, {
    template,
    exclude: resolveExcludes(args.exclude, config),
    csvMaxRows: normalizeCsvMaxRows(args.csvMaxRows),
    verbose: args.verbose,
  });
  reportWarnings([...warnings, ...result.warnings], args.quiet);
  process.stdout.write(`Rendered site to ${args.out}\n`);
}
