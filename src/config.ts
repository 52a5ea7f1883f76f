// src/config.ts — Config Resolver
// Precedence: CLI args ← rendar.toml ← defaults.

import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import { ConfigError, UsageError } from "./types.js";
import type { FileConfig, PreviewFileConfig } from "./types.js";

export const CONFIG_FILENAME = "rendar.toml";
export const DEFAULT_PORT = 3000;
export const DEFAULT_CSV_MAX_ROWS = 1000;
export const DEFAULT_AUTO_EXIT_SECONDS = 30;

export interface ParsedArgs {
  command?: string;
  out?: string;
  input?: string;
  config?: string;
  template?: string;
  exclude: string[];
  /** `0` means unlimited. */
  csvMaxRows: number;
  startOn?: string;
  /** `true` for --open, `false` for --no-open, unset otherwise. */
  open?: boolean;
  daemon: boolean;
  daemonChild: boolean;
  /** Idle timeout in seconds; unset when auto-exit is off. */
  autoExit?: number;
  port?: number;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown): string[] {
  if (value === undefined || value === false || value === true) return [];
  if (Array.isArray(value)) return value.map((v: unknown) => String(v));
  return [String(value)];
}

function toOptionalString(value: unknown): string | undefined {
  if (value === undefined || value === "" || typeof value === "boolean") return undefined;
  return String(value);
}

function parseInteger(flag: string, value: unknown): number {
  const n = typeof value === "number" ? value : Number.parseInt(String(value), 10);
  if (!Number.isInteger(n) || n < 0) {
    throw new UsageError(`Invalid value for --${flag}: ${String(value)}`);
  }
  return n;
}

function parsePort(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const port = parseInteger("port", value);
  if (port > 65535) throw new UsageError(`Invalid value for --port: ${String(value)}`);
  return port;
}

function parseAutoExit(value: unknown): number | undefined {
  if (value === undefined || value === false) return undefined;
  if (value === true || value === "") return DEFAULT_AUTO_EXIT_SECONDS;
  return parseInteger("auto-exit", value);
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { o: "out", i: "input", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["open", "daemon", "daemon-child", "quiet", "verbose", "help", "version"],
    string: ["out", "input", "config", "template", "exclude", "start-on", "port", "csv-max-rows"],
  });

  if (argv.includes("--open") && argv.includes("--no-open")) {
    throw new UsageError("Cannot use --open and --no-open together");
  }

  const csvMaxRows = args["csv-max-rows"];
  return {
    command: args._[0],
    out: toOptionalString(args.out),
    input: toOptionalString(args.input),
    config: toOptionalString(args.config),
    template: toOptionalString(args.template),
    exclude: toStringList(args.exclude),
    csvMaxRows:
      csvMaxRows === undefined ? DEFAULT_CSV_MAX_ROWS : parseInteger("csv-max-rows", csvMaxRows),
    startOn: toOptionalString(args["start-on"]),
    open: typeof args.open === "boolean" ? args.open : undefined,
    daemon: args.daemon ?? false,
    daemonChild: args["daemon-child"] ?? false,
    autoExit: parseAutoExit(args["auto-exit"]),
    port: parsePort(args.port),
    quiet: args.quiet ?? false,
    verbose: args.verbose ?? false,
    help: args.help ?? false,
    version: args.version ?? false,
  };
}

// ─── rendar.toml ─────────────────────────────────────────────────────────────

function resolveFrom(base: string, path: string): string {
  return isAbsolute(path) ? path : join(base, path);
}

function readString(table: Record<string, unknown>, key: string, configPath: string): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`"${key}" must be a string in ${configPath}`, configPath);
  }
  return value;
}

function validatePreview(value: unknown, configPath: string): PreviewFileConfig | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`[preview] must be a table in ${configPath}`, configPath);
  }
  const preview: PreviewFileConfig = {};
  if (value.port !== undefined) {
    if (typeof value.port !== "number" || !Number.isInteger(value.port) || value.port < 0 || value.port > 65535) {
      throw new ConfigError(`preview.port must be a port number in ${configPath}`, configPath);
    }
    preview.port = value.port;
  }
  if (value.open !== undefined) {
    if (typeof value.open !== "boolean") {
      throw new ConfigError(`preview.open must be a boolean in ${configPath}`, configPath);
    }
    preview.open = value.open;
  }
  return preview;
}

/**
 * Parse `rendar.toml` contents. Relative `input` and `template` paths are
 * resolved against `baseDir` (the config file's directory).
 */
export function parseConfig(raw: string, baseDir: string, configPath = CONFIG_FILENAME): FileConfig {
  let table: unknown;
  try {
    table = parseToml(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${configPath}: ${msg}`, configPath);
  }
  if (!isRecord(table)) throw new ConfigError(`Failed to parse ${configPath}`, configPath);

  const config: FileConfig = {};
  const input = readString(table, "input", configPath);
  if (input !== undefined) config.input = resolveFrom(baseDir, input);
  const template = readString(table, "template", configPath);
  if (template !== undefined) config.template = resolveFrom(baseDir, template);

  if (table.exclude !== undefined) {
    const exclude = table.exclude;
    if (!Array.isArray(exclude) || !exclude.every((p: unknown) => typeof p === "string")) {
      throw new ConfigError(`"exclude" must be an array of strings in ${configPath}`, configPath);
    }
    config.exclude = exclude.map((p: unknown) => String(p));
  }

  const preview = validatePreview(table.preview, configPath);
  if (preview) config.preview = preview;
  return config;
}

/**
 * Load the config named by --config, else `./rendar.toml` when it exists.
 * Returns undefined when there is none; an unreadable or invalid file is fatal.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): FileConfig | undefined {
  let path: string;
  if (configPath) {
    path = resolve(cwd, configPath);
  } else {
    path = join(cwd, CONFIG_FILENAME);
    if (!existsSync(path)) return undefined;
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config ${path}: ${msg}`, path);
  }
  return parseConfig(raw, dirname(path), path);
}

// ─── Resolution ──────────────────────────────────────────────────────────────

export function resolveInput(input: string | undefined, config?: FileConfig): string {
  return resolve(input ?? config?.input ?? ".");
}

export function resolveTemplatePath(template: string | undefined, config?: FileConfig): string | undefined {
  const path = template ?? config?.template;
  return path === undefined ? undefined : resolve(path);
}

export function resolveExcludes(cli: string[], config?: FileConfig): string[] {
  return cli.length > 0 ? cli : config?.exclude ?? [];
}

export function resolvePreviewPort(port: number | undefined, config?: FileConfig): number {
  return port ?? config?.preview?.port ?? DEFAULT_PORT;
}

/** --no-open wins; --open and daemon children open; then the config; default closed. */
export function resolvePreviewOpen(
  open: boolean | undefined,
  daemonChild: boolean,
  config?: FileConfig,
): boolean {
  if (open === false) return false;
  if (open === true || daemonChild) return true;
  return config?.preview?.open ?? false;
}

/** `0` means unlimited. */
export function normalizeCsvMaxRows(value: number): number | undefined {
  return value === 0 ? undefined : value;
}
