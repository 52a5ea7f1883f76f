// src/template.ts — HTML template with `{{placeholder}}` substitution

import { readFileSync } from "node:fs";
import { readThemeAsset } from "./assets.js";
import { BuildError } from "./types.js";
import type { Warning } from "./types.js";

/** Placeholders a custom template must carry for pages and live reload to work. */
export const REQUIRED_PLACEHOLDERS = ["{{title}}", "{{content}}", "{{extra_body}}"] as const;

export interface TemplateSlots {
  title: string;
  content: string;
  nav: string;
  breadcrumbs: string;
  extraHead?: string;
  extraBody?: string;
}

const PLACEHOLDER = /\{\{(title|content|nav|breadcrumbs|style|extra_head|extra_body)\}\}/g;

export class Template {
  private constructor(
    private readonly raw: string,
    private readonly style: string,
    public readonly source: string,
  ) {}

  static builtIn(): Template {
    return new Template(readThemeAsset("template.html"), readThemeAsset("style.css"), "built-in");
  }

  static fromString(raw: string, source = "inline"): Template {
    return new Template(raw, "", source);
  }

  static fromPath(path: string): Template {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new BuildError(`Failed to read template ${path}: ${msg}`, path, err);
    }
    return new Template(raw, "", path);
  }

  missingPlaceholders(): string[] {
    return REQUIRED_PLACEHOLDERS.filter((p) => !this.raw.includes(p));
  }

  /** Non-fatal diagnostics for a template lacking required placeholders. */
  validate(warnings: Warning[]): void {
    const missing = this.missingPlaceholders();
    if (missing.length === 0) return;
    warnings.push({
      level: "warn",
      module: "template",
      message: `Template ${this.source} is missing placeholders: ${missing.join(", ")}`,
      file: this.source,
    });
  }

  /** Single pass: placeholders inside substituted values are not expanded. */
  render(slots: TemplateSlots): string {
    const values: Record<string, string> = {
      title: slots.title,
      content: slots.content,
      nav: slots.nav,
      breadcrumbs: slots.breadcrumbs,
      style: this.style,
      extra_head: slots.extraHead ?? "",
      extra_body: slots.extraBody ?? "",
    };
    return this.raw.replace(PLACEHOLDER, (match, key: string) => values[key] ?? match);
  }
}

/** Load the template at `path`, or the built-in theme when none is given. */
export function loadTemplate(path?: string): Template {
  return path ? Template.fromPath(path) : Template.builtIn();
}
