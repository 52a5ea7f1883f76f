// src/csv-preview.ts — CSV files rendered as sortable HTML tables

import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { inlineScript } from "./assets.js";
import { escapeHtml } from "./markdown.js";
import { BuildError } from "./types.js";

const DELIMITER_CANDIDATES = [",", ";", "\t", "|"] as const;

/**
 * Score a delimiter by how consistently it splits lines: a high mean count
 * per line, penalized by spread and by lines where it never appears.
 */
export function delimiterScore(sample: string, delimiter: string): number {
  const counts: number[] = [];
  let current = 0;
  let inQuotes = false;
  for (let i = 0; i < sample.length; i++) {
    const ch = sample[i];
    if (ch === '"') {
      if (inQuotes && sample[i + 1] === '"') {
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (!inQuotes && ch === delimiter) {
      current++;
    } else if (ch === "\n") {
      counts.push(current);
      current = 0;
    }
  }
  if (sample.length > 0 && !sample.endsWith("\n")) counts.push(current);
  if (counts.length === 0 || counts.every((c) => c === 0)) return 0;

  const mean = counts.reduce((a, b) => a + b, 0) / counts.length;
  const spread = Math.max(...counts) - Math.min(...counts);
  const zeroLines = counts.filter((c) => c === 0).length;
  return Math.trunc(mean * 100) - spread * 10 - zeroLines * 25;
}

export function detectDelimiter(sample: string): string {
  let best: string = ",";
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const candidate of DELIMITER_CANDIDATES) {
    const score = delimiterScore(sample, candidate);
    if (score > bestScore) {
      bestScore = score;
      best = candidate;
    }
  }
  return best;
}

function isNumeric(value: string): boolean {
  const trimmed = value.trim();
  return trimmed !== "" && Number.isFinite(Number(trimmed));
}

/** Guess whether the first row labels the columns of the second. */
export function isHeaderRow(first: string[], second: string[]): boolean {
  if (first.length === 0 || second.length === 0) return false;
  const cols = Math.max(first.length, second.length);
  const firstNumeric = first.filter(isNumeric).length;
  const secondNumeric = second.filter(isNumeric).length;
  const firstText = first.filter((c) => c.trim() !== "" && !isNumeric(c)).length;
  const secondText = second.filter((c) => c.trim() !== "" && !isNumeric(c)).length;

  const strongHeader = firstText >= Math.ceil(cols / 2) && firstNumeric < secondNumeric;
  const textHeavier = firstText > secondText && firstNumeric <= secondNumeric;
  return strongHeader || textHeavier;
}

function toRows(records: unknown): string[][] {
  if (!Array.isArray(records)) return [];
  return records.map((row: unknown) => (Array.isArray(row) ? row.map((cell: unknown) => String(cell)) : []));
}

/**
 * Render CSV text as an HTML table. `maxRows` caps the data rows shown
 * (header excluded); `undefined` shows all of them.
 */
export function renderCsv(contents: string, maxRows?: number): string {
  // Header plus one row past the cap
  const rows = toRows(
    parse(contents, {
      delimiter: detectDelimiter(contents),
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      ...(maxRows === undefined ? {} : { to: maxRows + 2 }),
    }),
  );

  if (rows.length === 0) {
    return '<div class="csv-preview"><div class="csv-empty">Empty CSV.</div></div>';
  }

  const header = rows.length >= 2 && isHeaderRow(rows[0], rows[1]) ? rows[0] : undefined;
  let dataRows = header ? rows.slice(1) : rows;
  let truncated = false;
  if (maxRows !== undefined && dataRows.length > maxRows) {
    dataRows = dataRows.slice(0, maxRows);
    truncated = true;
  }

  const maxCols = Math.max(header?.length ?? 0, ...dataRows.map((r) => r.length), 1);
  const labels = header ?? Array.from({ length: maxCols }, (_, i) => `Column ${i + 1}`);

  let html = '<div class="csv-preview">';
  if (truncated) {
    html += `<div class="csv-notice">Showing first ${dataRows.length} rows.</div>`;
  }
  html += '<div class="csv-table-wrap"><table class="csv-table"><thead><tr>';
  for (let i = 0; i < maxCols; i++) {
    html += `<th scope="col">${escapeHtml(labels[i] ?? "")}</th>`;
  }
  html += "</tr></thead><tbody>";
  for (const row of dataRows) {
    html += "<tr>";
    for (let i = 0; i < maxCols; i++) {
      html += `<td>${escapeHtml(row[i] ?? "")}</td>`;
    }
    html += "</tr>";
  }
  html += "</tbody></table></div></div>";
  return html + inlineScript("csv-sort.js");
}

export function renderCsvFile(path: string, maxRows?: number): string {
  let contents: string;
  try {
    contents = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to read CSV file ${path}: ${msg}`, path, err);
  }
  try {
    return renderCsv(contents, maxRows);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to parse CSV file ${path}: ${msg}`, path, err);
  }
}
