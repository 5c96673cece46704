#!/usr/bin/env node
/**
 * Split a Markdown file holding a `Name | date | …` table into one file per
 * year of the date column. Frontmatter is copied to every output file and the
 * source file is left untouched.
 *
 * Usage: tsx scripts/md-split-by-year.ts <file.md>
 *
 * Writes <stem>_<year>.md beside the input, plus <stem>_unknown_dates.md for
 * rows whose date could not be parsed.
 */
import * as path from "path";
import { formatList, isMainModule, report, runCli } from "./cli-output.js";
import { malformedArgument, missingHeader } from "./md-errors.js";
import { readText, requireFile, writeText } from "./md-files.js";
import { extractFrontmatter, splitLines } from "./md-frontmatter.js";

export const UNKNOWN_BUCKET = "unknown";

export type YearKey = number | typeof UNKNOWN_BUCKET;

export interface YearBucket {
  key: YearKey;
  rows: string[];
}

export interface YearSplit {
  frontmatter: string[];
  header: string;
  separator: string | undefined;
  /** Years ascending, then the unknown bucket when present. */
  buckets: YearBucket[];
}

export interface SplitFile {
  key: YearKey;
  path: string;
  rows: number;
}

export interface SplitResult {
  files: SplitFile[];
  years: number;
  unknownRows: number;
}

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const MONTH_DAY_YEAR_RE = /^([A-Za-z]+)\s+(\d{1,2}),\s+(\d{4})$/;
const RANGE_SEPARATOR = "→";

function daysInMonth(year: number, monthIndex: number): number {
  // setUTCFullYear does not map years 0-99 onto 1900-1999 the way Date.UTC does.
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex + 1, 0);
  return date.getUTCDate();
}

/**
 * Year of a "Month D, YYYY" date, or of the first date of a "A → B" range.
 * Returns undefined for anything that does not parse strictly.
 */
export function parseYear(value: string): number | undefined {
  let text = value.trim();
  if (text === "") {
    return undefined;
  }
  if (text.includes(RANGE_SEPARATOR)) {
    text = text.split(RANGE_SEPARATOR)[0].trim();
  }

  const match = text.match(MONTH_DAY_YEAR_RE);
  if (!match) {
    return undefined;
  }
  const monthIndex = MONTHS.indexOf(match[1].toLowerCase());
  const day = Number.parseInt(match[2], 10);
  const year = Number.parseInt(match[3], 10);
  if (monthIndex === -1 || year < 1 || day < 1 || day > daysInMonth(year, monthIndex)) {
    return undefined;
  }
  return year;
}

function isHeaderLine(line: string): boolean {
  return line.includes("|") && line.includes("Name") && line.includes("date");
}

function isDataLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== "" && trimmed.startsWith("|");
}

/** Group the rows of the first `Name`/`date` table by year. */
export function splitByYear(text: string): YearSplit {
  const { frontmatter, body } = extractFrontmatter(splitLines(text));

  const headerIndex = body.findIndex(isHeaderLine);
  if (headerIndex === -1) {
    throw missingHeader(
      "Could not find table header with 'Name' and 'date' columns."
    );
  }

  const rowsByYear = new Map<YearKey, string[]>();
  for (const line of body.slice(headerIndex + 2)) {
    if (!isDataLine(line)) {
      continue;
    }
    const columns = line.split("|").map((column) => column.trim());
    if (columns.length < 3) {
      continue;
    }
    const key: YearKey = parseYear(columns[2]) ?? UNKNOWN_BUCKET;
    const rows = rowsByYear.get(key) ?? [];
    rows.push(line);
    rowsByYear.set(key, rows);
  }

  const years = [...rowsByYear.keys()]
    .filter((key): key is number => key !== UNKNOWN_BUCKET)
    .sort((a, b) => a - b);
  const keys: YearKey[] = rowsByYear.has(UNKNOWN_BUCKET)
    ? [...years, UNKNOWN_BUCKET]
    : years;

  return {
    frontmatter,
    header: body[headerIndex],
    separator: body[headerIndex + 1],
    buckets: keys.map((key) => ({ key, rows: rowsByYear.get(key) ?? [] })),
  };
}

export function renderBucket(split: YearSplit, bucket: YearBucket): string {
  const lines: string[] = [];
  if (split.frontmatter.length > 0) {
    lines.push(...split.frontmatter, "");
  }
  lines.push(split.header);
  if (split.separator !== undefined) {
    lines.push(split.separator);
  }
  lines.push(...bucket.rows);
  return lines.map((line) => `${line}\n`).join("");
}

export function bucketFileName(stem: string, key: YearKey): string {
  return key === UNKNOWN_BUCKET ? `${stem}_unknown_dates.md` : `${stem}_${key}.md`;
}

/**
 * Write one file per bucket. A write failure stops the run; files already
 * written stay on disk.
 */
export function runSplitByYear(file: string): SplitResult {
  const inputPath = requireFile(file);
  const split = splitByYear(readText(inputPath));

  const outputDir = path.dirname(inputPath);
  const stem = path.basename(inputPath, path.extname(inputPath));
  const files: SplitFile[] = [];

  for (const bucket of split.buckets) {
    const outputPath = path.join(outputDir, bucketFileName(stem, bucket.key));
    writeText(outputPath, renderBucket(split, bucket));
    files.push({ key: bucket.key, path: outputPath, rows: bucket.rows.length });
  }

  const unknown = split.buckets.find((bucket) => bucket.key === UNKNOWN_BUCKET);
  return {
    files,
    years: files.filter((entry) => entry.key !== UNKNOWN_BUCKET).length,
    unknownRows: unknown ? unknown.rows.length : 0,
  };
}

export function describeSplit(result: SplitResult): string[] {
  const lines = [
    formatList(result.files.map((entry) => `Created: ${entry.path} (${entry.rows} rows)`)),
    "",
    `Total years: ${result.years}`,
  ];
  if (result.unknownRows > 0) {
    lines.push(`Rows with unknown dates: ${result.unknownRows}`);
  }
  return lines;
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log("Usage: md-split-by-year <file.md>");
      return;
    }
    if (args.length !== 1) {
      throw malformedArgument("Usage: md-split-by-year <file.md>");
    }
    report(describeSplit(runSplitByYear(args[0])));
  });
}
