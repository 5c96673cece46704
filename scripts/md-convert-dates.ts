#!/usr/bin/env node
/**
 * Rewrite dates in a Markdown file into one output format.
 *
 * Recognised input families, applied in this order:
 *   month-day-year  "December 30, 2024"
 *   DD.MM.YYYY      "30.12.2024"
 *   YYYY-MM-DD      "2024-12-30"
 *   MM-DD-YYYY      "12-30-2024"
 *
 * Usage:
 *   tsx scripts/md-convert-dates.ts <file.md> [-o out.md] [-f FORMAT] [-i FAMILY]...
 *
 * FORMAT is one of YYYY-MM-DD, DD.MM.YYYY, DD.MM, MM-DD, YYYY-MM, MM.DD, or a
 * strftime string such as "%d %b %Y". Bare positionals after the file are
 * taken as the output file when they end in .md or contain a path separator,
 * otherwise as the format.
 */
import * as path from "path";
import { isMainModule, report, runCli } from "./cli-output.js";
import { loadConfig } from "./md-config.js";
import { malformedArgument } from "./md-errors.js";
import { readText, requireFile, writeText } from "./md-files.js";

export const FORMAT_SHORTHANDS: Record<string, string> = {
  "YYYY-MM-DD": "%Y-%m-%d",
  "DD.MM.YYYY": "%d.%m.%Y",
  "DD.MM": "%d.%m",
  "MM-DD": "%m-%d",
  "YYYY-MM": "%Y-%m",
  "MM.DD": "%m.%d",
};

export const INPUT_FAMILIES = [
  "month-day-year",
  "DD.MM.YYYY",
  "YYYY-MM-DD",
  "MM-DD-YYYY",
] as const;

export type InputFamily = (typeof INPUT_FAMILIES)[number];

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const WEEKDAY_NAMES = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

const MONTH_DAY_YEAR_RE = new RegExp(
  `\\b(${MONTH_NAMES.join("|")})\\s+(\\d{1,2}),\\s+(\\d{4})\\b`,
  "g"
);
const DOTTED_RE = /\b(\d{1,2})\.(\d{1,2})\.(\d{4})\b/g;
const ISO_RE = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/g;
const US_RE = /\b(\d{1,2})-(\d{1,2})-(\d{4})\b/g;

/** A calendar date; month is 1-based. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/** Midnight UTC on the given day; years 0-99 are taken literally. */
function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

export function makeDate(
  year: number,
  month: number,
  day: number
): CalendarDate | undefined {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return undefined;
  }
  const lastDay = utcDate(year, month, 0).getUTCDate();
  if (day > lastDay) {
    return undefined;
  }
  return { year, month, day };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function dayOfYear(date: CalendarDate): number {
  const start = utcDate(date.year, 0, 1).getTime();
  const current = utcDate(date.year, date.month - 1, date.day).getTime();
  return Math.round((current - start) / 86_400_000) + 1;
}

/**
 * Format with a strftime subset: %Y %y %m %d %e %B %b %A %a %j %%.
 * Unknown directives are copied through unchanged.
 */
export function strftime(date: CalendarDate, format: string): string {
  const weekday = utcDate(date.year, date.month - 1, date.day).getUTCDay();

  return format.replace(/%(.)/g, (directive: string, code: string) => {
    switch (code) {
      case "Y":
        return pad(date.year, 4);
      case "y":
        return pad(date.year % 100);
      case "m":
        return pad(date.month);
      case "d":
        return pad(date.day);
      case "e":
        return String(date.day).padStart(2, " ");
      case "B":
        return MONTH_NAMES[date.month - 1];
      case "b":
        return MONTH_NAMES[date.month - 1].slice(0, 3);
      case "A":
        return WEEKDAY_NAMES[weekday];
      case "a":
        return WEEKDAY_NAMES[weekday].slice(0, 3);
      case "j":
        return pad(dayOfYear(date), 3);
      case "%":
        return "%";
      default:
        return directive;
    }
  });
}

export function resolveOutputFormat(format: string): string {
  return FORMAT_SHORTHANDS[format] ?? format;
}

export function parseInputFamilies(values: string[] | undefined): InputFamily[] {
  if (!values || values.length === 0 || values.includes("all")) {
    return [...INPUT_FAMILIES];
  }
  return values.map((value) => {
    const family = INPUT_FAMILIES.find((candidate) => candidate === value);
    if (!family) {
      throw malformedArgument(
        `Unknown input format "${value}" (expected one of: ${INPUT_FAMILIES.join(", ")}, all)`
      );
    }
    return family;
  });
}

function monthIndexOf(name: string): number {
  return MONTH_NAMES.indexOf(name) + 1;
}

/**
 * Rewrite every recognised date in `content`. Matches that are not real
 * calendar dates are left as they are.
 */
export function convertDateFormat(
  content: string,
  outputFormat = "YYYY-MM-DD",
  inputFormats?: string[]
): string {
  const format = resolveOutputFormat(outputFormat);
  const families = parseInputFamilies(inputFormats);

  const render =
    (toDate: (groups: string[]) => CalendarDate | undefined) =>
    (match: string, ...groups: unknown[]): string => {
      const strings = groups.filter((group): group is string => typeof group === "string");
      const date = toDate(strings);
      return date ? strftime(date, format) : match;
    };

  let result = content;
  if (families.includes("month-day-year")) {
    result = result.replace(
      MONTH_DAY_YEAR_RE,
      render(([month, day, year]) =>
        makeDate(Number(year), monthIndexOf(month), Number(day))
      )
    );
  }
  if (families.includes("DD.MM.YYYY")) {
    result = result.replace(
      DOTTED_RE,
      render(([day, month, year]) => makeDate(Number(year), Number(month), Number(day)))
    );
  }
  if (families.includes("YYYY-MM-DD")) {
    result = result.replace(
      ISO_RE,
      render(([year, month, day]) => makeDate(Number(year), Number(month), Number(day)))
    );
  }
  if (families.includes("MM-DD-YYYY")) {
    result = result.replace(
      US_RE,
      render(([month, day, year]) => makeDate(Number(year), Number(month), Number(day)))
    );
  }
  return result;
}

export interface ConvertOptions {
  file: string;
  output?: string;
  format?: string;
  inputFormats?: string[];
}

export interface ConvertResult {
  outputPath: string;
  changed: boolean;
}

const USAGE = `Usage: md-convert-dates <input_file> [options]

Options:
  -o, --output <file>     Output file (default: overwrite input)
  -f, --format <format>   Output format (default: YYYY-MM-DD)
  -i, --input <format>    Input format to detect (repeatable, default: all)

Output formats: YYYY-MM-DD, DD.MM.YYYY, DD.MM, MM-DD, YYYY-MM, MM.DD, or strftime codes.
Input formats: month-day-year, DD.MM.YYYY, YYYY-MM-DD, MM-DD-YYYY, or all.`;

function looksLikeOutputPath(arg: string): boolean {
  return arg.endsWith(".md") || arg.includes("/") || arg.includes("\\");
}

export function parseArgs(args: string[]): ConvertOptions {
  if (args.length === 0) {
    throw malformedArgument(USAGE);
  }
  const options: ConvertOptions = { file: args[0] };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-o" || arg === "--output") {
      if (!args[i + 1]) {
        throw malformedArgument("-o/--output requires a file path");
      }
      options.output = args[++i];
    } else if (arg === "-f" || arg === "--format") {
      if (!args[i + 1]) {
        throw malformedArgument("-f/--format requires a format string");
      }
      options.format = args[++i];
    } else if (arg === "-i" || arg === "--input") {
      if (!args[i + 1]) {
        throw malformedArgument("-i/--input requires a format string");
      }
      options.inputFormats = [...(options.inputFormats ?? []), args[++i]];
    } else if (looksLikeOutputPath(arg)) {
      options.output = arg;
    } else {
      options.format = arg;
    }
  }

  return options;
}

export function runConvertDates(options: ConvertOptions): ConvertResult {
  const inputPath = requireFile(options.file);
  const config = loadConfig().dates;
  const format = options.format ?? config.outputFormat ?? "YYYY-MM-DD";
  const inputFormats = options.inputFormats ?? config.inputFormats;

  const content = readText(inputPath);
  const converted = convertDateFormat(content, format, inputFormats);
  const outputPath = path.resolve(options.output ?? inputPath);
  writeText(outputPath, converted);

  return { outputPath, changed: converted !== content };
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log(USAGE);
      return;
    }
    const result = runConvertDates(parseArgs(args));
    report([
      "Date formats converted successfully!",
      `Output written to: ${result.outputPath}`,
    ]);
  });
}
