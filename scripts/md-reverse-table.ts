#!/usr/bin/env node
/**
 * Reverse the order of rows in every Markdown table of a file while keeping
 * frontmatter and surrounding text in place.
 *
 * Usage:
 *   tsx scripts/md-reverse-table.ts <file.md> [--no-header] [-o out.md]
 *     [--strictness loose|strict]
 *
 * By default the header and separator stay on top and only data rows are
 * reversed. With --no-header the whole table is reversed and the separator is
 * moved back under the new first row.
 */
import * as path from "path";
import { isMainModule, report, runCli } from "./cli-output.js";
import { loadConfig } from "./md-config.js";
import { malformedArgument } from "./md-errors.js";
import { readText, requireFile, writeText } from "./md-files.js";
import { type Strictness, parseStrictness, transformTables } from "./md-table.js";

export interface ReverseOptions {
  file: string;
  output?: string;
  keepHeader: boolean;
  strictness?: Strictness;
}

export interface ReverseResult {
  inputPath: string;
  outputPath: string;
  keepHeader: boolean;
  tables: number;
}

const USAGE =
  "Usage: md-reverse-table <file.md> [--no-header] [-o|--output file] [--strictness loose|strict]";

const SEPARATOR_MARKERS = ["---", ":-:", ":--", "--:"];

function looksLikeSeparator(line: string): boolean {
  return SEPARATOR_MARKERS.some((marker) => line.includes(marker));
}

/** Reverse one table block's lines. Never changes the line count. */
export function reverseTableLines(lines: string[], keepHeader = true): string[] {
  if (lines.length <= 1) {
    return [...lines];
  }

  if (keepHeader) {
    if (lines.length <= 2) {
      return [...lines];
    }
    const [header, separator, ...dataRows] = lines;
    return [header, separator, ...dataRows.reverse()];
  }

  const reversed = [...lines].reverse();
  if (reversed.length <= 2) {
    return reversed;
  }

  const separatorIndex = reversed.findIndex(looksLikeSeparator);
  if (separatorIndex !== -1 && separatorIndex !== 1) {
    const [separator] = reversed.splice(separatorIndex, 1);
    reversed.splice(1, 0, separator);
  }
  return reversed;
}

export function reverseTables(
  text: string,
  options: { keepHeader?: boolean; strictness?: Strictness } = {}
): { text: string; tables: number } {
  const keepHeader = options.keepHeader ?? true;
  return transformTables(text, options.strictness ?? "loose", (block) =>
    reverseTableLines(block.lines, keepHeader)
  );
}

export function parseArgs(args: string[]): ReverseOptions {
  const positional: string[] = [];
  let output: string | undefined;
  let keepHeader = true;
  let strictness: Strictness | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if ((arg === "--output" || arg === "-o") && args[i + 1]) {
      output = args[i + 1];
      i++;
    } else if (arg === "--no-header") {
      keepHeader = false;
    } else if (arg === "--strictness" && args[i + 1]) {
      strictness = parseStrictness(args[i + 1]);
      i++;
    } else if (arg.startsWith("-") && arg.length > 1) {
      throw malformedArgument(`Unknown option: ${arg}\n${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw malformedArgument(USAGE);
  }
  return { file: positional[0], output, keepHeader, strictness };
}

export function runReverse(options: ReverseOptions): ReverseResult {
  const inputPath = requireFile(options.file);
  const outputPath = path.resolve(options.output || inputPath);
  const strictness =
    options.strictness ?? loadConfig().tables.strictness ?? "loose";

  const result = reverseTables(readText(inputPath), {
    keepHeader: options.keepHeader,
    strictness,
  });
  writeText(outputPath, result.text);

  return {
    inputPath,
    outputPath,
    keepHeader: options.keepHeader,
    tables: result.tables,
  };
}

export function describeReverse(result: ReverseResult): string {
  const headerNote = result.keepHeader
    ? "with header preserved"
    : "including header";
  if (result.inputPath === result.outputPath) {
    return `Table rows reversed ${headerNote} in ${result.inputPath}`;
  }
  return `Table rows reversed ${headerNote} and saved to ${result.outputPath}`;
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log(USAGE);
      return;
    }
    report(describeReverse(runReverse(parseArgs(args))));
  });
}
