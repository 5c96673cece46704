#!/usr/bin/env node
/**
 * Reorder the columns of every Markdown table in a file, leaving frontmatter
 * and all other lines untouched.
 *
 * Usage:
 *   tsx scripts/md-reorder-columns.ts <file.md> <order> [-o out.md] [--dry-run]
 *     [--strictness loose|strict]
 *
 * Examples:
 *   tsx scripts/md-reorder-columns.ts daily.md "1,0,2"    # swap first two of 3 columns
 *   tsx scripts/md-reorder-columns.ts daily.md "3 0 1 2"  # move last of 4 columns first
 */
import * as path from "path";
import { isMainModule, report, runCli } from "./cli-output.js";
import { loadConfig } from "./md-config.js";
import { malformedArgument } from "./md-errors.js";
import { readText, requireFile, writeText } from "./md-files.js";
import {
  type Strictness,
  formatRow,
  mapTable,
  parseStrictness,
  parseTable,
  tableRows,
  transformTables,
} from "./md-table.js";

export interface ReorderOptions {
  file: string;
  order: number[];
  output?: string;
  dryRun: boolean;
  strictness?: Strictness;
}

export interface ReorderResult {
  outputPath: string | null;
  tables: number;
  text: string;
}

const USAGE =
  "Usage: md-reorder-columns <file.md> <order> [-o|--output file] [-n|--dry-run] [--strictness loose|strict]";

/** Parse "2,0,1" or "2 0 1" into a validated permutation of 0..n-1. */
export function parseColumnOrder(value: string): number[] {
  const tokens = value.replace(/,/g, " ").split(/\s+/).filter(Boolean);
  if (tokens.length === 0) {
    throw malformedArgument("Invalid column order format: no column indices given");
  }

  const order: number[] = [];
  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      throw malformedArgument(
        `Invalid column order format: "${token}" is not a column index`
      );
    }
    order.push(Number.parseInt(token, 10));
  }

  const sorted = [...order].sort((a, b) => a - b);
  if (!sorted.every((value, index) => value === index)) {
    throw malformedArgument(
      "Invalid column order format: column order must be a permutation of column indices starting from 0"
    );
  }
  return order;
}

export function invertOrder(order: number[]): number[] {
  const inverse = new Array<number>(order.length);
  order.forEach((source, target) => {
    inverse[source] = target;
  });
  return inverse;
}

export function reorderColumns(
  text: string,
  order: number[],
  strictness: Strictness = "strict"
): { text: string; tables: number } {
  return transformTables(text, strictness, (block, context) => {
    const table = parseTable(block.lines, {
      expectedColumns: order.length,
      firstLineNumber: context.firstLineNumber,
      describeMismatch: (actual, expected, lineNumber) =>
        `Column count mismatch: table has ${actual} columns, ` +
        `but order specifies ${expected} columns (line ${lineNumber})`,
    });
    const reordered = mapTable(table, (row) => ({
      ...row,
      cells: order.map((index) => row.cells[index]),
    }));
    return tableRows(reordered).map(formatRow);
  });
}

export function parseArgs(args: string[]): ReorderOptions {
  const positional: string[] = [];
  let output: string | undefined;
  let dryRun = false;
  let strictness: Strictness | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if ((arg === "--output" || arg === "-o") && args[i + 1]) {
      output = args[i + 1];
      i++;
    } else if (arg === "--dry-run" || arg === "-n") {
      dryRun = true;
    } else if (arg === "--strictness" && args[i + 1]) {
      strictness = parseStrictness(args[i + 1]);
      i++;
    } else if (arg.startsWith("-") && arg.length > 1) {
      throw malformedArgument(`Unknown option: ${arg}\n${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    throw malformedArgument(USAGE);
  }

  return {
    file: positional[0],
    order: parseColumnOrder(positional[1]),
    output,
    dryRun,
    strictness,
  };
}

export function runReorder(options: ReorderOptions): ReorderResult {
  const filePath = requireFile(options.file);
  const strictness =
    options.strictness ?? loadConfig().tables.strictness ?? "strict";

  const result = reorderColumns(readText(filePath), options.order, strictness);
  if (options.dryRun) {
    return { outputPath: null, ...result };
  }

  const outputPath = path.resolve(options.output || filePath);
  writeText(outputPath, result.text);
  return { outputPath, ...result };
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log(USAGE);
      return;
    }
    const result = runReorder(parseArgs(args));
    if (result.outputPath === null) {
      console.log(result.text);
      return;
    }
    report(
      `Successfully reordered columns in ${result.outputPath} (${result.tables} table(s))`
    );
  });
}
