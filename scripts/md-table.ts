/**
 * Markdown table processing shared by the reorder, reverse and split-by-year
 * scripts: table-line detection, segment scanning, typed rows and tables, and
 * reassembly of the document around transformed table blocks.
 */
import { malformedArgument, structuralMismatch } from "./md-errors.js";
import { extractFrontmatter, joinLines, splitLines } from "./md-frontmatter.js";

/**
 * `loose`: any non-blank line containing a pipe.
 * `strict`: the trimmed line starts and ends with a pipe.
 */
export type Strictness = "loose" | "strict";

export const STRICTNESS_VALUES: readonly Strictness[] = ["loose", "strict"];

export interface PassthroughSegment {
  kind: "passthrough";
  line: string;
  /** Index of the line within the scanned sequence. */
  index: number;
}

export interface TableBlock {
  kind: "table";
  lines: string[];
  /** Index of the first line within the scanned sequence. */
  start: number;
}

export type Segment = PassthroughSegment | TableBlock;

export interface Row {
  cells: string[];
  /** "\r" when the source line had a CRLF ending, otherwise "". */
  eol: string;
}

export interface Table {
  header: Row;
  separator: Row | null;
  rows: Row[];
}

const SEPARATOR_CELL_RE = /^:?-+:?$/;
const CELL_BOUNDARY_RE = /(?<!\\)\|/;

export function parseStrictness(value: string): Strictness {
  const match = STRICTNESS_VALUES.find((candidate) => candidate === value);
  if (!match) {
    throw malformedArgument(
      `Invalid strictness "${value}" (expected one of: ${STRICTNESS_VALUES.join(", ")})`
    );
  }
  return match;
}

export function isTableLine(line: string, strictness: Strictness): boolean {
  const trimmed = line.trim();
  if (trimmed === "") {
    return false;
  }
  if (strictness === "strict") {
    // A bare "|" has no cells.
    return (
      trimmed.startsWith("|") &&
      trimmed.endsWith("|") &&
      parseRow(trimmed).cells.length > 0
    );
  }
  return line.includes("|");
}

export function isSeparatorRow(line: string): boolean {
  const stripped = line.trim();
  if (!stripped.startsWith("|") || !stripped.endsWith("|")) {
    return false;
  }
  const cells = stripped
    .split("|")
    .slice(1, -1)
    .map((cell) => cell.trim())
    .filter((cell) => cell !== "");
  return cells.length > 0 && cells.every((cell) => SEPARATOR_CELL_RE.test(cell));
}

/**
 * Lazily split `lines` into passthrough lines and maximal runs of table lines.
 */
export function* scanSegments(
  lines: string[],
  strictness: Strictness
): Generator<Segment> {
  let state: "outside" | "in-table" = "outside";
  let block: string[] = [];
  let start = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (isTableLine(line, strictness)) {
      if (state === "outside") {
        state = "in-table";
        block = [];
        start = i;
      }
      block.push(line);
      continue;
    }
    if (state === "in-table") {
      yield { kind: "table", lines: block, start };
      state = "outside";
    }
    yield { kind: "passthrough", line, index: i };
  }

  if (state === "in-table") {
    yield { kind: "table", lines: block, start };
  }
}

/**
 * Split a line on unescaped pipes. Blank boundary cells produced by the
 * leading and trailing pipes are dropped; inner cell text is kept verbatim.
 */
export function parseRow(line: string): Row {
  const eol = line.endsWith("\r") ? "\r" : "";
  const content = eol ? line.slice(0, -1) : line;
  let cells = content.split(CELL_BOUNDARY_RE);
  if (cells.length > 0 && cells[0].trim() === "") {
    cells = cells.slice(1);
  }
  if (cells.length > 0 && cells[cells.length - 1].trim() === "") {
    cells = cells.slice(0, -1);
  }
  return { cells, eol };
}

export function formatRow(row: Row): string {
  return `|${row.cells.join("|")}|${row.eol}`;
}

export interface ParseTableOptions {
  /** Every row, header and separator included, must have this many cells. */
  expectedColumns?: number;
  /** Line number of the block's first line, for error messages. */
  firstLineNumber?: number;
  describeMismatch?: (actual: number, expected: number, lineNumber: number) => string;
}

function defaultMismatchMessage(actual: number, expected: number, lineNumber: number): string {
  return (
    `Column count mismatch on line ${lineNumber}: ` +
    `table has ${actual} columns, but ${expected} were expected`
  );
}

export function parseTable(lines: string[], options: ParseTableOptions = {}): Table {
  if (lines.length === 0) {
    throw structuralMismatch("Cannot build a table from zero lines");
  }
  const { expectedColumns, firstLineNumber = 1 } = options;
  const describe = options.describeMismatch ?? defaultMismatchMessage;
  const parsed = lines.map(parseRow);

  if (expectedColumns !== undefined) {
    parsed.forEach((row, offset) => {
      if (row.cells.length !== expectedColumns) {
        throw structuralMismatch(
          describe(row.cells.length, expectedColumns, firstLineNumber + offset)
        );
      }
    });
  }

  const hasSeparator = lines.length > 1 && isSeparatorRow(lines[1]);
  return {
    header: parsed[0],
    separator: hasSeparator ? parsed[1] : null,
    rows: parsed.slice(hasSeparator ? 2 : 1),
  };
}

export function tableRows(table: Table): Row[] {
  return table.separator
    ? [table.header, table.separator, ...table.rows]
    : [table.header, ...table.rows];
}

export function mapTable(table: Table, fn: (row: Row) => Row): Table {
  return {
    header: fn(table.header),
    separator: table.separator ? fn(table.separator) : null,
    rows: table.rows.map(fn),
  };
}

export function reassemble(
  frontmatter: string[],
  segments: Iterable<Segment>
): string {
  const out = [...frontmatter];
  for (const segment of segments) {
    if (segment.kind === "passthrough") {
      out.push(segment.line);
    } else {
      out.push(...segment.lines);
    }
  }
  return joinLines(out);
}

export interface TransformContext {
  /** 1-based line number of the block's first line in the whole document. */
  firstLineNumber: number;
}

export type TableTransform = (
  block: TableBlock,
  context: TransformContext
) => string[];

export interface DocumentTransformResult {
  text: string;
  tables: number;
}

/**
 * Apply `transform` to every table block in the body of `text`. Frontmatter
 * and non-table lines are emitted unchanged. Transforms may reorder lines but
 * never change a block's row count.
 */
export function transformTables(
  text: string,
  strictness: Strictness,
  transform: TableTransform
): DocumentTransformResult {
  const { frontmatter, body } = extractFrontmatter(splitLines(text));
  const segments: Segment[] = [];
  let tables = 0;

  for (const segment of scanSegments(body, strictness)) {
    if (segment.kind === "passthrough") {
      segments.push(segment);
      continue;
    }
    const next = transform(segment, {
      firstLineNumber: frontmatter.length + segment.start + 1,
    });
    if (next.length !== segment.lines.length) {
      throw new Error(
        `Table transform changed row count from ${segment.lines.length} to ${next.length}`
      );
    }
    segments.push({ ...segment, lines: next });
    tables++;
  }

  return { text: reassemble(frontmatter, segments), tables };
}
