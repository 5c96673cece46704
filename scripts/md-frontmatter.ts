/**
 * Line-level document model and frontmatter separation.
 *
 * Documents are split on "\n" only; a "\r" stays on its line so that
 * `joinLines(splitLines(text)) === text` for any input.
 */

export const FRONTMATTER_DELIMITER = "---";

export interface FrontmatterSplit {
  /** Opening delimiter through closing delimiter, inclusive. Empty when absent. */
  frontmatter: string[];
  body: string[];
}

export function splitLines(text: string): string[] {
  return text.split("\n");
}

export function joinLines(lines: string[]): string {
  return lines.join("\n");
}

export function isDelimiterLine(line: string): boolean {
  return line.trimEnd() === FRONTMATTER_DELIMITER;
}

export function extractFrontmatter(lines: string[]): FrontmatterSplit {
  if (lines.length === 0 || !isDelimiterLine(lines[0])) {
    return { frontmatter: [], body: lines };
  }
  for (let i = 1; i < lines.length; i++) {
    if (isDelimiterLine(lines[i])) {
      return { frontmatter: lines.slice(0, i + 1), body: lines.slice(i + 1) };
    }
  }
  // Unclosed block: the whole document is body.
  return { frontmatter: [], body: lines };
}

export function hasFrontmatter(text: string): boolean {
  const lines = splitLines(text);
  if (lines.length === 0 || lines[0].trim() !== FRONTMATTER_DELIMITER) {
    return false;
  }
  return lines.slice(1).some((line) => line.trim() === FRONTMATTER_DELIMITER);
}

/** Text after the frontmatter block with leading newlines removed. */
export function stripFrontmatter(text: string): string {
  const { frontmatter, body } = extractFrontmatter(splitLines(text));
  if (frontmatter.length === 0) {
    return text;
  }
  return joinLines(body).replace(/^\n+/, "");
}

export interface DelimitedFrontmatter {
  /** Raw text between the first two `---` occurrences. */
  inner: string;
  /** Everything after the second `---`. */
  rest: string;
}

/**
 * Substring-level split used by the key renamer and tag remover, which edit
 * frontmatter text in place and re-wrap it as `---${inner}---${rest}`.
 */
export function splitDelimitedFrontmatter(
  text: string
): DelimitedFrontmatter | undefined {
  if (!text.startsWith(FRONTMATTER_DELIMITER)) {
    return undefined;
  }
  const close = text.indexOf(FRONTMATTER_DELIMITER, FRONTMATTER_DELIMITER.length);
  if (close === -1) {
    return undefined;
  }
  return {
    inner: text.slice(FRONTMATTER_DELIMITER.length, close),
    rest: text.slice(close + FRONTMATTER_DELIMITER.length),
  };
}

export function wrapDelimitedFrontmatter(inner: string, rest: string): string {
  return `${FRONTMATTER_DELIMITER}${inner}${FRONTMATTER_DELIMITER}${rest}`;
}
