#!/usr/bin/env node
/**
 * Replace `[[note]]` references with the content of the sibling `note.md`,
 * flattened onto one line so it can live inside a table cell.
 *
 * Usage: tsx scripts/md-inline-links.ts <file.md>
 *
 * The referenced note's frontmatter is dropped. Its lines are joined with
 * <br>, and fenced code blocks become <pre><code> with &#10; line breaks.
 */
import * as fs from "fs";
import * as path from "path";
import { formatList, isMainModule, report, reportWarning, runCli } from "./cli-output.js";
import { malformedArgument } from "./md-errors.js";
import { readText, requireFile, writeText } from "./md-files.js";
import {
  extractFrontmatter,
  joinLines,
  splitLines,
  stripFrontmatter,
} from "./md-frontmatter.js";

const TRANSCLUSION_RE = /\[\[([^\]]+)\]\]/g;
const FENCE = "```";

export interface InlineResult {
  text: string;
  inlined: string[];
  missing: string[];
}

/** `name` of `[[name]]`, `[[name|alias]]` or `[[name\|alias]]`, with `.md` appended. */
export function referencedFileName(inner: string): string {
  let name = inner.trim();
  if (name.includes("\\|")) {
    name = name.split("\\|")[0].trim();
  } else if (name.includes("|")) {
    name = name.split("|")[0].trim();
  }
  return name.endsWith(".md") ? name : `${name}.md`;
}

function renderCodeBlock(language: string, lines: string[]): string {
  const code = lines.join("&#10;");
  return language
    ? `<pre><code class="language-${language}">${code}</code></pre>`
    : `<pre><code>${code}</code></pre>`;
}

/**
 * Join lines with <br>, turning fenced code blocks into single-line HTML.
 * An unclosed fence at the end is still emitted as a code block.
 */
export function flattenForTableCell(content: string): string {
  const result: string[] = [];
  let inCodeBlock = false;
  let language = "";
  let codeLines: string[] = [];

  for (const line of splitLines(content)) {
    const trimmed = line.trim();
    if (trimmed.startsWith(FENCE)) {
      if (!inCodeBlock) {
        inCodeBlock = true;
        language = trimmed.slice(FENCE.length).trim();
        codeLines = [];
      } else {
        inCodeBlock = false;
        result.push(renderCodeBlock(language, codeLines));
      }
    } else if (inCodeBlock) {
      codeLines.push(line);
    } else {
      result.push(line);
    }
  }

  if (inCodeBlock) {
    result.push(renderCodeBlock(language, codeLines));
  }
  return result.join("<br>");
}

/**
 * Inline every resolvable reference in `text`. The including document's own
 * frontmatter is kept; unresolved references are left as written.
 */
export function inlineTransclusions(
  text: string,
  readReference: (fileName: string) => string | undefined
): InlineResult {
  const inlined: string[] = [];
  const missing: string[] = [];
  const { frontmatter, body } = extractFrontmatter(splitLines(text));

  const replaced = joinLines(body).replace(
    TRANSCLUSION_RE,
    (token: string, inner: string) => {
      const fileName = referencedFileName(inner);
      const content = readReference(fileName);
      if (content === undefined) {
        missing.push(fileName);
        return token;
      }
      inlined.push(fileName);
      return flattenForTableCell(stripFrontmatter(content).trim());
    }
  );

  return {
    text: joinLines([...frontmatter, ...splitLines(replaced)]),
    inlined,
    missing,
  };
}

export function runInlineLinks(file: string): InlineResult & { path: string } {
  const filePath = requireFile(file);
  const directory = path.dirname(filePath);

  const result = inlineTransclusions(readText(filePath), (fileName) => {
    const referenced = path.join(directory, fileName);
    return fs.existsSync(referenced) ? readText(referenced) : undefined;
  });
  writeText(filePath, result.text);
  return { path: filePath, ...result };
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log("Usage: md-inline-links <file.md>");
      return;
    }
    if (args.length !== 1) {
      throw malformedArgument("Usage: md-inline-links <file.md>");
    }
    const result = runInlineLinks(args[0]);
    if (result.missing.length > 0) {
      reportWarning(`Referenced files not found:\n${formatList(result.missing)}`);
    }
    report(`Successfully processed: ${result.path} (${result.inlined.length} inlined)`);
  });
}
