#!/usr/bin/env node
/**
 * Remove a tag from every Markdown file under a folder.
 *
 * In frontmatter the tag is removed from `tags:` lists, written with or
 * without `#`. In the body only `#tag` occurrences are removed.
 *
 * Usage: tsx scripts/md-remove-tag.ts <folder> <tag>
 */
import * as path from "path";
import { formatList, isMainModule, report, runCli } from "./cli-output.js";
import { malformedArgument } from "./md-errors.js";
import {
  MARKDOWN_EXTENSIONS,
  readText,
  requireDirectory,
  walkFiles,
  writeText,
} from "./md-files.js";
import {
  splitDelimitedFrontmatter,
  wrapDelimitedFrontmatter,
} from "./md-frontmatter.js";

export interface TagRemoval {
  text: string;
  count: number;
}

export interface RemoveTagResult {
  tag: string;
  scanned: number;
  modified: Array<{ path: string; count: number }>;
  errors: Array<{ path: string; reason: string }>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function normalizeTag(tag: string): string {
  const normalized = tag.trim().replace(/^#/, "");
  if (normalized === "") {
    throw malformedArgument("Tag must not be empty");
  }
  return normalized;
}

function countingReplace(
  text: string,
  pattern: RegExp,
  replacement: (match: string, ...groups: string[]) => string
): TagRemoval {
  let count = 0;
  const next = text.replace(pattern, (match: string, ...rest: unknown[]) => {
    count++;
    const groups = rest.filter((value): value is string => typeof value === "string");
    return replacement(match, ...groups);
  });
  return { text: next, count };
}

function removeFromBody(body: string, tag: string): TagRemoval {
  // Nested tags such as #tag/sub and #tag-log are different tags, and so is
  // #café when removing #caf.
  const pattern = new RegExp(
    `(^|\\s)#${escapeRegExp(tag)}(?![\\p{L}\\p{N}\\p{M}_/-])`,
    "giu"
  );
  return countingReplace(body, pattern, (_match, leading) => leading);
}

function removeFromInlineLists(frontmatter: string, tag: string): TagRemoval {
  const itemPattern = new RegExp(`^\\s*["']?#?${escapeRegExp(tag)}["']?\\s*$`, "i");
  const linePattern = /^(\s*tags?\s*:\s*\[)([^\]\n]*)(\].*)$/gim;
  let count = 0;
  const text = frontmatter.replace(
    linePattern,
    (line: string, open: string, items: string, close: string) => {
      const parts = items.split(",");
      const kept = parts.filter((item) => !itemPattern.test(item));
      if (kept.length === parts.length) {
        return line;
      }
      count += parts.length - kept.length;
      return `${open}${kept.map((item) => item.trim()).join(", ")}${close}`;
    }
  );
  return { text, count };
}

function removeFromFrontmatter(frontmatter: string, tag: string): TagRemoval {
  const listItem = new RegExp(
    `^\\s*-\\s*["']?#?${escapeRegExp(tag)}["']?\\s*$`,
    "gim"
  );
  const listed = countingReplace(frontmatter, listItem, () => "");
  let text = listed.text;
  if (listed.count > 0) {
    text = text.replace(/\n\s*\n/g, "\n");
  }
  const inline = removeFromInlineLists(text, tag);
  return { text: inline.text, count: listed.count + inline.count };
}

/** Remove `tag` from one document and count the removals. */
export function removeTag(content: string, tag: string): TagRemoval {
  const name = normalizeTag(tag);
  const split = splitDelimitedFrontmatter(content);
  if (!split) {
    return removeFromBody(content, name);
  }

  const frontmatter = removeFromFrontmatter(split.inner, name);
  const body = removeFromBody(split.rest, name);
  return {
    text: wrapDelimitedFrontmatter(frontmatter.text, body.text),
    count: frontmatter.count + body.count,
  };
}

export function removeTagInFolder(folder: string, tag: string): RemoveTagResult {
  const root = requireDirectory(folder);
  const name = normalizeTag(tag);
  const result: RemoveTagResult = {
    tag: name,
    scanned: 0,
    modified: [],
    errors: [],
  };

  for (const filePath of walkFiles(root, MARKDOWN_EXTENSIONS)) {
    result.scanned++;
    try {
      const removal = removeTag(readText(filePath), name);
      if (removal.count > 0) {
        writeText(filePath, removal.text);
        result.modified.push({ path: filePath, count: removal.count });
      }
    } catch (error) {
      result.errors.push({
        path: filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}

export function describeRemoveTag(result: RemoveTagResult): string[] {
  const lines = result.modified.length
    ? [
        formatList(
          result.modified.map(
            (entry) =>
              `Removed ${entry.count} instance(s) of '${result.tag}' from ${path.basename(entry.path)}`
          )
        ),
      ]
    : [];
  lines.push(
    "",
    "Scan complete.",
    `Looked at ${result.scanned} Markdown files.`,
    `Removed tag '#${result.tag}' from ${result.modified.length} files.`
  );
  return lines;
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log("Usage: md-remove-tag <folder> <tag>");
      return;
    }
    if (args.length !== 2) {
      throw malformedArgument("Usage: md-remove-tag <folder> <tag>");
    }
    const result = removeTagInFolder(args[0], args[1]);
    for (const problem of result.errors) {
      console.error(`Error processing ${problem.path}: ${problem.reason}`);
    }
    report(describeRemoveTag(result));
  });
}
