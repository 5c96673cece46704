#!/usr/bin/env node
/**
 * Rename a frontmatter key in every Markdown file under a folder. Only the
 * frontmatter block is touched, and the rest of each file is kept byte for byte.
 *
 * Usage: tsx scripts/md-rename-key.ts <folder> <old_name> <new_name>
 */
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

export interface RenameKeyResult {
  scanned: number;
  affected: string[];
  errors: Array<{ path: string; reason: string }>;
}

const KEY_NAME_RE = /^[^\s:#][^:\n]*$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function validateKeyName(key: string, label: string): string {
  if (!KEY_NAME_RE.test(key)) {
    throw malformedArgument(`Invalid ${label} key name: "${key}"`);
  }
  return key;
}

/** The renamed document, or undefined when nothing changed. */
export function renameFrontmatterKey(
  content: string,
  oldKey: string,
  newKey: string
): string | undefined {
  const split = splitDelimitedFrontmatter(content);
  if (!split) {
    return undefined;
  }

  const keyPattern = new RegExp(`^(\\s*)${escapeRegExp(oldKey)}:`, "gm");
  const renamed = split.inner.replace(
    keyPattern,
    (_match: string, indent: string) => `${indent}${newKey}:`
  );
  if (renamed === split.inner) {
    return undefined;
  }
  return wrapDelimitedFrontmatter(renamed, split.rest);
}

export function renameKeyInFolder(
  folder: string,
  oldKey: string,
  newKey: string
): RenameKeyResult {
  const root = requireDirectory(folder);
  validateKeyName(oldKey, "old");
  validateKeyName(newKey, "new");

  const result: RenameKeyResult = { scanned: 0, affected: [], errors: [] };
  for (const filePath of walkFiles(root, MARKDOWN_EXTENSIONS)) {
    result.scanned++;
    try {
      const next = renameFrontmatterKey(readText(filePath), oldKey, newKey);
      if (next !== undefined) {
        writeText(filePath, next);
        result.affected.push(filePath);
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

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log("Usage: md-rename-key <folder> <old_name> <new_name>");
      return;
    }
    if (args.length !== 3) {
      throw malformedArgument("Usage: md-rename-key <folder> <old_name> <new_name>");
    }
    const result = renameKeyInFolder(args[0], args[1], args[2]);
    for (const problem of result.errors) {
      console.error(`Error processing file ${problem.path}: ${problem.reason}`);
    }
    const lines = ["Modifying files..."];
    if (result.affected.length > 0) {
      lines.push(formatList(result.affected, "  -"));
    }
    lines.push("", `Finished. Affected files: ${result.affected.length}`);
    report(lines);
  });
}
