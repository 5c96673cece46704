#!/usr/bin/env node
/**
 * Unwrap `[[wiki links]]` whose target file does not exist beside the note,
 * leaving the link text in place.
 *
 * Usage: tsx scripts/md-prune-links.ts <file.md>
 */
import * as fs from "fs";
import * as path from "path";
import { formatList, isMainModule, report, runCli } from "./cli-output.js";
import { malformedArgument } from "./md-errors.js";
import { readText, requireFile, writeText } from "./md-files.js";

const WIKI_LINK_RE = /\[\[(.*?)\]\]/g;

export interface PruneResult {
  text: string;
  /** Link bodies that were unwrapped, in first-seen order. */
  removed: string[];
}

/**
 * Files a link body may point at, relative to the note's folder. The alias
 * after `|` and any `#heading` are dropped. A name with a non-Markdown
 * extension may be an attachment or a dotted note name, so both are tried.
 */
export function linkCandidates(inner: string): string[] {
  let target = inner.split("|")[0];
  // Table cells escape the alias pipe as `\|`.
  if (target.endsWith("\\")) {
    target = target.slice(0, -1);
  }
  const hash = target.indexOf("#");
  if (hash !== -1) {
    target = target.slice(0, hash);
  }
  target = target.trim();
  if (target === "") {
    return [];
  }
  if (target.toLowerCase().endsWith(".md")) {
    return [target];
  }
  if (path.extname(target) !== "") {
    return [target, `${target}.md`];
  }
  return [`${target}.md`];
}

export function pruneDeadLinks(
  text: string,
  exists: (target: string) => boolean
): PruneResult {
  const removed: string[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(WIKI_LINK_RE)) {
    const inner = match[1];
    if (seen.has(inner)) {
      continue;
    }
    seen.add(inner);
    const candidates = linkCandidates(inner);
    // `[[#Heading]]` points into the note itself.
    if (candidates.length === 0 || candidates.some(exists)) {
      continue;
    }
    removed.push(inner);
  }

  let result = text;
  for (const inner of removed) {
    result = result.split(`[[${inner}]]`).join(inner);
  }
  return { text: result, removed };
}

export interface PruneFileResult {
  path: string;
  removed: string[];
  changed: boolean;
}

export function runPruneLinks(file: string): PruneFileResult {
  const filePath = requireFile(file);
  const directory = path.dirname(filePath);
  const content = readText(filePath);

  const result = pruneDeadLinks(content, (target) =>
    fs.existsSync(path.join(directory, target))
  );
  const changed = result.text !== content;
  if (changed) {
    writeText(filePath, result.text);
  }
  return { path: filePath, removed: result.removed, changed };
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log("Usage: md-prune-links <file.md>");
      return;
    }
    if (args.length !== 1) {
      throw malformedArgument("Usage: md-prune-links <file.md>");
    }
    const result = runPruneLinks(args[0]);
    const lines: string[] = [];
    if (result.removed.length > 0) {
      lines.push(
        "Removed link brackets for missing targets:",
        formatList(result.removed.map((inner) => `[[${inner}]]`))
      );
    }
    lines.push(`Processing complete for ${result.path}`);
    report(lines);
  });
}
