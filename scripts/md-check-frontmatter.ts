#!/usr/bin/env node
/**
 * Report Markdown files under a folder that lack a `---` … `---` frontmatter
 * block, and files whose block does not parse as YAML.
 *
 * Usage: tsx scripts/md-check-frontmatter.ts <folder>
 */
import matter from "gray-matter";
import { formatList, isMainModule, report, runCli } from "./cli-output.js";
import { malformedArgument } from "./md-errors.js";
import { MARKDOWN_EXTENSIONS, readText, requireDirectory, walkFiles } from "./md-files.js";
import { hasFrontmatter } from "./md-frontmatter.js";

export interface FileProblem {
  path: string;
  reason: string;
}

export interface FrontmatterReport {
  total: number;
  withFrontmatter: number;
  missing: string[];
  invalid: FileProblem[];
  errors: FileProblem[];
}

/** Reason the frontmatter YAML fails to parse, or undefined when it parses. */
export function frontmatterYamlError(text: string): string | undefined {
  try {
    // Options bypass gray-matter's content cache.
    matter(text, {});
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message.split("\n")[0] : String(error);
  }
}

export function checkFrontmatter(folder: string): FrontmatterReport {
  const root = requireDirectory(folder);
  const result: FrontmatterReport = {
    total: 0,
    withFrontmatter: 0,
    missing: [],
    invalid: [],
    errors: [],
  };

  for (const filePath of walkFiles(root, MARKDOWN_EXTENSIONS)) {
    result.total++;
    let content: string;
    try {
      content = readText(filePath);
    } catch (error) {
      result.errors.push({
        path: filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      result.missing.push(filePath);
      continue;
    }

    if (!hasFrontmatter(content)) {
      result.missing.push(filePath);
      continue;
    }
    result.withFrontmatter++;

    const reason = frontmatterYamlError(content);
    if (reason) {
      result.invalid.push({ path: filePath, reason });
    }
  }

  return result;
}

export function describeFrontmatterReport(result: FrontmatterReport): string[] {
  const lines = [
    `Scan complete. Looked at ${result.total} Markdown files.`,
    "",
    `Files with YAML frontmatter: ${result.withFrontmatter}`,
    `Files without YAML frontmatter: ${result.missing.length}`,
  ];
  if (result.missing.length > 0) {
    lines.push("", "Files missing frontmatter:", formatList(result.missing));
  }
  if (result.invalid.length > 0) {
    lines.push(
      "",
      "Files with unparseable frontmatter:",
      formatList(result.invalid.map((problem) => `${problem.path}: ${problem.reason}`))
    );
  }
  return lines;
}

if (isMainModule(import.meta.url)) {
  runCli(() => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log("Usage: md-check-frontmatter <folder>");
      return;
    }
    if (args.length !== 1) {
      throw malformedArgument("Usage: md-check-frontmatter <folder>");
    }
    const result = checkFrontmatter(args[0]);
    for (const problem of result.errors) {
      console.error(`Error reading file ${problem.path}: ${problem.reason}`);
    }
    report(describeFrontmatterReport(result));
  });
}
