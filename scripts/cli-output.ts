import * as fs from "fs";
import { pathToFileURL } from "url";
import { isMdToolError } from "./md-errors.js";

export function normalizeError(error: unknown): string {
  // Expected failures read better without a stack.
  if (isMdToolError(error)) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.stack || error.message;
  }
  return String(error);
}

export function formatCodeBlock(text: string): string {
  return `\`\`\`\n${text}\n\`\`\``;
}

export function formatCliError(error: unknown, label = "Error"): string {
  return `${label}:\n${formatCodeBlock(normalizeError(error))}`;
}

export function formatCliMessage(label: string, message: string): string {
  return `${label}:\n${formatCodeBlock(message)}`;
}

export function formatList(items: string[], bullet = "-"): string {
  return items.map((item) => `${bullet} ${item}`).join("\n");
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(2)}MB`;
}

export function formatPercent(part: number, whole: number): string {
  if (whole === 0) {
    return "0.0%";
  }
  return `${((part / whole) * 100).toFixed(1)}%`;
}

function isQuiet(): boolean {
  return process.env.MDTIDY_QUIET === "1";
}

/** Print a success report unless MDTIDY_QUIET=1. */
export function report(lines: string | string[]): void {
  if (isQuiet()) {
    return;
  }
  const text = Array.isArray(lines) ? lines.join("\n") : lines;
  console.log(text);
}

export function reportError(error: unknown, label = "Error"): void {
  console.error(formatCliError(error, label));
}

export function reportWarning(message: string): void {
  console.error(formatCliMessage("Warning", message));
}

/**
 * True when the module at `moduleUrl` is the process entry point, including
 * when it is launched through an npm bin symlink.
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return moduleUrl === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return moduleUrl === pathToFileURL(entry).href;
  }
}

/** Run a CLI body, printing failures and mapping them to exit code 1. */
export function runCli(body: () => void | Promise<void>): void {
  Promise.resolve()
    .then(body)
    .catch((error: unknown) => {
      reportError(error);
      process.exitCode = 1;
    });
}
