import * as fs from "fs";
import * as path from "path";
import { ioFailure, notFound } from "./md-errors.js";

export const MARKDOWN_EXTENSIONS = [".md"];
export const JPEG_EXTENSIONS = [".jpg", ".jpeg"];

/** Recursively list files with one of `extensions` (case-insensitive), sorted. */
export function walkFiles(rootDir: string, extensions: string[]): string[] {
  const entries = fs.readdirSync(rootDir, { withFileTypes: true });
  const results: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(rootDir, entry.name);
    if (entry.isDirectory()) {
      results.push(...walkFiles(fullPath, extensions));
    } else if (entry.isFile()) {
      const ext = path.extname(entry.name).toLowerCase();
      if (extensions.includes(ext)) {
        results.push(fullPath);
      }
    }
  }
  return results.sort();
}

export function requireDirectory(dir: string): string {
  const resolved = path.resolve(dir);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw notFound(resolved, "Directory");
  }
  return resolved;
}

export function requireFile(filePath: string): string {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw notFound(resolved);
  }
  return resolved;
}

export function readText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw ioFailure("read", filePath, error);
  }
}

export function writeText(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, "utf-8");
  } catch (error) {
    throw ioFailure("write", filePath, error);
  }
}
