#!/usr/bin/env node
/**
 * Recompress the JPEG images under a folder in place.
 *
 * Files smaller than --min-size are skipped, and a file is only overwritten
 * when the re-encoded image is actually smaller, so repeated runs do not keep
 * degrading quality.
 *
 * Usage:
 *   tsx scripts/md-reduce-images.ts <folder> [--quality 85] [--min-size 100]
 */
import * as fs from "fs";
import * as path from "path";
import sharp from "sharp";
import {
  formatMegabytes,
  formatPercent,
  isMainModule,
  report,
  runCli,
} from "./cli-output.js";
import { loadConfig } from "./md-config.js";
import { ioFailure, malformedArgument } from "./md-errors.js";
import { JPEG_EXTENSIONS, requireDirectory, walkFiles } from "./md-files.js";

export interface ReduceOptions {
  folder: string;
  quality?: number;
  minSizeKb?: number;
}

export interface ProcessedImage {
  path: string;
  originalBytes: number;
  newBytes: number;
}

export interface SkippedImage {
  path: string;
  reason: "below-min-size" | "no-improvement";
  originalBytes: number;
}

export interface ReduceResult {
  root: string;
  total: number;
  processed: ProcessedImage[];
  skipped: SkippedImage[];
  errors: Array<{ path: string; reason: string }>;
  originalBytes: number;
  newBytes: number;
}

export function validateQuality(quality: number): number {
  if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
    throw malformedArgument("Quality must be an integer between 1 and 100.");
  }
  return quality;
}

export async function recompressJpeg(input: Buffer, quality: number): Promise<Buffer> {
  const image = sharp(input);
  const metadata = await image.metadata();
  const pipeline = metadata.hasAlpha
    ? image.flatten({ background: "#ffffff" })
    : image;
  return pipeline.jpeg({ quality, optimizeCoding: true }).toBuffer();
}

export async function reduceImages(options: ReduceOptions): Promise<ReduceResult> {
  const root = requireDirectory(options.folder);
  const defaults = loadConfig().images;
  const quality = validateQuality(options.quality ?? defaults.quality);
  const minSizeKb = options.minSizeKb ?? defaults.minSizeKb;
  const minSizeBytes = minSizeKb * 1024;

  const result: ReduceResult = {
    root,
    total: 0,
    processed: [],
    skipped: [],
    errors: [],
    originalBytes: 0,
    newBytes: 0,
  };

  for (const imagePath of walkFiles(root, JPEG_EXTENSIONS)) {
    result.total++;
    try {
      const original = fs.readFileSync(imagePath);
      if (original.length < minSizeBytes) {
        result.skipped.push({
          path: imagePath,
          reason: "below-min-size",
          originalBytes: original.length,
        });
        continue;
      }

      const reduced = await recompressJpeg(original, quality);
      if (reduced.length >= original.length) {
        result.skipped.push({
          path: imagePath,
          reason: "no-improvement",
          originalBytes: original.length,
        });
        continue;
      }

      try {
        fs.writeFileSync(imagePath, reduced);
      } catch (error) {
        throw ioFailure("write", imagePath, error);
      }
      result.processed.push({
        path: imagePath,
        originalBytes: original.length,
        newBytes: reduced.length,
      });
      result.originalBytes += original.length;
      result.newBytes += reduced.length;
    } catch (error) {
      result.errors.push({
        path: imagePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}

export function describeReduce(result: ReduceResult, minSizeKb: number): string[] {
  const relative = (filePath: string) => path.relative(result.root, filePath);
  const lines: string[] = [];

  for (const skipped of result.skipped) {
    lines.push(
      skipped.reason === "below-min-size"
        ? `Skipped ${relative(skipped.path)} (size ${(skipped.originalBytes / 1024).toFixed(1)}KB < ${minSizeKb}KB)`
        : `Skipped ${relative(skipped.path)} (no size improvement)`
    );
  }
  for (const image of result.processed) {
    lines.push(
      `Processed ${relative(image.path)}: ${formatMegabytes(image.originalBytes)} -> ` +
        `${formatMegabytes(image.newBytes)} ` +
        `(${formatPercent(image.originalBytes - image.newBytes, image.originalBytes)} reduction)`
    );
  }

  lines.push(
    "",
    "--- Summary ---",
    `Total files found: ${result.total}`,
    `Files processed successfully: ${result.processed.length}`,
    `Files skipped: ${result.skipped.length}`
  );
  if (result.originalBytes > 0) {
    lines.push(
      `Total size reduction on processed files: ${formatMegabytes(result.originalBytes)} -> ` +
        `${formatMegabytes(result.newBytes)} ` +
        `(${formatPercent(result.originalBytes - result.newBytes, result.originalBytes)})`
    );
  }
  lines.push("Done.");
  return lines;
}

function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw malformedArgument(`${flag} expects an integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

export function parseArgs(args: string[]): ReduceOptions {
  const positional: string[] = [];
  const options: Omit<ReduceOptions, "folder"> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--quality" && args[i + 1]) {
      options.quality = validateQuality(parseInteger(arg, args[i + 1]));
      i++;
    } else if (arg === "--min-size" && args[i + 1]) {
      options.minSizeKb = parseInteger(arg, args[i + 1]);
      i++;
    } else if (arg.startsWith("-") && arg.length > 1) {
      throw malformedArgument(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw malformedArgument(
      "Usage: md-reduce-images <folder> [--quality 1-100] [--min-size KB]"
    );
  }
  return { folder: positional[0], ...options };
}

if (isMainModule(import.meta.url)) {
  runCli(async () => {
    const args = process.argv.slice(2);
    if (args.includes("--help") || args.includes("-h")) {
      console.log("Usage: md-reduce-images <folder> [--quality 1-100] [--min-size KB]");
      return;
    }
    const options = parseArgs(args);
    report(`Scanning for .jpg/.jpeg files in '${options.folder}' and its subdirectories...`);
    const result = await reduceImages(options);
    for (const problem of result.errors) {
      console.error(`Error processing ${problem.path}: ${problem.reason}`);
    }
    report(
      describeReduce(result, options.minSizeKb ?? loadConfig().images.minSizeKb)
    );
  });
}
