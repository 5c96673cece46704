/**
 * Optional per-project defaults, read from `mdtidy.config.yaml` in the working
 * directory or from the path in MDTIDY_CONFIG. CLI flags override these.
 */
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { malformedArgument } from "./md-errors.js";

export const CONFIG_FILENAME = "mdtidy.config.yaml";

const tablesSchema = z.object({
  strictness: z.enum(["loose", "strict"]).optional(),
});

const datesSchema = z.object({
  outputFormat: z.string().min(1).optional(),
  inputFormats: z.array(z.string().min(1)).optional(),
});

const imagesSchema = z.object({
  quality: z.number().int().min(1).max(100).default(85),
  minSizeKb: z.number().min(0).default(100),
});

const configSchema = z.object({
  tables: tablesSchema.default({}),
  dates: datesSchema.default({}),
  images: imagesSchema.default({}),
});

export type MdTidyConfig = z.infer<typeof configSchema>;

export function defaultConfig(): MdTidyConfig {
  return configSchema.parse({});
}

export function resolveConfigPath(cwd = process.cwd()): string {
  const override = process.env.MDTIDY_CONFIG;
  if (override) {
    return path.resolve(cwd, override);
  }
  return path.join(cwd, CONFIG_FILENAME);
}

export function parseConfig(content: string, source: string): MdTidyConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw malformedArgument(`Invalid YAML in ${source}: ${detail}`);
  }

  // An empty file loads as undefined.
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw malformedArgument(`Invalid config in ${source}: ${issues}`);
  }
  return result.data;
}

export function loadConfig(cwd = process.cwd()): MdTidyConfig {
  const configPath = resolveConfigPath(cwd);
  if (!fs.existsSync(configPath)) {
    if (process.env.MDTIDY_CONFIG) {
      throw malformedArgument(`Config file from MDTIDY_CONFIG not found: ${configPath}`);
    }
    return defaultConfig();
  }
  return parseConfig(fs.readFileSync(configPath, "utf-8"), configPath);
}
