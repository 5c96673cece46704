import { test } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import {
  CONFIG_FILENAME,
  defaultConfig,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from "../scripts/md-config.js";
import { isMdToolError } from "../scripts/md-errors.js";

function withConfigEnv(value: string | undefined, run: () => void): void {
  const previous = process.env.MDTIDY_CONFIG;
  if (value === undefined) {
    delete process.env.MDTIDY_CONFIG;
  } else {
    process.env.MDTIDY_CONFIG = value;
  }
  try {
    run();
  } finally {
    if (previous === undefined) {
      delete process.env.MDTIDY_CONFIG;
    } else {
      process.env.MDTIDY_CONFIG = previous;
    }
  }
}

test("defaultConfig fills image defaults and leaves the rest unset", () => {
  assert.deepEqual(defaultConfig(), {
    tables: {},
    dates: {},
    images: { quality: 85, minSizeKb: 100 },
  });
});

test("parseConfig merges partial files over the defaults", () => {
  assert.deepEqual(
    parseConfig("tables:\n  strictness: loose\nimages:\n  quality: 70\n", "test.yaml"),
    {
      tables: { strictness: "loose" },
      dates: {},
      images: { quality: 70, minSizeKb: 100 },
    }
  );
  assert.deepEqual(
    parseConfig("dates:\n  outputFormat: DD.MM.YYYY\n  inputFormats: [YYYY-MM-DD]\n", "test.yaml")
      .dates,
    { outputFormat: "DD.MM.YYYY", inputFormats: ["YYYY-MM-DD"] }
  );
  assert.deepEqual(parseConfig("", "test.yaml"), defaultConfig());
});

test("parseConfig rejects bad YAML and out-of-range values", () => {
  const malformed = (pattern: RegExp) => (error: unknown) =>
    isMdToolError(error) && error.kind === "malformed-argument" && pattern.test(error.message);

  assert.throws(
    () => parseConfig("tables: [unclosed", "test.yaml"),
    malformed(/^Invalid YAML in test\.yaml: /)
  );
  assert.throws(
    () => parseConfig("images:\n  quality: 0\n", "test.yaml"),
    malformed(/^Invalid config in test\.yaml: images\.quality: /)
  );
  assert.throws(
    () => parseConfig("tables:\n  strictness: fuzzy\n", "test.yaml"),
    malformed(/^Invalid config in test\.yaml: tables\.strictness: /)
  );
});

test("loadConfig reads the project file or falls back to defaults", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mdtidy-config-"));
  try {
    withConfigEnv(undefined, () => {
      assert.equal(resolveConfigPath(dir), path.join(dir, CONFIG_FILENAME));
      assert.deepEqual(loadConfig(dir), defaultConfig());

      fs.writeFileSync(path.join(dir, CONFIG_FILENAME), "images:\n  minSizeKb: 0\n", "utf-8");
      assert.deepEqual(loadConfig(dir).images, { quality: 85, minSizeKb: 0 });
    });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("MDTIDY_CONFIG points at another file, which must exist", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mdtidy-config-"));
  try {
    fs.writeFileSync(path.join(dir, "custom.yaml"), "tables:\n  strictness: strict\n", "utf-8");

    withConfigEnv("custom.yaml", () => {
      assert.equal(resolveConfigPath(dir), path.join(dir, "custom.yaml"));
      assert.equal(loadConfig(dir).tables.strictness, "strict");
    });

    withConfigEnv("missing.yaml", () => {
      assert.throws(
        () => loadConfig(dir),
        (error: unknown) =>
          isMdToolError(error) &&
          error.message ===
            `Config file from MDTIDY_CONFIG not found: ${path.join(dir, "missing.yaml")}`
      );
    });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
