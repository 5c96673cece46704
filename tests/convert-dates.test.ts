import { test } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import {
  convertDateFormat,
  makeDate,
  parseArgs,
  parseInputFamilies,
  runConvertDates,
  strftime,
} from "../scripts/md-convert-dates.js";
import { isMdToolError } from "../scripts/md-errors.js";

const SAMPLE = [
  "Met on December 30, 2024.",
  "Paid 30.12.2024",
  "Logged 2024-12-30",
  "Shipped 12-30-2024",
].join("\n");

test("makeDate rejects impossible calendar dates", () => {
  assert.deepEqual(makeDate(2024, 2, 29), { year: 2024, month: 2, day: 29 });
  assert.equal(makeDate(2023, 2, 29), undefined);
  assert.equal(makeDate(2024, 13, 1), undefined);
  assert.equal(makeDate(2024, 4, 31), undefined);
});

test("strftime covers the supported directives", () => {
  const date = { year: 2024, month: 12, day: 30 };
  assert.equal(strftime(date, "%d %b %Y"), "30 Dec 2024");
  assert.equal(strftime(date, "%A, %B %d"), "Monday, December 30");
  assert.equal(strftime(date, "%a %y %j"), "Mon 24 365");
  assert.equal(strftime({ year: 2024, month: 1, day: 5 }, "[%e]"), "[ 5]");
  assert.equal(strftime(date, "100%% %q"), "100% %q");
});

test("dates before year 100 keep their own calendar", () => {
  assert.equal(strftime({ year: 1, month: 1, day: 1 }, "%A %j %Y"), "Monday 001 0001");
  assert.equal(strftime({ year: 4, month: 12, day: 31 }, "%j"), "366");
  assert.equal(convertDateFormat("January 1, 0000"), "January 1, 0000");
  assert.equal(convertDateFormat("January 1, 0001"), "0001-01-01");
});

test("convertDateFormat rewrites every family to ISO by default", () => {
  assert.equal(
    convertDateFormat(SAMPLE),
    [
      "Met on 2024-12-30.",
      "Paid 2024-12-30",
      "Logged 2024-12-30",
      "Shipped 2024-12-30",
    ].join("\n")
  );
});

test("convertDateFormat accepts shorthand output formats", () => {
  assert.equal(
    convertDateFormat(SAMPLE, "DD.MM.YYYY"),
    [
      "Met on 30.12.2024.",
      "Paid 30.12.2024",
      "Logged 30.12.2024",
      "Shipped 30.12.2024",
    ].join("\n")
  );
  assert.equal(convertDateFormat("On May 4, 2025", "MM-DD"), "On 05-04");
});

test("convertDateFormat leaves invalid dates untouched", () => {
  const text = "February 30, 2024 and 13-01-2024 and 31.04.2024";
  assert.equal(convertDateFormat(text), text);
});

test("convertDateFormat reads dashed dates with a four-digit year last as month first", () => {
  assert.equal(convertDateFormat("01-02-2024"), "2024-01-02");
});

test("convertDateFormat only applies the selected input families", () => {
  assert.equal(
    convertDateFormat("2024-12-30 and 30.12.2024", "DD.MM.YYYY", ["YYYY-MM-DD"]),
    "30.12.2024 and 30.12.2024"
  );
  assert.equal(
    convertDateFormat("December 30, 2024", "YYYY-MM-DD", ["DD.MM.YYYY"]),
    "December 30, 2024"
  );
});

test("parseInputFamilies expands all and rejects unknown names", () => {
  assert.equal(parseInputFamilies(undefined).length, 4);
  assert.equal(parseInputFamilies(["all"]).length, 4);
  assert.deepEqual(parseInputFamilies(["DD.MM.YYYY"]), ["DD.MM.YYYY"]);
  assert.throws(
    () => parseInputFamilies(["someday"]),
    (error: unknown) => isMdToolError(error) && error.kind === "malformed-argument"
  );
});

test("parseArgs tells bare formats from output paths", () => {
  assert.deepEqual(parseArgs(["notes.md", "DD.MM.YYYY", "out/notes.md"]), {
    file: "notes.md",
    format: "DD.MM.YYYY",
    output: "out/notes.md",
  });
  assert.deepEqual(parseArgs(["notes.md", "-i", "YYYY-MM-DD", "-i", "DD.MM.YYYY"]), {
    file: "notes.md",
    inputFormats: ["YYYY-MM-DD", "DD.MM.YYYY"],
  });
  assert.throws(() => parseArgs(["notes.md", "-o"]), /requires a file path/);
  assert.throws(() => parseArgs([]), /Usage: md-convert-dates/);
});

test("runConvertDates writes the output file and reports changes", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mdtidy-dates-"));
  try {
    const file = path.join(dir, "journal.md");
    const output = path.join(dir, "journal-iso.md");
    fs.writeFileSync(file, "Started March 3, 2021\n", "utf-8");

    const result = runConvertDates({ file, output, format: "%d/%m/%Y" });
    assert.deepEqual(result, { outputPath: output, changed: true });
    assert.equal(fs.readFileSync(output, "utf-8"), "Started 03/03/2021\n");
    assert.equal(fs.readFileSync(file, "utf-8"), "Started March 3, 2021\n");

    const again = runConvertDates({ file: output });
    assert.deepEqual(again, { outputPath: output, changed: false });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
