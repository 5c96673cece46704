import { test } from "node:test";
import assert from "node:assert/strict";

import {
  extractFrontmatter,
  hasFrontmatter,
  joinLines,
  splitDelimitedFrontmatter,
  splitLines,
  stripFrontmatter,
} from "../scripts/md-frontmatter.js";

test("splitLines and joinLines round-trip text byte for byte", () => {
  const samples = ["", "a", "a\n", "a\r\nb\r\n", "\n\n|x|\n"];
  for (const sample of samples) {
    assert.equal(joinLines(splitLines(sample)), sample);
  }
});

test("extractFrontmatter separates a closed block", () => {
  const lines = splitLines("---\ntitle: Daily\n---\n# Body\n");
  const { frontmatter, body } = extractFrontmatter(lines);
  assert.deepEqual(frontmatter, ["---", "title: Daily", "---"]);
  assert.deepEqual(body, ["# Body", ""]);
});

test("extractFrontmatter ignores trailing whitespace on delimiters", () => {
  const { frontmatter, body } = extractFrontmatter(["---  ", "a: 1", "---\r", "x"]);
  assert.deepEqual(frontmatter, ["---  ", "a: 1", "---\r"]);
  assert.deepEqual(body, ["x"]);
});

test("extractFrontmatter treats an unclosed block as body", () => {
  const lines = ["---", "title: Open", "| a | b |"];
  const { frontmatter, body } = extractFrontmatter(lines);
  assert.deepEqual(frontmatter, []);
  assert.deepEqual(body, lines);
});

test("extractFrontmatter requires the delimiter on the first line", () => {
  const lines = ["", "---", "a: 1", "---"];
  assert.deepEqual(extractFrontmatter(lines), { frontmatter: [], body: lines });
  assert.deepEqual(extractFrontmatter([]), { frontmatter: [], body: [] });
});

test("hasFrontmatter needs both delimiters", () => {
  assert.equal(hasFrontmatter("---\na: 1\n---\n"), true);
  assert.equal(hasFrontmatter(" ---\na: 1\n---\n"), true);
  assert.equal(hasFrontmatter("---\na: 1\n"), false);
  assert.equal(hasFrontmatter("# Title\n---\n---\n"), false);
});

test("stripFrontmatter drops the block and leading blank lines", () => {
  assert.equal(stripFrontmatter("---\na: 1\n---\n\n\nBody\n"), "Body\n");
  assert.equal(stripFrontmatter("No frontmatter\n"), "No frontmatter\n");
});

test("splitDelimitedFrontmatter splits on the first two delimiters", () => {
  assert.deepEqual(splitDelimitedFrontmatter("---\na: 1\n---\nbody"), {
    inner: "\na: 1\n",
    rest: "\nbody",
  });
  assert.equal(splitDelimitedFrontmatter("body\n---\n---\n"), undefined);
  assert.equal(splitDelimitedFrontmatter("---\nonly opening\n"), undefined);
});
