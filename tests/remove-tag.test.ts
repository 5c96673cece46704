import { test } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { isMdToolError } from "../scripts/md-errors.js";
import {
  describeRemoveTag,
  normalizeTag,
  removeTag,
  removeTagInFolder,
} from "../scripts/md-remove-tag.js";

test("normalizeTag strips a leading hash and rejects empty tags", () => {
  assert.equal(normalizeTag("#project"), "project");
  assert.equal(normalizeTag(" project "), "project");
  assert.throws(
    () => normalizeTag(" # "),
    (error: unknown) => isMdToolError(error) && error.kind === "malformed-argument"
  );
});

test("removeTag clears frontmatter list items and body hashtags", () => {
  const content = [
    "---",
    "tags:",
    "  - project",
    '  - "#Project"',
    "  - keep",
    "---",
    "Body #project and #project/sub and #project-log",
    "#PROJECT at start",
    "",
  ].join("\n");

  const result = removeTag(content, "project");
  assert.equal(result.count, 4);
  assert.equal(
    result.text,
    [
      "---",
      "tags:",
      "  - keep",
      "---",
      "Body  and #project/sub and #project-log",
      " at start",
      "",
    ].join("\n")
  );
});

test("removeTag edits inline tag lists", () => {
  const result = removeTag('---\ntags: [project, "#project", other]\n---\nText\n', "#project");
  assert.deepEqual(result, { text: "---\ntags: [other]\n---\nText\n", count: 2 });
});

test("removeTag leaves plain words and documents without the tag alone", () => {
  const content = "---\ntitle: project plan\n---\nThe project is on track.\n";
  assert.deepEqual(removeTag(content, "project"), { text: content, count: 0 });
  assert.deepEqual(removeTag("a #x b", "x"), { text: "a  b", count: 1 });
});

test("removeTag treats accented and non-Latin letters as part of the tag", () => {
  const text = "Notes #café and #задача\n";
  assert.deepEqual(removeTag(text, "caf"), { text, count: 0 });
  assert.deepEqual(removeTag("Notes #задача\n", "зад"), {
    text: "Notes #задача\n",
    count: 0,
  });
  assert.deepEqual(removeTag("Готово #задача и #ЗАДАЧА\n", "задача"), {
    text: "Готово  и \n",
    count: 2,
  });
});

test("removeTagInFolder rewrites only files that had the tag", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mdtidy-tag-"));
  try {
    const tagged = path.join(dir, "a.md");
    const plain = path.join(dir, "b.md");
    fs.writeFileSync(tagged, "Call mum #todo\n", "utf-8");
    fs.writeFileSync(plain, "Nothing to do\n", "utf-8");

    const result = removeTagInFolder(dir, "#todo");
    assert.deepEqual(result, {
      tag: "todo",
      scanned: 2,
      modified: [{ path: tagged, count: 1 }],
      errors: [],
    });
    assert.equal(fs.readFileSync(tagged, "utf-8"), "Call mum \n");
    assert.equal(fs.readFileSync(plain, "utf-8"), "Nothing to do\n");

    assert.deepEqual(describeRemoveTag(result), [
      "- Removed 1 instance(s) of 'todo' from a.md",
      "",
      "Scan complete.",
      "Looked at 2 Markdown files.",
      "Removed tag '#todo' from 1 files.",
    ]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
