import { test } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { linkCandidates, pruneDeadLinks, runPruneLinks } from "../scripts/md-prune-links.js";

test("linkCandidates drops aliases and headings", () => {
  assert.deepEqual(linkCandidates("Alpha"), ["Alpha.md"]);
  assert.deepEqual(linkCandidates("Alpha|the first"), ["Alpha.md"]);
  assert.deepEqual(linkCandidates("Alpha#Section"), ["Alpha.md"]);
  assert.deepEqual(linkCandidates("Alpha\\|cell alias"), ["Alpha.md"]);
  assert.deepEqual(linkCandidates("notes.md"), ["notes.md"]);
  assert.deepEqual(linkCandidates("#Heading"), []);
});

test("linkCandidates tries dotted names as attachments and notes", () => {
  assert.deepEqual(linkCandidates("diagram.png"), ["diagram.png", "diagram.png.md"]);
  assert.deepEqual(linkCandidates("v1.2 notes"), ["v1.2 notes", "v1.2 notes.md"]);
});

test("pruneDeadLinks unwraps every occurrence of a missing target", () => {
  const existing = new Set(["Alpha.md", "v1.2 notes.md"]);
  const text =
    "See [[Alpha]] and [[Missing|alias]] and [[Missing|alias]] and " +
    "[[#Heading]] and [[img.png]] and [[v1.2 notes]].";

  const result = pruneDeadLinks(text, (target) => existing.has(target));
  assert.deepEqual(result.removed, ["Missing|alias", "img.png"]);
  assert.equal(
    result.text,
    "See [[Alpha]] and Missing|alias and Missing|alias and " +
      "[[#Heading]] and img.png and [[v1.2 notes]]."
  );
});

test("pruneDeadLinks keeps escaped pipes inside table cells", () => {
  const result = pruneDeadLinks("| [[Gone\\|G]] | [[Alpha#Section]] |", (target) =>
    target === "Alpha.md"
  );
  assert.equal(result.text, "| Gone\\|G | [[Alpha#Section]] |");
});

test("runPruneLinks checks targets beside the note and writes only on change", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mdtidy-prune-"));
  try {
    const note = path.join(dir, "note.md");
    fs.writeFileSync(path.join(dir, "other.md"), "# Other\n", "utf-8");
    fs.writeFileSync(note, "Links: [[other]] [[ghost]]\n", "utf-8");

    const first = runPruneLinks(note);
    assert.deepEqual(first, { path: note, removed: ["ghost"], changed: true });
    assert.equal(fs.readFileSync(note, "utf-8"), "Links: [[other]] ghost\n");

    const second = runPruneLinks(note);
    assert.deepEqual(second, { path: note, removed: [], changed: false });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
