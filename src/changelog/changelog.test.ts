/**
 * Changelog Tests
 *
 * Run with: node --import tsx --test src/changelog/changelog.test.ts
 *
 * Covers:
 *   1. Release round trip and the optional date of "next"
 *   2. Contributor and tier-gated reviewer rules
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../common/errors.js";
import { SYSTEM_SUBMITTER } from "../common/primitives.js";
import { FULL_VALIDATION } from "../common/validation.js";
import { ChangeLog, Release, ReleaseEntry } from "./index.js";

const ENTRY = {
  contributors: [SYSTEM_SUBMITTER],
  reviewers: [SYSTEM_SUBMITTER],
  date: "2022-09-15",
  comment: "Migrated",
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      return err.issues.map((issue) => `${issue.field}: ${issue.message}`);
    }
    throw err;
  }
  assert.fail("Expected a ValidationError");
}

test("changelogs round-trip", () => {
  const raw = {
    releases: [
      { version: "3.0", date: "2022-09-15", entries: [ENTRY] },
      { version: "next", entries: [ENTRY] },
    ],
  };
  assert.deepEqual(ChangeLog.encode(ChangeLog.decode(raw, FULL_VALIDATION)), raw);
});

test("only the next release may lack a date", () => {
  assert.deepEqual(issuesOf(() => Release.decode({ version: "3.0", entries: [ENTRY] }, FULL_VALIDATION)), [
    "date: Date is required for published releases",
  ]);
});

test("releases need entries", () => {
  assert.deepEqual(issuesOf(() => Release.decode({ version: "next", entries: [] }, FULL_VALIDATION)), [
    "entries: At least one entry is required",
  ]);
});

test("reviewers may be missing only at questionable quality", () => {
  const raw = { ...ENTRY, reviewers: [] };
  assert.doesNotThrow(() => ReleaseEntry.decode(raw, { quality: "questionable" }));
  assert.deepEqual(issuesOf(() => ReleaseEntry.decode(raw, FULL_VALIDATION)), [
    "reviewers: At least one reviewer is required",
  ]);
});

test("contributors are validated submitter ids", () => {
  assert.deepEqual(
    issuesOf(() => ReleaseEntry.decode({ ...ENTRY, contributors: ["x"], comment: " " }, FULL_VALIDATION)),
    ["contributors[0]: invalid length", "comment: Comment must not be empty"]
  );
});
