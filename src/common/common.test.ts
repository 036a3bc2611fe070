/**
 * Shared Building Block Tests
 *
 * Run with: node --import tsx --test src/common/common.test.ts
 *
 * Covers:
 *   1. Citation parsing, validation and value equality
 *   2. Scalar identifiers, coordinates, versions and dates
 *   3. Evidence vocabularies and the prediction exemption
 *   4. Issue collection, error formatting and data files
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import {
  Citation,
  FULL_VALIDATION,
  Issues,
  Location,
  MibigError,
  MigrationError,
  NovelGeneId,
  OperonEvidence,
  ReleaseVersion,
  SubmitterID,
  SubstrateEvidence,
  ValidationError,
  compact,
  deepFreeze,
  joinField,
  loadDataFile,
  parseCitation,
  qualityRank,
  sanitizeIdentifier,
  uniqueCitations,
  validateCitationList,
  validateIsoDate,
} from "./index.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// CITATIONS
// ═══════════════════════════════════════════════════════════════════════════

test("citations split at the first colon", () => {
  assert.deepEqual(parseCitation("doi:10.1000/a:b"), { database: "doi", value: "10.1000/a:b" });
  assert.equal(Citation.encode(Citation.decode("pubmed:123", FULL_VALIDATION)), "pubmed:123");
});

test("citation databases and values are checked", () => {
  assert.deepEqual(issuesOf(() => Citation.decode("arxiv:1", FULL_VALIDATION)), [
    ": Invalid database type 'arxiv'",
  ]);
  assert.deepEqual(issuesOf(() => Citation.decode("pubmed:abc", FULL_VALIDATION)), [
    ": Invalid value 'abc' for database 'pubmed'",
  ]);
});

test("citations compare by value", () => {
  const refs = ["pubmed:2", "doi:10.1000/x", "pubmed:2"].map(parseCitation);
  assert.deepEqual(uniqueCitations(refs), [
    { database: "doi", value: "10.1000/x" },
    { database: "pubmed", value: "2" },
  ]);
});

test("citation lists may only be empty at questionable quality", () => {
  assert.deepEqual(validateCitationList([], { quality: "questionable" }), []);
  assert.deepEqual(validateCitationList([], FULL_VALIDATION), [
    { field: "", message: "At least one reference is required" },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// SCALARS
// ═══════════════════════════════════════════════════════════════════════════

test("gene ids reject whitespace and punctuation", () => {
  assert.deepEqual(issuesOf(() => NovelGeneId.decode("abc A", FULL_VALIDATION)), [": Invalid gene id 'abc A'"]);
  assert.deepEqual(issuesOf(() => NovelGeneId.decode("", FULL_VALIDATION)), [": Gene id must not be empty"]);
  assert.equal(sanitizeIdentifier("orf 1/2"), "orf12");
});

test("locations must be ordered", () => {
  assert.deepEqual(issuesOf(() => Location.decode({ from: 5, to: 2 }, FULL_VALIDATION)), [
    "to: End 2 must not be smaller than begin 5",
  ]);
});

test("submitter ids are 24 alphanumeric characters", () => {
  assert.deepEqual(issuesOf(() => SubmitterID.decode("short", FULL_VALIDATION)), [": invalid length"]);
  assert.deepEqual(issuesOf(() => SubmitterID.decode(`${"A".repeat(23)}!`, FULL_VALIDATION)), [
    ": invalid characters",
  ]);
});

test("release versions are dotted numbers or 'next'", () => {
  assert.doesNotThrow(() => ReleaseVersion.decode("next", FULL_VALIDATION));
  assert.doesNotThrow(() => ReleaseVersion.decode("3.1", FULL_VALIDATION));
  assert.deepEqual(issuesOf(() => ReleaseVersion.decode("v3", FULL_VALIDATION)), [": invalid version 'v3'"]);
});

test("dates must exist on the calendar", () => {
  assert.deepEqual(validateIsoDate("2022-10-07"), []);
  assert.deepEqual(validateIsoDate("2022-02-30"), [{ field: "", message: "Invalid date '2022-02-30'" }]);
  assert.deepEqual(validateIsoDate("07.10.2022"), [{ field: "", message: "Invalid date '07.10.2022'" }]);
});

test("quality levels are ordered", () => {
  assert.ok(qualityRank("questionable") < qualityRank("low"));
  assert.ok(qualityRank("medium") < qualityRank("high"));
});

// ═══════════════════════════════════════════════════════════════════════════
// EVIDENCE
// ═══════════════════════════════════════════════════════════════════════════

test("sequence-based predictions never need references", () => {
  const evidence = SubstrateEvidence.decode({ method: "Sequence-based prediction" }, { quality: "high" });
  assert.deepEqual(SubstrateEvidence.encode(evidence), { method: "Sequence-based prediction" });
});

test("evidence methods come from the kind's vocabulary", () => {
  assert.deepEqual(issuesOf(() => OperonEvidence.decode({ method: "Guessing" }, FULL_VALIDATION)), [
    "method: Invalid method 'Guessing'",
    "references: References are required for non-questionable entries",
  ]);
  assert.ok(OperonEvidence.methods.includes("RNAseq"));
});

// ═══════════════════════════════════════════════════════════════════════════
// PLUMBING
// ═══════════════════════════════════════════════════════════════════════════

test("field paths join names and indices", () => {
  assert.equal(joinField("", "x"), "x");
  assert.equal(joinField("a", 0), "a[0]");
  assert.equal(joinField("a[0]", "to"), "a[0].to");
  assert.equal(joinField("a", "[1].b"), "a[1].b");
  assert.equal(joinField("a", ""), "a");
});

test("issues collect nested and indexed violations", () => {
  const issues = new Issues()
    .check(false, "name", "Missing name")
    .nested("location", [{ field: "to", message: "bad" }])
    .each("genes", ["ok", "bad"], (gene) => (gene === "bad" ? [{ field: "", message: "unknown" }] : []))
    .list();
  assert.deepEqual(issues, [
    { field: "name", message: "Missing name" },
    { field: "location.to", message: "bad" },
    { field: "genes[1]", message: "unknown" },
  ]);
});

test("validation errors format every issue", () => {
  const error = new ValidationError(
    [
      { field: "a", message: "first" },
      { field: "", message: "second" },
    ],
    "thing"
  );
  assert.ok(error instanceof MibigError);
  assert.equal(error.message, "Invalid thing: 2 validation errors");
  assert.equal(error.format(), "Invalid thing: 2 validation errors\n  - a: first\n  - (root): second");
});

test("migration errors keep the offending value", () => {
  const error = new MigrationError("Unknown biosynthetic class: Alkaloids", "Alkaloids");
  assert.equal(error.name, "MigrationError");
  assert.equal(error.value, "Alkaloids");
});

test("compact drops undefined keys and deepFreeze freezes the tree", () => {
  assert.deepEqual(compact({ a: 1, b: undefined }), { a: 1 });
  const value = deepFreeze({ outer: { inner: [1] } });
  assert.ok(Object.isFrozen(value.outer.inner));
});

test("data files are found by walking up from the sources", () => {
  const substrates = loadDataFile("proteinogenic-substrates.json", z.record(z.string(), z.string()));
  assert.equal(substrates["glycine"], "NCC(=O)O");
  assert.throws(() => loadDataFile("missing.json", z.unknown()), {
    name: "MibigError",
    message: "Data file not found: missing.json",
  });
});
