/**
 * Biosynthesis Aggregate Tests
 *
 * Run with: node --import tsx --test src/biosynthesis/biosynthesis.test.ts
 *
 * Covers:
 *   1. Class payloads, their wire form and the questionable-tier waiver
 *   2. Precursors and crosslinks bounded by the record
 *   3. The path step grammar
 *   4. Aggregate rules and derived views
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../common/errors.js";
import { FULL_VALIDATION } from "../common/validation.js";
import { CodingSequence, InMemoryRecord } from "../record/index.js";
import {
  Biosynthesis,
  BiosynthesisClass,
  Crosslink,
  Glycosyltransferase,
  Path,
  Precursor,
  UNMIGRATED_GT_SPECIFICITY,
  biosynthesisReferences,
  formatSteps,
  genesReferenced,
  parseSteps,
  stepModules,
  validateSteps,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const NRPS_CLASS = {
  class: "NRPS",
  subclass: "Type I",
  release_types: [{ name: "Macrolactonization", references: ["pubmed:111"] }],
  thioesterases: [{ type: "thioesterase", gene: "abcT", location: { from: 0, to: 250 }, subtype: "Type I" }],
};

const BIOSYNTHESIS = {
  classes: [{ class: "OTHER", subclass: "other", details: "converted" }],
  modules: [{ type: "other", name: "M1", genes: ["abcB", "abcA"], active: true, subtype: "hybrid" }],
  operons: [{ genes: ["abcA", "abcC"], evidence: [{ method: "RNAseq", references: ["pubmed:2"] }] }],
  paths: [
    {
      products: [{ name: "x" }],
      steps: "abcA > [M1]",
      references: ["doi:10.1000/p1", "pubmed:1"],
      isSubcluster: false,
      producesPrecursor: false,
    },
  ],
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

// ═══════════════════════════════════════════════════════════════════════════
// CLASSES
// ═══════════════════════════════════════════════════════════════════════════

test("NRPS class round-trips with release types and thioesterases", () => {
  const value = BiosynthesisClass.decode(NRPS_CLASS, FULL_VALIDATION);
  assert.equal(value.class, "NRPS");
  assert.deepEqual(BiosynthesisClass.encode(value), NRPS_CLASS);
});

test("class payload rules are waived at questionable quality", () => {
  const raw = { class: "PKS", subclass: "Unknown", cyclases: [] };
  assert.doesNotThrow(() => BiosynthesisClass.decode(raw, { quality: "questionable" }));
  assert.deepEqual(issuesOf(() => BiosynthesisClass.decode(raw, FULL_VALIDATION)), [
    "subclass: Invalid subclass: Unknown",
  ]);
});

test("other class with subclass 'other' needs details", () => {
  assert.deepEqual(
    issuesOf(() => BiosynthesisClass.decode({ class: "OTHER", subclass: "other" }, FULL_VALIDATION)),
    ["details: Missing details for subclass 'other'"]
  );
});

test("RiPP class requires a known RiPP type", () => {
  assert.deepEqual(
    issuesOf(() =>
      BiosynthesisClass.decode({ class: "ribosomal", subclass: "RiPP", precursors: [] }, FULL_VALIDATION)
    ),
    ["ripp_type: Invalid RiPP type: none"]
  );
});

test("unknown class tag fails structurally", () => {
  const issues = issuesOf(() => BiosynthesisClass.decode({ class: "Alkaloid" }, FULL_VALIDATION));
  assert.equal(issues.length, 1);
  assert.ok(issues[0]?.startsWith("class: "));
});

test("unmigrated glycosyltransferase specificity is a valid structure", () => {
  const gt = Glycosyltransferase.create(
    { gene: "gtfA", evidence: [], specificity: UNMIGRATED_GT_SPECIFICITY },
    FULL_VALIDATION
  );
  assert.deepEqual(Glycosyltransferase.encode(gt), { gene: "gtfA", evidence: [], specificity: "[To][Do]" });
});

// ═══════════════════════════════════════════════════════════════════════════
// PRECURSORS
// ═══════════════════════════════════════════════════════════════════════════

test("crosslinks must be ordered", () => {
  assert.deepEqual(issuesOf(() => Crosslink.decode({ from: 5, to: 5 }, FULL_VALIDATION)), [
    "from: From must be less than to",
  ]);
});

test("crosslinks are bounded by the precursor translation", () => {
  const record = new InMemoryRecord({
    id: "NC_000002.1",
    seqLen: 5000,
    cdses: [new CodingSequence({ locusTag: "ripA", translation: "MKVLAAC" })],
  });
  const raw = { gene: "ripA", core_sequence: "LAAC", crosslinks: [{ from: 3, to: 9, type: "lanthionine" }] };
  assert.deepEqual(issuesOf(() => Precursor.decode(raw, { record })), [
    "crosslinks[0].to: To must be less than or equal to the length of the CDS",
  ]);
  const fitting = Precursor.decode({ ...raw, crosslinks: [{ from: 3, to: 7 }] }, { record });
  assert.deepEqual(Precursor.encode(fitting), { gene: "ripA", core_sequence: "LAAC", crosslinks: [{ from: 3, to: 7 }] });
});

// ═══════════════════════════════════════════════════════════════════════════
// STEP GRAMMAR
// ═══════════════════════════════════════════════════════════════════════════

test("steps split on '>' into stages and ',' into items", () => {
  const steps = parseSteps("orfA,orfB >  [M1] + orfC");
  assert.deepEqual(steps, [["orfA", "orfB"], ["[M1] + orfC"]]);
  assert.equal(formatSteps(steps), "orfA, orfB > [M1] + orfC");
});

test("canonical step strings round-trip exactly", () => {
  const text = "orfA, orfB > orfC > [M2] | orfD";
  assert.equal(formatSteps(parseSteps(text)), text);
});

test("empty items and items holding a separator are rejected", () => {
  assert.deepEqual(validateSteps(parseSteps("orfA, > orfB")), [
    { field: "steps[0][1]", message: "Empty step item" },
  ]);
  assert.deepEqual(validateSteps([["orfA>orfB"]]), [
    { field: "steps[0][0]", message: "Step item 'orfA>orfB' contains a separator" },
  ]);
});

test("a path needs products", () => {
  const raw = { ...BIOSYNTHESIS.paths[0], products: [] };
  assert.deepEqual(issuesOf(() => Path.decode(raw, FULL_VALIDATION)), ["products: Missing products"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// AGGREGATE
// ═══════════════════════════════════════════════════════════════════════════

test("biosynthesis round-trips and omits empty lists", () => {
  const biosynthesis = Biosynthesis.decode(BIOSYNTHESIS, { quality: "questionable" });
  assert.deepEqual(Biosynthesis.encode(biosynthesis), BIOSYNTHESIS);

  const bare = Biosynthesis.decode({ classes: BIOSYNTHESIS.classes }, { quality: "questionable" });
  assert.deepEqual(Biosynthesis.encode(bare), { classes: BIOSYNTHESIS.classes });
});

test("at least one class is required", () => {
  assert.deepEqual(issuesOf(() => Biosynthesis.decode({ classes: [] }, { quality: "questionable" })), [
    "classes: At least one class is required",
  ]);
});

test("path steps may name modules the aggregate does not list", () => {
  const raw = {
    classes: BIOSYNTHESIS.classes,
    paths: [{ ...BIOSYNTHESIS.paths[0], steps: "[modA] > orfC" }],
  };
  const biosynthesis = Biosynthesis.decode(raw, FULL_VALIDATION);
  assert.deepEqual(biosynthesis.modules, []);
  assert.deepEqual(stepModules(biosynthesis.paths[0]?.steps ?? []), ["modA"]);
  assert.deepEqual(Biosynthesis.encode(biosynthesis), raw);
});

test("derived gene and citation views are deduplicated and sorted", () => {
  const biosynthesis = Biosynthesis.decode(BIOSYNTHESIS, { quality: "questionable" });
  assert.deepEqual(genesReferenced(biosynthesis), ["abcA", "abcB", "abcC"]);
  assert.deepEqual(biosynthesisReferences(biosynthesis), [
    { database: "doi", value: "10.1000/p1" },
    { database: "pubmed", value: "1" },
    { database: "pubmed", value: "2" },
  ]);
});
