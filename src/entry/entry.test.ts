/**
 * Entry Aggregate Tests
 *
 * Run with: node --import tsx --test src/entry/entry.test.ts
 *
 * Covers:
 *   1. Wire round trip of a minimal entry
 *   2. Version, status and accession rules
 *   3. The entry's quality tier reaching every nested entity
 *   4. Locus and taxonomy cross-checks against a record
 *   5. The combined citation view of an entry
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../common/errors.js";
import { FULL_VALIDATION } from "../common/validation.js";
import { SYSTEM_SUBMITTER } from "../common/primitives.js";
import { InMemoryRecord } from "../record/index.js";
import { Locus, MibigEntry, MibigEntryWire, entryReferences } from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const ENTRY = {
  accession: "BGC0000001",
  version: 2,
  changelog: {
    releases: [
      {
        version: "1.0",
        date: "2015-06-12",
        entries: [
          {
            contributors: [SYSTEM_SUBMITTER],
            reviewers: [SYSTEM_SUBMITTER],
            date: "2015-06-12",
            comment: "Submitted",
          },
        ],
      },
    ],
  },
  quality: "questionable",
  status: "active",
  completeness: "complete",
  loci: [{ accession: "NC_000001.1", location: { from: 0, to: 1000 }, evidence: [{ method: "Knock-out studies" }] }],
  biosynthesis: { classes: [{ class: "OTHER", subclass: "other", details: "converted" }] },
  compounds: [{ name: "testomycin", evidence: [] }],
  taxonomy: { name: "Streptomyces testus", ncbiTaxId: 1 },
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
// WIRE FORM
// ═══════════════════════════════════════════════════════════════════════════

test("a minimal entry round-trips and omits unset optionals", () => {
  const entry = MibigEntry.decode(ENTRY, FULL_VALIDATION);
  assert.equal(entry.genes, undefined);
  assert.deepEqual(entry.seeAlso, []);
  assert.deepEqual(MibigEntry.encode(entry), ENTRY);
});

test("the wire schema accepts the encoded form of a decoded entry", () => {
  const encoded = MibigEntry.encode(MibigEntry.decode(ENTRY, FULL_VALIDATION));
  assert.deepEqual(MibigEntryWire.parse(encoded), ENTRY);
  assert.equal(MibigEntryWire.safeParse({ ...ENTRY, taxonomy: undefined }).success, false);
});

test("unknown quality levels fail structurally", () => {
  const issues = issuesOf(() => MibigEntry.decode({ ...ENTRY, quality: "great" }, FULL_VALIDATION));
  assert.equal(issues.length, 1);
  assert.ok(issues[0]?.startsWith("quality: "));
});

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY RULES
// ═══════════════════════════════════════════════════════════════════════════

test("version must follow the changelog length", () => {
  assert.deepEqual(issuesOf(() => MibigEntry.decode({ ...ENTRY, version: 3 }, FULL_VALIDATION)), [
    "version: Version 3 does not match the changelog, expected 2",
  ]);
});

test("retired entries need retirement reasons", () => {
  assert.deepEqual(issuesOf(() => MibigEntry.decode({ ...ENTRY, status: "retired" }, FULL_VALIDATION)), [
    "retirement_reasons: Retirement reasons must be provided for retired entries",
  ]);
  const retired = { ...ENTRY, status: "retired", retirement_reasons: ["duplicate"] };
  assert.deepEqual(MibigEntry.encode(MibigEntry.decode(retired, FULL_VALIDATION)), retired);
});

test("accession and loci are required", () => {
  assert.deepEqual(
    issuesOf(() => MibigEntry.decode({ ...ENTRY, accession: "BGC01", loci: [] }, FULL_VALIDATION)),
    ["accession: Invalid accession: BGC01", "loci: At least one locus is required"]
  );
});

test("the entry's own quality tier governs nested evidence", () => {
  assert.deepEqual(issuesOf(() => MibigEntry.decode({ ...ENTRY, quality: "high" }, FULL_VALIDATION)), [
    "loci[0].evidence[0].references: References are required for non-questionable entries",
    "compounds[0].evidence: Missing evidence",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// RECORD CROSS-CHECKS
// ═══════════════════════════════════════════════════════════════════════════

test("locus and taxonomy are compared with the record", () => {
  const record = new InMemoryRecord({
    id: "NC_000001.1",
    seqLen: 500,
    cdses: [],
    organism: "Streptomyces testus",
    ncbiTaxId: 2,
  });
  assert.deepEqual(issuesOf(() => MibigEntry.decode(ENTRY, { record })), [
    "loci[0].location.to: End 1000 exceeds record length 500",
    "taxonomy.ncbiTaxId: NCBI Tax ID mismatch: 1 != 2",
  ]);
});

test("without a record, accessions may hold one dot unless minted locally", () => {
  const locus = (accession: string) => ({ accession, location: { from: 0, to: 10 }, evidence: [] });
  assert.doesNotThrow(() => Locus.decode(locus("AB123456.1"), FULL_VALIDATION));
  assert.doesNotThrow(() => Locus.decode(locus("MIBIG.AB.1"), FULL_VALIDATION));
  assert.deepEqual(issuesOf(() => Locus.decode(locus("AB.12.3"), FULL_VALIDATION)), [
    "accession: Invalid accession AB.12.3",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// REFERENCES
// ═══════════════════════════════════════════════════════════════════════════

test("entry references merge every subtree, deduplicated and sorted", () => {
  const cited = {
    ...ENTRY,
    loci: [
      {
        accession: "NC_000001.1",
        location: { from: 0, to: 1000 },
        evidence: [{ method: "Knock-out studies", references: ["pubmed:7", "doi:10.1000/locus"] }],
      },
    ],
    biosynthesis: {
      classes: ENTRY.biosynthesis.classes,
      paths: [
        {
          products: [{ name: "x" }],
          steps: "abcA",
          references: ["pubmed:7"],
          isSubcluster: false,
          producesPrecursor: false,
        },
      ],
    },
    compounds: [{ name: "testomycin", evidence: [{ method: "NMR", references: ["pubmed:12"] }] }],
    genes: {
      annotations: [
        {
          id: "abcA",
          functions: [{ function: { name: "Transport" }, evidence: [{ method: "Knock-out", references: ["pubmed:7"] }] }],
        },
      ],
    },
  };
  assert.deepEqual(entryReferences(MibigEntry.decode(cited, FULL_VALIDATION)), [
    { database: "doi", value: "10.1000/locus" },
    { database: "pubmed", value: "12" },
    { database: "pubmed", value: "7" },
  ]);
});

test("an entry without citations has no references", () => {
  assert.deepEqual(entryReferences(MibigEntry.decode(ENTRY, FULL_VALIDATION)), []);
});
