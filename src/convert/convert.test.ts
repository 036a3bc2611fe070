/**
 * Legacy Migration Tests
 *
 * Run with: node --import tsx --test src/convert/convert.test.ts
 *
 * Covers:
 *   1. Entry-level fields: version, quality, status, completeness, loci, taxonomy
 *   2. Class mapping, including Alkaloid and the "other" block
 *   3. PKS modules, domain tables and module types
 *   4. NRPS modules across genes and skipped modules
 *   5. Genes, operons and the prediction filter
 *   6. Determinism and the v4 round trip of migrated entries
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { MigrationError } from "../common/errors.js";
import { SYSTEM_SUBMITTER } from "../common/primitives.js";
import { FULL_VALIDATION } from "../common/validation.js";
import { MibigEntry } from "../entry/index.js";
import { readLegacyDocument } from "../legacy/index.js";
import type { Logger } from "../logging/index.js";
import { ALKALOID_DETAILS, UNDETAILED_OTHER } from "./classes.js";
import { convertLegacyEntry } from "./entry.js";
import { convertATSubstrate, convertPksDomain } from "./pks.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

interface LoggedLine {
  readonly level: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

function recordingLogger(): { logger: Logger; lines: LoggedLine[] } {
  const lines: LoggedLine[] = [];
  const record = (level: string) => (message: string, context?: Record<string, unknown>) => {
    lines.push(context ? { level, message, context } : { level, message });
  };
  return {
    lines,
    logger: { debug: record("debug"), info: record("info"), warn: record("warn"), error: record("error") },
  };
}

const SUBMITTER = "B".repeat(24);

function legacyDocument(cluster: Record<string, unknown> = {}, extra: Record<string, unknown> = {}): unknown {
  return {
    cluster: {
      biosyn_class: ["Other"],
      mibig_accession: "BGC0000001",
      organism_name: "Streptomyces testus",
      ncbi_tax_id: "1901",
      loci: {
        accession: "NC_000001.1",
        completeness: "complete",
        start_coord: 1,
        end_coord: 5000,
        evidence: ["Knock-out studies"],
      },
      compounds: [{ compound: "testomycin", database_id: ["pubchem:12345"], mol_mass: 512.3 }],
      ...cluster,
    },
    changelog: [{ version: "1.0", comments: ["Submitted"], contributors: [SUBMITTER] }],
    ...extra,
  };
}

function convert(raw: unknown, logger: Logger = recordingLogger().logger): MibigEntry {
  return convertLegacyEntry(readLegacyDocument(raw), { logger });
}

function migrationMessage(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof MigrationError) {
      return err.message;
    }
    throw err;
  }
  assert.fail("Expected a MigrationError");
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY FIELDS
// ═══════════════════════════════════════════════════════════════════════════

test("a minimal legacy document becomes a questionable entry", () => {
  const entry = convert(legacyDocument());
  assert.equal(entry.accession, "BGC0000001");
  assert.equal(entry.version, 2);
  assert.equal(entry.quality, "questionable");
  assert.equal(entry.status, "active");
  assert.equal(entry.completeness, "complete");
  assert.deepEqual(entry.taxonomy, { name: "Streptomyces testus", ncbiTaxId: 1901 });
  assert.deepEqual(entry.loci, [
    {
      accession: "NC_000001.1",
      location: { begin: 1, end: 5000 },
      evidence: [{ method: "Knock-out studies", references: [] }],
    },
  ]);
  assert.equal(entry.genes, undefined);
  assert.ok(Object.isFrozen(entry));
});

test("the changelog is rebuilt with the system as reviewer", () => {
  const entry = convert(
    legacyDocument({}, { changelog: [{ version: "1.0", comments: ["Fixed typo", "Added data"], contributors: [SUBMITTER] }] })
  );
  assert.deepEqual(entry.changelog.releases[0]?.entries, [
    { contributors: [SUBMITTER], reviewers: [SYSTEM_SUBMITTER], date: "2015-06-12", comment: "Fixed typo" },
    { contributors: [SUBMITTER], reviewers: [SYSTEM_SUBMITTER], date: "2015-06-12", comment: "Added data" },
  ]);
});

test("compounds keep their name, database ids and mass", () => {
  const [compound] = convert(legacyDocument()).compounds;
  assert.equal(compound?.name, "testomycin");
  assert.deepEqual(compound?.evidence, []);
  assert.deepEqual(compound?.databases, [{ database: "pubchem", identifier: "12345" }]);
  assert.equal(compound?.mass, 512.3);
});

test("legacy completeness values map onto the current levels", () => {
  const loci = (completeness: string) => ({ accession: "NC_000001.1", completeness });
  assert.equal(convert(legacyDocument({ loci: loci("incomplete") })).completeness, "partial");
  assert.equal(convert(legacyDocument({ loci: loci("Unknown") })).completeness, "unknown");
  assert.equal(migrationMessage(() => convert(legacyDocument({ loci: loci("mostly") }))), "Unknown completeness: mostly");
});

test("missing coordinates become zero", () => {
  const entry = convert(legacyDocument({ loci: { accession: "NC_000001.1", completeness: "complete" } }));
  assert.deepEqual(entry.loci[0]?.location, { begin: 0, end: 0 });
  assert.deepEqual(entry.loci[0]?.evidence, []);
});

test("retirement reasons are only kept for retired entries", () => {
  const reasons = ["Duplicate of BGC0000002"];
  const retired = convert(legacyDocument({ status: "retired", retirement_reasons: reasons }));
  assert.deepEqual(retired.retirementReasons, reasons);
  const active = convert(legacyDocument({ status: "active", retirement_reasons: reasons }));
  assert.deepEqual(active.retirementReasons, []);
});

test("see-also links and the document comment are carried over", () => {
  const entry = convert(legacyDocument({ see_also: ["BGC0000002"] }, { comments: "Legacy note" }));
  assert.deepEqual(entry.seeAlso, ["BGC0000002"]);
  assert.equal(entry.comment, "Legacy note");
});

test("entry-level legacy values outside the current vocabulary fail", () => {
  assert.equal(migrationMessage(() => convert(legacyDocument({ status: "archived" }))), "Unknown status: archived");
  assert.equal(migrationMessage(() => convert(legacyDocument({ ncbi_tax_id: "12a" }))), "Invalid NCBI tax id: 12a");
  assert.equal(migrationMessage(() => convert(legacyDocument({ loci: undefined }))), "Entry BGC0000001 has no loci");
});

test("numeric tax ids are taken as they are", () => {
  assert.equal(convert(legacyDocument({ ncbi_tax_id: 42 })).taxonomy.ncbiTaxId, 42);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLASSES
// ═══════════════════════════════════════════════════════════════════════════

test("an Alkaloid class becomes OTHER with its origin as details", () => {
  const entry = convert(legacyDocument({ biosyn_class: ["Alkaloid"] }));
  assert.deepEqual(entry.biosynthesis.classes, [
    { class: "OTHER", info: { kind: "OTHER", subclass: "other", details: ALKALOID_DETAILS } },
  ]);
});

test("the legacy other block decides the OTHER subclass", () => {
  const phenazine = convert(legacyDocument({ other: { subclass: "Phenazine" } }));
  assert.deepEqual(phenazine.biosynthesis.classes[0]?.info, { kind: "OTHER", subclass: "phenazine" });
  const unknown = convert(legacyDocument({ other: { subclass: "Unknown" } }));
  assert.deepEqual(unknown.biosynthesis.classes[0]?.info, {
    kind: "OTHER",
    subclass: "other",
    details: UNDETAILED_OTHER,
  });
});

test("terpene blocks carry their subclass, genes and precursor", () => {
  const entry = convert(
    legacyDocument({
      biosyn_class: ["Terpene"],
      terpene: {
        carbon_count_subclass: "Sesquiterpene",
        prenyltransferases: ["terA"],
        terpene_synth_cycl: ["terB"],
        terpene_precursor: "FPP",
      },
    })
  );
  assert.deepEqual(entry.biosynthesis.classes[0]?.info, {
    kind: "TERPENE",
    subclass: "Sesquiterpene",
    prenyltransferases: ["terA"],
    synthases: ["terB"],
    precursor: "FPP",
  });
});

test("RiPP subclasses in the type list give typed RiPPs", () => {
  const entry = convert(
    legacyDocument({
      biosyn_class: ["RiPP"],
      ripp: {
        subclass: "Bottromycin",
        peptidases: ["ripB"],
        precursor_genes: [
          {
            gene_id: "ripA",
            core_sequence: ["GPV", "VFD"],
            leader_sequence: "MKT",
            crosslinks: [{ crosslink_type: "thioether", first_AA: 1, second_AA: 4 }],
          },
        ],
      },
    })
  );
  const info = entry.biosynthesis.classes[0]?.info;
  if (info?.kind !== "ribosomal") {
    assert.fail("Expected a ribosomal class");
  }
  assert.equal(info.subclass, "RiPP");
  assert.equal(info.rippType, "Bottromycin");
  assert.deepEqual(info.peptidases, ["ripB"]);
  assert.deepEqual(info.precursors, [
    {
      gene: "ripA",
      coreSequence: "GPVVFD",
      crosslinks: [{ begin: 1, end: 4, linkType: "thioether" }],
      leaderCleavageLocation: { begin: 2, end: 3 },
    },
  ]);
});

test("saccharide glycosyltransferases drop predictions and get the placeholder specificity", () => {
  const entry = convert(
    legacyDocument({
      biosyn_class: ["Saccharide"],
      saccharide: {
        subclass: "hybrid/tailoring",
        glycosyltransferases: [{ gene_id: "gtfA", evidence: ["Sequence-based prediction", "Knock-out construct"] }],
        sugar_subclusters: [["sugA", "sugB"]],
      },
    })
  );
  const info = entry.biosynthesis.classes[0]?.info;
  if (info?.kind !== "saccharide") {
    assert.fail("Expected a saccharide class");
  }
  assert.deepEqual(info.glycosyltransferases[0]?.evidence, [{ method: "Knock-out construct", references: [] }]);
  assert.deepEqual(info.subclusters, [{ genes: ["sugA", "sugB"], references: [] }]);
});

test("unknown legacy classes fail", () => {
  assert.equal(
    migrationMessage(() => convert(legacyDocument({ biosyn_class: ["Fungal"] }))),
    "Unknown biosynthetic class: Fungal"
  );
});

test("class conversion is logged with the legacy subclass", () => {
  const { logger, lines } = recordingLogger();
  convert(legacyDocument({ other: { subclass: "Phenazine" } }), logger);
  assert.ok(
    lines.some(
      (line) =>
        line.level === "debug" &&
        line.message === "Converting biosynthetic class" &&
        line.context?.["class"] === "Other (Phenazine)"
    )
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// PKS
// ═══════════════════════════════════════════════════════════════════════════

function polyketide(module: Record<string, unknown>, subclasses = ["Modular type I"]): Record<string, unknown> {
  return {
    biosyn_class: ["Polyketide"],
    polyketide: { subclasses, synthases: [{ genes: ["pksA"], modules: [{ genes: ["pksA"], ...module }] }] },
  };
}

test("a module with AT and KS becomes a modular PKS module without modifications", () => {
  const entry = convert(
    legacyDocument(
      polyketide({
        module_number: "1",
        domains: ["Acyltransferase", "Ketosynthase"],
        at_specificities: ["Malonyl-CoA"],
        evidence: "Sequence-based prediction",
      })
    )
  );
  assert.deepEqual(entry.biosynthesis.classes[0]?.info, { kind: "PKS", subclass: "Type I", cyclases: [] });
  const [module] = entry.biosynthesis.modules;
  if (module?.info.kind !== "pks-modular") {
    assert.fail("Expected a modular PKS module");
  }
  assert.equal(module.type, "pks-modular");
  assert.equal(module.name, "1");
  assert.deepEqual(module.genes, ["pksA"]);
  assert.equal(module.active, true);
  assert.deepEqual(module.info.modificationDomains, []);
  assert.deepEqual(module.info.carriers, []);
  assert.equal(module.info.ksDomain.type, "ketosynthase");
  assert.deepEqual(module.info.atDomain.info, {
    kind: "acyltransferase",
    substrates: [{ name: "malonyl-CoA" }],
    evidence: [],
  });
  assert.deepEqual(module.info.atDomain.location, { begin: -1, end: -1 });
});

test("carriers become ACP domains and the rest goes through the domain table", () => {
  const entry = convert(
    legacyDocument(
      polyketide({
        module_number: "2",
        domains: ["Ketosynthase", "Thiolation (ACP/PCP)", "Ketoreductase"],
        pks_mod_doms: [" Dehydratase "],
        kr_stereochem: "L-OH",
      })
    )
  );
  const [module] = entry.biosynthesis.modules;
  if (module?.info.kind !== "pks-trans-at") {
    assert.fail("Expected a trans-AT module");
  }
  assert.deepEqual(
    module.info.carriers.map((domain) => domain.info),
    [{ kind: "carrier", subtype: "ACP", betaBranching: false, references: [], evidence: [] }]
  );
  assert.deepEqual(
    module.info.modificationDomains.map((domain) => domain.type),
    ["ketoreductase", "dehydratase"]
  );
  assert.deepEqual(module.info.modificationDomains[0]?.info, {
    kind: "ketoreductase",
    stereochemistry: "A",
    evidence: [],
  });
});

test("module types follow the presence of AT and KS", () => {
  const typeOf = (domains: string[]) =>
    convert(legacyDocument(polyketide({ module_number: "1", domains: [...domains, "Thiolation (ACP/PCP)"] })))
      .biosynthesis.modules[0]?.type;
  assert.equal(typeOf(["Acyltransferase"]), "pks-modular-starter");
  assert.equal(typeOf(["Ketosynthase"]), "pks-trans-at");
  assert.equal(typeOf([]), "pks-trans-at-starter");
});

test("unnumbered PKS modules are named in order of appearance", () => {
  const entry = convert(
    legacyDocument({
      biosyn_class: ["Polyketide"],
      polyketide: {
        subclasses: ["Type I"],
        synthases: [
          {
            genes: ["pksA"],
            modules: [
              { genes: ["pksA"], domains: ["Ketosynthase"] },
              { genes: ["pksA"], domains: ["Ketosynthase"] },
            ],
          },
        ],
      },
    })
  );
  assert.deepEqual(
    entry.biosynthesis.modules.map((module) => module.name),
    ["Unk01", "Unk02"]
  );
});

test("the PKS subclass falls back to the synthase, then to Unknown", () => {
  const subclassOf = (synthaseSubclass: string[]) => {
    const entry = convert(
      legacyDocument({
        biosyn_class: ["Polyketide"],
        polyketide: {
          subclasses: ["Macrolide"],
          synthases: [{ genes: ["pksA"], subclass: synthaseSubclass, modules: [] }],
        },
      })
    );
    const info = entry.biosynthesis.classes[0]?.info;
    return info?.kind === "PKS" ? info.subclass : undefined;
  };
  assert.equal(subclassOf(["Type II aromatic"]), "Type II aromatic");
  assert.equal(subclassOf(["Iterative"]), "Unknown");
});

test("PKS domain names outside the table fail", () => {
  assert.equal(
    migrationMessage(() => convertPksDomain("Frobnicase", "pksA")),
    "Unknown PKS domain type 'Frobnicase'"
  );
  assert.equal(convertPksDomain("AFSA", "pksA").info.kind, "other");
});

test("AT substrates outside the vocabulary are kept as details", () => {
  assert.deepEqual(convertATSubstrate("Methylmalonyl-CoA"), { name: "methylmalonyl-CoA" });
  assert.deepEqual(convertATSubstrate("Propionyl-CoA"), { name: "other", details: "propionyl-CoA" });
});

// ═══════════════════════════════════════════════════════════════════════════
// NRPS
// ═══════════════════════════════════════════════════════════════════════════

const NRP = {
  release_type: ["Macrolactonization", "Unknown"],
  thioesterases: [{ gene: "nrpC", thioesterase_type: "Unknown" }],
  nrps_genes: [
    {
      gene_id: "nrpA",
      modules: [
        {
          module_number: "1",
          c_dom_subtype: "LCL",
          modification_domains: ["N-methylation", "Epimerization"],
          a_substr_spec: {
            proteinogenic: ["Valine"],
            evidence: ["Activity assay", "Sequence-based prediction"],
            publications: ["pubmed:123"],
          },
        },
        { a_substr_spec: { nonproteinogenic: ["ornithine"], epimerized: true } },
      ],
    },
    { gene_id: "nrpB", modules: [{ module_number: "1" }, { module_number: "3" }] },
  ],
};

test("NRPS modules are merged across genes and unnumbered ones are named", () => {
  const entry = convert(legacyDocument({ biosyn_class: ["NRP"], nrp: NRP }));
  const modules = entry.biosynthesis.modules;
  assert.deepEqual(
    modules.map((module) => [module.type, module.name, module.genes]),
    [
      ["nrps-type1", "1", ["nrpA", "nrpB"]],
      ["nrps-type1", "Unk01", ["nrpA"]],
    ]
  );
});

test("a module number repeated on the same gene lists that gene once", () => {
  const nrp = {
    nrps_genes: [
      {
        gene_id: "nrpA",
        modules: [{ module_number: "1", a_substr_spec: { proteinogenic: ["Valine"] } }, { module_number: "1" }],
      },
    ],
  };
  const entry = convert(legacyDocument({ biosyn_class: ["NRP"], nrp }));
  assert.deepEqual(
    entry.biosynthesis.modules.map((module) => [module.name, module.genes]),
    [["1", ["nrpA"]]]
  );
});

test("NRPS module domains come from the specificity and modification list", () => {
  const entry = convert(legacyDocument({ biosyn_class: ["NRP"], nrp: NRP }));
  const [first, second] = entry.biosynthesis.modules;
  if (first?.info.kind !== "nrps" || second?.info.kind !== "nrps") {
    assert.fail("Expected NRPS modules");
  }
  const aDomain = first.info.aDomain.info;
  if (aDomain.kind !== "adenylation") {
    assert.fail("Expected an adenylation payload");
  }
  assert.deepEqual(
    aDomain.substrates.map((substrate) => [substrate.name, substrate.proteinogenic]),
    [["valine", true]]
  );
  assert.deepEqual(aDomain.evidence, [{ method: "Activity assay", references: [{ database: "pubmed", value: "123" }] }]);
  assert.deepEqual(first.info.cDomain?.info, { kind: "condensation", subtype: "LCL", references: [], evidence: [] });
  assert.deepEqual(first.info.modificationDomains.map((domain) => domain.info), [
    { kind: "methyltransferase", subtype: "N" },
  ]);
  assert.deepEqual(
    second.info.modificationDomains.map((domain) => domain.type),
    ["epimerase"]
  );
});

test("NRPS class payload drops placeholder release types", () => {
  const entry = convert(legacyDocument({ biosyn_class: ["NRP"], nrp: NRP }));
  const info = entry.biosynthesis.classes[0]?.info;
  if (info?.kind !== "NRPS") {
    assert.fail("Expected an NRPS class");
  }
  assert.equal(info.subclass, "Type I");
  assert.deepEqual(info.releaseTypes, [{ name: "Macrolactonization", references: [] }]);
  assert.deepEqual(info.thioesterases.map((domain) => [domain.gene, domain.info]), [
    ["nrpC", { kind: "thioesterase" }],
  ]);
});

test("modules without specificity are skipped with a warning", () => {
  const { logger, lines } = recordingLogger();
  convert(legacyDocument({ biosyn_class: ["NRP"], nrp: NRP }), logger);
  assert.deepEqual(
    lines.filter((line) => line.level === "warn"),
    [{ level: "warn", message: "Missing specificity for NRPS module 3, skipping it", context: { gene: "nrpB" } }]
  );
});

test("unsupported NRPS modification domains fail", () => {
  const nrp = {
    nrps_genes: [
      { gene_id: "nrpA", modules: [{ module_number: "1", modification_domains: ["Halogenation"], a_substr_spec: {} }] },
    ],
  };
  assert.equal(
    migrationMessage(() => convert(legacyDocument({ biosyn_class: ["NRP"], nrp }))),
    "Unsupported NRPS modification domain Halogenation"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// GENES
// ═══════════════════════════════════════════════════════════════════════════

const GENES = {
  annotations: [
    {
      id: "abcA",
      name: "abcA/orf7",
      product: "ABC transporter",
      domains: [{ name: "AMP-binding", location: { begin: 10, end: 400 }, substrates: [{ name: "Alanine" }] }],
    },
  ],
  extra_genes: [{ id: "extra1", location: { exons: [{ start: 10, end: 100 }], strand: -1 }, translation: "MKV" }],
  operons: [{ genes: ["abcA", "abcB"], evidence: ["Sequence-based prediction"] }],
};

test("operon predictions are dropped from the migrated evidence", () => {
  const entry = convert(legacyDocument({ genes: GENES }));
  assert.deepEqual(entry.biosynthesis.operons, [{ genes: ["abcA", "abcB"], evidence: [] }]);
});

test("annotations split their aliases and keep adenylation domains", () => {
  const annotation = convert(legacyDocument({ genes: GENES })).genes?.annotations[0];
  assert.equal(annotation?.name, "abcA");
  assert.deepEqual(annotation?.aliases, ["orf7"]);
  assert.equal(annotation?.product, "ABC transporter");
  const domain = annotation?.domains[0];
  assert.equal(domain?.type, "amp-binding");
  assert.equal(domain?.gene, "abcA");
  assert.deepEqual(domain?.location, { begin: 10, end: 400 });
  if (domain?.info.kind !== "adenylation") {
    assert.fail("Expected an adenylation payload");
  }
  assert.deepEqual(
    domain.info.substrates.map((substrate) => [substrate.name, substrate.proteinogenic]),
    [["Alanine", true]]
  );
});

test("extra genes become additions", () => {
  const genes = convert(legacyDocument({ genes: GENES })).genes;
  assert.deepEqual(genes?.toAdd, [
    { id: "extra1", location: { exons: [{ begin: 10, end: 100 }], strand: -1 }, translation: "MKV" },
  ]);
  assert.deepEqual(genes?.toDelete, []);
});

test("gene domains other than adenylation fail", () => {
  const genes = {
    annotations: [{ id: "abcA", domains: [{ name: "Thioesterase", location: { begin: 1, end: 50 } }] }],
  };
  assert.equal(
    migrationMessage(() => convert(legacyDocument({ genes }))),
    "Domain conversion for Thioesterase not implemented"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// DETERMINISM
// ═══════════════════════════════════════════════════════════════════════════

test("conversion is deterministic", () => {
  const raw = legacyDocument({ biosyn_class: ["NRP", "Other"], nrp: NRP, genes: GENES });
  assert.deepEqual(MibigEntry.encode(convert(raw)), MibigEntry.encode(convert(raw)));
});

test("a migrated entry survives the v4 round trip", () => {
  const encoded = MibigEntry.encode(convert(legacyDocument({ genes: GENES })));
  const decoded = MibigEntry.decode(JSON.parse(JSON.stringify(encoded)), FULL_VALIDATION);
  assert.deepEqual(MibigEntry.encode(decoded), encoded);
});
