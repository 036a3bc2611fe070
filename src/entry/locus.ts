/**
 * Where a cluster sits and which organism it comes from.
 */

import { z } from "zod";
import { EvidenceWire, LocusEvidence } from "../common/evidence.js";
import { Location, LocationWire, validateLocation } from "../common/primitives.js";
import { entity, Issues } from "../common/validation.js";

/** Prefix of accessions minted for sequences that were never deposited */
export const MIBIG_ACCESSION_PREFIX = "MIBIG.";

// ═══════════════════════════════════════════════════════════════════════════
// LOCUS
// ═══════════════════════════════════════════════════════════════════════════

export const LocusWire = z.object({
  accession: z.string(),
  location: LocationWire,
  evidence: z.array(EvidenceWire),
});
export type LocusWire = z.infer<typeof LocusWire>;

export interface Locus {
  /** Nucleotide accession of the reference record, with version */
  readonly accession: string;
  readonly location: Location;
  readonly evidence: readonly LocusEvidence[];
}

export const Locus = entity<Locus, LocusWire>({
  name: "locus",
  wire: LocusWire,
  read: (raw) => ({
    accession: raw.accession,
    location: Location.read(raw.location),
    evidence: raw.evidence.map(LocusEvidence.read),
  }),
  encode: (locus) => ({
    accession: locus.accession,
    location: Location.encode(locus.location),
    evidence: locus.evidence.map(LocusEvidence.encode),
  }),
  validate: (locus, ctx) => {
    const issues = new Issues();
    const record = ctx.record;
    if (record) {
      issues.check(
        record.id === locus.accession,
        "accession",
        `Accession mismatch: ${locus.accession} != ${record.id}`
      );
    } else {
      const dots = locus.accession.split(".").length - 1;
      issues.check(
        dots <= 1 || locus.accession.startsWith(MIBIG_ACCESSION_PREFIX),
        "accession",
        `Invalid accession ${locus.accession}`
      );
    }
    issues.nested("location", validateLocation(locus.location, ctx));
    if (record) {
      issues.check(
        locus.location.end <= record.seqLen,
        "location.to",
        `End ${locus.location.end} exceeds record length ${record.seqLen}`
      );
    }
    issues.each("evidence", locus.evidence, (evidence) => LocusEvidence.validate(evidence, ctx));
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// TAXONOMY
// ═══════════════════════════════════════════════════════════════════════════

export const TaxonomyWire = z.object({
  name: z.string(),
  ncbiTaxId: z.number().int(),
});
export type TaxonomyWire = z.infer<typeof TaxonomyWire>;

export interface Taxonomy {
  readonly name: string;
  readonly ncbiTaxId: number;
}

export const Taxonomy = entity<Taxonomy, TaxonomyWire>({
  name: "taxonomy",
  wire: TaxonomyWire,
  read: (raw) => ({ name: raw.name, ncbiTaxId: raw.ncbiTaxId }),
  encode: (taxonomy) => ({ name: taxonomy.name, ncbiTaxId: taxonomy.ncbiTaxId }),
  validate: (taxonomy, ctx) => {
    const issues = new Issues();
    issues.check(Boolean(taxonomy.name), "name", "Missing organism name");
    const record = ctx.record;
    // only attributes the record actually carries are compared
    if (record?.organism !== undefined) {
      issues.check(
        record.organism === taxonomy.name,
        "name",
        `Name mismatch: ${taxonomy.name} != ${record.organism}`
      );
    }
    if (record?.ncbiTaxId !== undefined) {
      issues.check(
        record.ncbiTaxId === taxonomy.ncbiTaxId,
        "ncbiTaxId",
        `NCBI Tax ID mismatch: ${taxonomy.ncbiTaxId} != ${record.ncbiTaxId}`
      );
    }
    return issues.list();
  },
});
