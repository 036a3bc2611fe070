/**
 * Ribosomally synthesized peptides: precursors, crosslinks and RiPP types.
 */

import { z } from "zod";
import type { ValidationIssue } from "../../common/errors.js";
import { GeneId, GeneIdList, Location, LocationWire, validateLocation } from "../../common/primitives.js";
import type { CodingSequence } from "../../record/index.js";
import { cdsFor, compact, entity, Issues, nonEmpty, type ValidationContext } from "../../common/validation.js";

export const RIBOSOMAL_SUBCLASSES = ["RiPP", "unmodified"] as const;

export const RippType = z.enum([
  "Atropopeptide",
  "Biarylitide",
  "Bottromycin",
  "Borosin",
  "Crocagin",
  "Cyanobactin",
  "Cyptide",
  "Dikaritin",
  "Epipeptide",
  "Glycocin",
  "Guanidinotide",
  "Head-to-tail cyclized peptide",
  "Lanthipeptide",
  "LAP",
  "Lasso peptide",
  "Linaridin",
  "Methanobactin",
  "Microcin",
  "Microviridin",
  "Mycofactocin",
  "Pearlin",
  "Proteusin",
  "Ranthipeptide",
  "Rotapeptide",
  "Ryptide",
  "Sactipeptide",
  "Spliceotide",
  "Streptide",
  "Sulfatyrotide",
  "Thioamidide",
  "Thiopeptide",
  "other",
]);
export type RippType = z.infer<typeof RippType>;

// ═══════════════════════════════════════════════════════════════════════════
// CROSSLINKS
// ═══════════════════════════════════════════════════════════════════════════

export const CrosslinkWire = z.object({
  from: z.number().int(),
  to: z.number().int(),
  type: z.string().optional(),
  details: z.string().optional(),
});
export type CrosslinkWire = z.infer<typeof CrosslinkWire>;

/** Link between two residues of the core peptide */
export interface Crosslink {
  readonly begin: number;
  readonly end: number;
  readonly linkType?: string;
  readonly details?: string;
}

/**
 * Validate a crosslink, bounded by the translation of its precursor gene
 * when that is known.
 */
export function validateCrosslink(crosslink: Crosslink, cds?: CodingSequence): ValidationIssue[] {
  const issues = new Issues();
  issues.check(crosslink.begin >= 0, "from", "From must be greater than or equal to 0");
  issues.check(crosslink.end >= 0, "to", "To must be greater than or equal to 0");
  issues.check(crosslink.begin < crosslink.end, "from", "From must be less than to");
  if (cds) {
    issues.check(
      crosslink.begin < cds.translationLength,
      "from",
      "From must be less than the length of the CDS"
    );
    issues.check(
      crosslink.end <= cds.translationLength,
      "to",
      "To must be less than or equal to the length of the CDS"
    );
  }
  return issues.list();
}

export const Crosslink = entity<Crosslink, CrosslinkWire>({
  name: "crosslink",
  wire: CrosslinkWire,
  read: (raw) => compact({ begin: raw.from, end: raw.to, linkType: raw.type, details: raw.details }),
  encode: (crosslink) =>
    compact({
      from: crosslink.begin,
      to: crosslink.end,
      type: crosslink.linkType || undefined,
      details: crosslink.details || undefined,
    }),
  validate: (crosslink) => validateCrosslink(crosslink),
});

// ═══════════════════════════════════════════════════════════════════════════
// PRECURSORS
// ═══════════════════════════════════════════════════════════════════════════

export const PrecursorWire = z.object({
  gene: z.string(),
  core_sequence: z.string(),
  crosslinks: z.array(CrosslinkWire).optional(),
  leader_cleavage_location: LocationWire.optional(),
  follower_cleavage_location: LocationWire.optional(),
  recognition_motif: z.string().optional(),
});
export type PrecursorWire = z.infer<typeof PrecursorWire>;

export interface Precursor {
  readonly gene: GeneId;
  readonly coreSequence: string;
  readonly leaderCleavageLocation?: Location;
  readonly followerCleavageLocation?: Location;
  readonly crosslinks: readonly Crosslink[];
  readonly recognitionMotif?: string;
}

export const Precursor = entity<Precursor, PrecursorWire>({
  name: "precursor",
  wire: PrecursorWire,
  read: (raw) =>
    compact({
      gene: raw.gene,
      coreSequence: raw.core_sequence,
      leaderCleavageLocation: raw.leader_cleavage_location
        ? Location.read(raw.leader_cleavage_location)
        : undefined,
      followerCleavageLocation: raw.follower_cleavage_location
        ? Location.read(raw.follower_cleavage_location)
        : undefined,
      crosslinks: (raw.crosslinks ?? []).map(Crosslink.read),
      recognitionMotif: raw.recognition_motif,
    }),
  encode: (precursor) =>
    compact({
      gene: precursor.gene,
      core_sequence: precursor.coreSequence,
      crosslinks: nonEmpty(precursor.crosslinks.map(Crosslink.encode)),
      leader_cleavage_location: precursor.leaderCleavageLocation
        ? Location.encode(precursor.leaderCleavageLocation)
        : undefined,
      follower_cleavage_location: precursor.followerCleavageLocation
        ? Location.encode(precursor.followerCleavageLocation)
        : undefined,
      recognition_motif: precursor.recognitionMotif || undefined,
    }),
  validate: (precursor, ctx) => {
    const issues = new Issues();
    const cds = cdsFor(ctx, precursor.gene);
    issues.nested("gene", GeneId.validate(precursor.gene, ctx));
    issues.check(Boolean(precursor.coreSequence), "core_sequence", "Core sequence must not be empty");
    if (precursor.leaderCleavageLocation) {
      issues.nested("leader_cleavage_location", validateLocation(precursor.leaderCleavageLocation, ctx));
    }
    if (precursor.followerCleavageLocation) {
      issues.nested("follower_cleavage_location", validateLocation(precursor.followerCleavageLocation, ctx));
    }
    issues.each("crosslinks", precursor.crosslinks, (crosslink) => validateCrosslink(crosslink, cds));
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// PAYLOAD
// ═══════════════════════════════════════════════════════════════════════════

export interface RibosomalClassInfo {
  readonly kind: "ribosomal";
  readonly subclass: string;
  readonly rippType?: string;
  readonly details?: string;
  readonly precursors: readonly Precursor[];
  readonly peptidases: readonly GeneId[];
}

export const RibosomalClassWire = z.object({
  subclass: z.string(),
  precursors: z.array(PrecursorWire),
  ripp_type: z.string().optional(),
  details: z.string().optional(),
  peptidases: GeneIdList.optional(),
});
export type RibosomalClassWire = z.infer<typeof RibosomalClassWire>;

export function readRibosomalClass(raw: RibosomalClassWire): RibosomalClassInfo {
  return compact<RibosomalClassInfo>({
    kind: "ribosomal",
    subclass: raw.subclass,
    rippType: raw.ripp_type,
    details: raw.details,
    precursors: raw.precursors.map(Precursor.read),
    peptidases: raw.peptidases ?? [],
  });
}

export function encodeRibosomalClass(info: RibosomalClassInfo): RibosomalClassWire {
  return compact({
    subclass: info.subclass,
    precursors: info.precursors.map(Precursor.encode),
    ripp_type: info.rippType || undefined,
    details: info.details || undefined,
    peptidases: nonEmpty(info.peptidases),
  });
}

export function validateRibosomalClass(info: RibosomalClassInfo, ctx: ValidationContext): ValidationIssue[] {
  const issues = new Issues();
  issues.check(
    RIBOSOMAL_SUBCLASSES.some((subclass) => subclass === info.subclass),
    "subclass",
    `Subclass must be one of ${RIBOSOMAL_SUBCLASSES.join(", ")}`
  );
  if (info.subclass === "RiPP") {
    issues.check(
      RippType.safeParse(info.rippType).success,
      "ripp_type",
      `Invalid RiPP type: ${info.rippType ?? "none"}`
    );
    if (info.rippType === "other") {
      issues.check(Boolean(info.details), "details", "Details must be provided for 'other' RiPP types");
    }
  }
  issues.each("precursors", info.precursors, (precursor) => Precursor.validate(precursor, ctx));
  issues.each("peptidases", info.peptidases, (gene) => GeneId.validate(gene, ctx));
  return issues.list();
}
