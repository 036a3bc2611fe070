/**
 * Self-validating scalar types: gene identifiers, coordinates, chemical
 * structures, submitter ids, release versions and dates.
 */

import { z } from "zod";
import type { ValidationIssue } from "./errors.js";
import { entity, isRelaxed, Issues, type ValidationContext } from "./validation.js";
import type { CodingSequence } from "../record/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// GENE IDENTIFIERS
// ═══════════════════════════════════════════════════════════════════════════

/** Characters that never appear in a gene identifier */
export const INVALID_ID_CHARS = /[!?,;:=+*&^%$#@ \t\n\r\\/[\]{}()<>|~`'"]/;

const INVALID_ID_CHARS_GLOBAL = new RegExp(INVALID_ID_CHARS.source, "g");

/**
 * Remove every character that is not allowed in a gene identifier.
 */
export function sanitizeIdentifier(identifier: string): string {
  return identifier.replace(INVALID_ID_CHARS_GLOBAL, "");
}

function validateNovelGeneId(id: string): ValidationIssue[] {
  if (!id) {
    return [{ field: "", message: "Gene id must not be empty" }];
  }
  if (INVALID_ID_CHARS.test(id)) {
    return [{ field: "", message: `Invalid gene id '${id}'` }];
  }
  return [];
}

/**
 * Identifier of a gene that may not exist in any deposited record yet.
 */
export type NovelGeneId = string;
export const NovelGeneId = entity<NovelGeneId, string>({
  name: "gene id",
  wire: z.string(),
  read: (raw) => raw,
  encode: (id) => id,
  validate: (id) => validateNovelGeneId(id),
});

/**
 * Identifier of a gene that must resolve in the reference record, when one
 * is supplied.
 */
export type GeneId = string;
export const GeneId = entity<GeneId, string>({
  name: "gene id",
  wire: z.string(),
  read: (raw) => raw,
  encode: (id) => id,
  validate: (id, ctx) => {
    const issues = validateNovelGeneId(id);
    if (issues.length === 0 && ctx.record && !ctx.record.hasCds(id)) {
      issues.push({ field: "", message: `Gene '${id}' not found in record ${ctx.record.id}` });
    }
    return issues;
  },
});

export const GeneIdList = z.array(z.string());

// ═══════════════════════════════════════════════════════════════════════════
// LOCATION
// ═══════════════════════════════════════════════════════════════════════════

export const LocationWire = z.object({
  from: z.number().int(),
  to: z.number().int(),
});
export type LocationWire = z.infer<typeof LocationWire>;

/**
 * Integer interval [begin, end) over a sequence or translation.
 */
export interface Location {
  readonly begin: number;
  readonly end: number;
}

/**
 * Validate a location, optionally bounded by the translation of a CDS.
 */
export function validateLocation(
  location: Location,
  ctx: ValidationContext,
  cds?: CodingSequence
): ValidationIssue[] {
  const issues = new Issues();
  issues.check(
    location.begin <= location.end,
    "to",
    `End ${location.end} must not be smaller than begin ${location.begin}`
  );
  if (!isRelaxed(ctx)) {
    issues.check(location.begin >= 0, "from", "Location must not be negative");
    issues.check(location.end >= 0, "to", "Location must not be negative");
  }
  if (cds && location.end > cds.translationLength) {
    issues.add(
      "to",
      `End ${location.end} exceeds translation length ${cds.translationLength} of ${cds.name}`
    );
  }
  return issues.list();
}

export const Location = entity<Location, LocationWire>({
  name: "location",
  wire: LocationWire,
  read: (raw) => ({ begin: raw.from, end: raw.to }),
  encode: (location) => ({ from: location.begin, to: location.end }),
  validate: (location, ctx) => validateLocation(location, ctx),
});

// ═══════════════════════════════════════════════════════════════════════════
// CHEMICAL STRUCTURE
// ═══════════════════════════════════════════════════════════════════════════

const SMILES_PATTERN = /^[A-Za-z0-9@+\-[\]()\\/%=#$:.*~]+$/;

/**
 * SMILES string. Only the character class is checked, not the chemistry.
 */
export type Smiles = string;

export function validateSmiles(smiles: string): ValidationIssue[] {
  return SMILES_PATTERN.test(smiles) ? [] : [{ field: "", message: `Invalid SMILES '${smiles}'` }];
}

export const Smiles = entity<Smiles, string>({
  name: "structure",
  wire: z.string(),
  read: (raw) => raw,
  encode: (smiles) => smiles,
  validate: (smiles) => validateSmiles(smiles),
});

// ═══════════════════════════════════════════════════════════════════════════
// SUBMITTERS AND RELEASES
// ═══════════════════════════════════════════════════════════════════════════

/** Contributor/reviewer placeholder for changes made by the system itself */
export const SYSTEM_SUBMITTER = "A".repeat(24);

export type SubmitterID = string;
export const SubmitterID = entity<SubmitterID, string>({
  name: "submitter id",
  wire: z.string(),
  read: (raw) => raw,
  encode: (id) => id,
  validate: (id) => {
    if (id.length !== 24) {
      return [{ field: "", message: "invalid length" }];
    }
    if (!/^[A-Za-z0-9]+$/.test(id)) {
      return [{ field: "", message: "invalid characters" }];
    }
    return [];
  },
});

/** Release version of the entry that is still being edited */
export const NEXT_RELEASE = "next";

export type ReleaseVersion = string;
export const ReleaseVersion = entity<ReleaseVersion, string>({
  name: "release version",
  wire: z.string(),
  read: (raw) => raw,
  encode: (version) => version,
  validate: (version) =>
    version === NEXT_RELEASE || /^\d+(\.\d+)*$/.test(version)
      ? []
      : [{ field: "", message: `invalid version '${version}'` }],
});

/**
 * Calendar date in YYYY-MM-DD form.
 */
export function validateIsoDate(value: string): ValidationIssue[] {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (match) {
    const parsed = new Date(`${value}T00:00:00Z`);
    if (!Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value)) {
      return [];
    }
  }
  return [{ field: "", message: `Invalid date '${value}'` }];
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPOUND NAMES
// ═══════════════════════════════════════════════════════════════════════════

/** Characters allowed in compound, monomer, synonym and moiety names */
export const COMPOUND_NAME_PATTERN = /^[a-zA-Zα-ωΑ-Ω0-9[\]'()\/&,. +-]+$/;

export function isValidCompoundName(name: string): boolean {
  return COMPOUND_NAME_PATTERN.test(name);
}
