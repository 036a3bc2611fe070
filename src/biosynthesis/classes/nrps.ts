/**
 * Non-ribosomal peptide synthetase class payload.
 */

import { z } from "zod";
import {
  CitationList,
  encodeCitations,
  readCitations,
  validateCitationList,
  type Citation,
} from "../../common/citation.js";
import type { ValidationIssue } from "../../common/errors.js";
import { compact, entity, Issues, nonEmpty, type ValidationContext } from "../../common/validation.js";
import { Domain, DomainWire } from "../domains/domain.js";
import { domainReferences } from "../domains/payloads.js";

export const NRPS_SUBCLASSES = ["Type I", "Type II", "Type III", "Type IV", "Type V", "Type VI"] as const;

export const ReleaseTypeName = z.enum([
  "Claisen condensation",
  "Hydrolysis",
  "Macrolactamization",
  "Macrolactonization",
  "None",
  "Other",
  "Reductive release",
]);
export type ReleaseTypeName = z.infer<typeof ReleaseTypeName>;

// ═══════════════════════════════════════════════════════════════════════════
// RELEASE TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const ReleaseTypeWire = z.object({
  name: z.string(),
  details: z.string().optional(),
  references: CitationList,
});
export type ReleaseTypeWire = z.infer<typeof ReleaseTypeWire>;

/** How the finished chain leaves the assembly line */
export interface ReleaseType {
  readonly name: string;
  readonly details?: string;
  readonly references: readonly Citation[];
}

export const ReleaseType = entity<ReleaseType, ReleaseTypeWire>({
  name: "release type",
  wire: ReleaseTypeWire,
  read: (raw) => compact({ name: raw.name, details: raw.details, references: readCitations(raw.references) }),
  encode: (release) =>
    compact({
      name: release.name,
      details: release.details || undefined,
      references: encodeCitations(release.references),
    }),
  validate: (release, ctx) => {
    const issues = new Issues();
    issues.check(
      ReleaseTypeName.safeParse(release.name).success,
      "name",
      `Invalid release type: ${release.name}`
    );
    if (release.name === "Other") {
      issues.check(
        Boolean(release.details),
        "details",
        "Details must be provided for 'Other' release types"
      );
    }
    issues.nested("references", validateCitationList(release.references, ctx));
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// PAYLOAD
// ═══════════════════════════════════════════════════════════════════════════

export interface NrpsClassInfo {
  readonly kind: "NRPS";
  readonly subclass: string;
  readonly releaseTypes: readonly ReleaseType[];
  readonly thioesterases: readonly Domain[];
}

export const NrpsClassWire = z.object({
  subclass: z.string(),
  release_types: z.array(ReleaseTypeWire).optional(),
  thioesterases: z.array(DomainWire).optional(),
});
export type NrpsClassWire = z.infer<typeof NrpsClassWire>;

export function readNrpsClass(raw: NrpsClassWire): NrpsClassInfo {
  return {
    kind: "NRPS",
    subclass: raw.subclass,
    releaseTypes: (raw.release_types ?? []).map(ReleaseType.read),
    thioesterases: (raw.thioesterases ?? []).map(Domain.read),
  };
}

export function encodeNrpsClass(info: NrpsClassInfo): NrpsClassWire {
  return compact({
    subclass: info.subclass,
    release_types: nonEmpty(info.releaseTypes.map(ReleaseType.encode)),
    thioesterases: nonEmpty(info.thioesterases.map(Domain.encode)),
  });
}

export function validateNrpsClass(info: NrpsClassInfo, ctx: ValidationContext): ValidationIssue[] {
  const issues = new Issues();
  issues.check(
    NRPS_SUBCLASSES.some((subclass) => subclass === info.subclass),
    "subclass",
    `Invalid subclass: ${info.subclass}`
  );
  issues.each("release_types", info.releaseTypes, (release) => ReleaseType.validate(release, ctx));
  info.thioesterases.forEach((domain, index) => {
    issues.check(
      domain.type === "thioesterase",
      `thioesterases[${index}]`,
      `Expected a thioesterase domain, got '${domain.type}'`
    );
  });
  issues.each("thioesterases", info.thioesterases, (domain) => Domain.validate(domain, ctx));
  return issues.list();
}

export function nrpsClassReferences(info: NrpsClassInfo): Citation[] {
  return [
    ...info.releaseTypes.flatMap((release) => release.references),
    ...info.thioesterases.flatMap((domain) => domainReferences(domain.info)),
  ];
}
