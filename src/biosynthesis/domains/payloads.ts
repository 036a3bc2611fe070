/**
 * Domain payloads: wire shapes, readers, encoders and per-kind rules.
 *
 * Payload keys sit next to the domain header on the wire, so every shape
 * here is merged into the domain object rather than nested.
 */

import { z } from "zod";
import type { ValidationIssue } from "../../common/errors.js";
import { Citation, CitationList, encodeCitations, readCitations } from "../../common/citation.js";
import { EvidenceWire, SubstrateEvidence } from "../../common/evidence.js";
import { GeneId, GeneIdList, Smiles } from "../../common/primitives.js";
import {
  compact,
  isRelaxed,
  Issues,
  nonEmpty,
  type ValidationContext,
} from "../../common/validation.js";
import {
  AdenylationSubstrate,
  AdenylationSubstrateWire,
  ATSubstrate,
  ATSubstrateWire,
} from "./substrates.js";
import type {
  AcyltransferaseInfo,
  ActiveInfo,
  AdenylationInfo,
  AminotransferaseInfo,
  CarrierInfo,
  CondensationInfo,
  CyclaseInfo,
  DomainInfo,
  DomainInfoKind,
  KetoreductaseInfo,
  LigaseInfo,
  MethyltransferaseInfo,
  OtherDomainInfo,
  ThioesteraseInfo,
} from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// VOCABULARIES
// ═══════════════════════════════════════════════════════════════════════════

export const DOMAIN_SUBTYPES = {
  acyltransferase: ["cis-AT", "trans-AT"],
  carrier: ["ACP", "PCP"],
  condensation: ["Dual", "Starter", "LCL", "DCL", "Ester bond-forming", "Heterocyclization"],
  methyltransferase: ["C", "N", "O", "other"],
  thioesterase: ["Type I", "Type II"],
} as const satisfies Partial<Record<DomainInfoKind, readonly string[]>>;

export const KR_STEREOCHEMISTRY = ["A", "B", "A1", "A2", "B1", "B2", "C1", "C2"] as const;

// ═══════════════════════════════════════════════════════════════════════════
// WIRE SHAPES
// ═══════════════════════════════════════════════════════════════════════════

const EvidenceList = z.array(EvidenceWire);

export const AcyltransferaseWire = z.object({
  subtype: z.string().optional(),
  substrates: z.array(ATSubstrateWire),
  evidence: EvidenceList,
  inactive: z.boolean().optional(),
});

export const AdenylationWire = z.object({
  substrates: z.array(AdenylationSubstrateWire).optional(),
  evidence: EvidenceList.optional(),
  precursor_biosynthesis: GeneIdList.optional(),
  inactive: z.boolean().optional(),
});

export const AminotransferaseWire = z.object({
  inactive: z.boolean().optional(),
  references: CitationList.optional(),
});

export const CarrierWire = z.object({
  subtype: z.string().optional(),
  beta_branching: z.boolean().optional(),
  references: CitationList.optional(),
  evidence: EvidenceList.optional(),
});

export const CondensationWire = z.object({
  subtype: z.string().optional(),
  references: CitationList.optional(),
  evidence: EvidenceList.optional(),
});

export const CyclaseWire = z.object({
  references: CitationList.optional(),
});

export const ActiveWire = z.object({
  active: z.boolean().optional(),
  references: CitationList.optional(),
  evidence: EvidenceList.optional(),
});

export const KetoreductaseWire = z.object({
  inactive: z.boolean().optional(),
  stereochemistry: z.string().optional(),
  evidence: EvidenceList.optional(),
});

export const LigaseWire = z.object({
  substrates: z.array(z.string()).optional(),
  evidence: EvidenceList.optional(),
});

export const MethyltransferaseWire = z.object({
  subtype: z.string().optional(),
  details: z.string().optional(),
});

export const OtherDomainWire = z.object({
  subtype: z.string(),
  active: z.boolean().optional(),
  references: CitationList.optional(),
  evidence: EvidenceList.optional(),
});

export const ThioesteraseWire = z.object({
  subtype: z.string().optional(),
});

function readEvidence(raw: readonly EvidenceWire[] | undefined): SubstrateEvidence[] {
  return (raw ?? []).map(SubstrateEvidence.read);
}

function encodeEvidence(evidence: readonly SubstrateEvidence[]): EvidenceWire[] {
  return evidence.map(SubstrateEvidence.encode);
}

/** Flip a tri-state flag between its "active" and "inactive" readings */
function invert(flag: boolean | undefined): boolean | undefined {
  return flag === undefined ? undefined : !flag;
}

// ═══════════════════════════════════════════════════════════════════════════
// READERS
// ═══════════════════════════════════════════════════════════════════════════

export function readAcyltransferase(raw: z.infer<typeof AcyltransferaseWire>): AcyltransferaseInfo {
  return compact<AcyltransferaseInfo>({
    kind: "acyltransferase",
    subtype: raw.subtype,
    substrates: raw.substrates.map(ATSubstrate.read),
    evidence: readEvidence(raw.evidence),
    inactive: raw.inactive,
  });
}

export function readAdenylation(raw: z.infer<typeof AdenylationWire>): AdenylationInfo {
  return compact<AdenylationInfo>({
    kind: "adenylation",
    substrates: (raw.substrates ?? []).map(AdenylationSubstrate.read),
    evidence: readEvidence(raw.evidence),
    precursorBiosynthesis: raw.precursor_biosynthesis ?? [],
    active: invert(raw.inactive),
  });
}

export function readAminotransferase(raw: z.infer<typeof AminotransferaseWire>): AminotransferaseInfo {
  return compact<AminotransferaseInfo>({
    kind: "aminotransferase",
    inactive: raw.inactive,
    references: readCitations(raw.references),
  });
}

export function readCarrier(raw: z.infer<typeof CarrierWire>): CarrierInfo {
  return compact<CarrierInfo>({
    kind: "carrier",
    subtype: raw.subtype,
    betaBranching: raw.beta_branching,
    references: readCitations(raw.references),
    evidence: readEvidence(raw.evidence),
  });
}

export function readCondensation(raw: z.infer<typeof CondensationWire>): CondensationInfo {
  return compact<CondensationInfo>({
    kind: "condensation",
    subtype: raw.subtype,
    references: readCitations(raw.references),
    evidence: readEvidence(raw.evidence),
  });
}

export function readCyclase(raw: z.infer<typeof CyclaseWire>): CyclaseInfo {
  return { kind: "cyclase", references: readCitations(raw.references) };
}

export function readActive(raw: z.infer<typeof ActiveWire>): ActiveInfo {
  return compact<ActiveInfo>({
    kind: "active",
    active: raw.active,
    references: readCitations(raw.references),
    evidence: readEvidence(raw.evidence),
  });
}

export function readKetoreductase(raw: z.infer<typeof KetoreductaseWire>): KetoreductaseInfo {
  return compact<KetoreductaseInfo>({
    kind: "ketoreductase",
    active: invert(raw.inactive),
    stereochemistry: raw.stereochemistry,
    evidence: readEvidence(raw.evidence),
  });
}

export function readLigase(raw: z.infer<typeof LigaseWire>): LigaseInfo {
  return { kind: "ligase", substrates: raw.substrates ?? [], evidence: readEvidence(raw.evidence) };
}

export function readMethyltransferase(raw: z.infer<typeof MethyltransferaseWire>): MethyltransferaseInfo {
  return compact<MethyltransferaseInfo>({ kind: "methyltransferase", subtype: raw.subtype, details: raw.details });
}

export function readOtherDomain(raw: z.infer<typeof OtherDomainWire>): OtherDomainInfo {
  return compact<OtherDomainInfo>({
    kind: "other",
    subtype: raw.subtype,
    active: raw.active,
    references: readCitations(raw.references),
    evidence: readEvidence(raw.evidence),
  });
}

export function readThioesterase(raw: z.infer<typeof ThioesteraseWire>): ThioesteraseInfo {
  return compact<ThioesteraseInfo>({ kind: "thioesterase", subtype: raw.subtype });
}

// ═══════════════════════════════════════════════════════════════════════════
// ENCODERS
// ═══════════════════════════════════════════════════════════════════════════

export function encodeAcyltransferase(info: AcyltransferaseInfo): z.infer<typeof AcyltransferaseWire> {
  return compact({
    subtype: info.subtype || undefined,
    substrates: info.substrates.map(ATSubstrate.encode),
    evidence: encodeEvidence(info.evidence),
    inactive: info.inactive,
  });
}

export function encodeAdenylation(info: AdenylationInfo): z.infer<typeof AdenylationWire> {
  return compact({
    substrates: nonEmpty(info.substrates.map(AdenylationSubstrate.encode)),
    evidence: nonEmpty(encodeEvidence(info.evidence)),
    precursor_biosynthesis: nonEmpty(info.precursorBiosynthesis),
    inactive: invert(info.active),
  });
}

export function encodeAminotransferase(info: AminotransferaseInfo): z.infer<typeof AminotransferaseWire> {
  return compact({
    inactive: info.inactive,
    references: nonEmpty(encodeCitations(info.references)),
  });
}

export function encodeCarrier(info: CarrierInfo): z.infer<typeof CarrierWire> {
  return compact({
    subtype: info.subtype || undefined,
    beta_branching: info.betaBranching,
    references: nonEmpty(encodeCitations(info.references)),
    evidence: nonEmpty(encodeEvidence(info.evidence)),
  });
}

export function encodeCondensation(info: CondensationInfo): z.infer<typeof CondensationWire> {
  return compact({
    subtype: info.subtype || undefined,
    references: nonEmpty(encodeCitations(info.references)),
    evidence: nonEmpty(encodeEvidence(info.evidence)),
  });
}

export function encodeCyclase(info: CyclaseInfo): z.infer<typeof CyclaseWire> {
  return compact({ references: nonEmpty(encodeCitations(info.references)) });
}

export function encodeActive(info: ActiveInfo): z.infer<typeof ActiveWire> {
  return compact({
    active: info.active,
    references: nonEmpty(encodeCitations(info.references)),
    evidence: nonEmpty(encodeEvidence(info.evidence)),
  });
}

export function encodeKetoreductase(info: KetoreductaseInfo): z.infer<typeof KetoreductaseWire> {
  return compact({
    inactive: invert(info.active),
    stereochemistry: info.stereochemistry,
    evidence: nonEmpty(encodeEvidence(info.evidence)),
  });
}

export function encodeLigase(info: LigaseInfo): z.infer<typeof LigaseWire> {
  return compact({
    substrates: nonEmpty(info.substrates),
    evidence: nonEmpty(encodeEvidence(info.evidence)),
  });
}

export function encodeMethyltransferase(info: MethyltransferaseInfo): z.infer<typeof MethyltransferaseWire> {
  return compact({ subtype: info.subtype || undefined, details: info.details || undefined });
}

export function encodeOtherDomain(info: OtherDomainInfo): z.infer<typeof OtherDomainWire> {
  return compact({
    subtype: info.subtype,
    active: info.active,
    references: nonEmpty(encodeCitations(info.references)),
    evidence: nonEmpty(encodeEvidence(info.evidence)),
  });
}

export function encodeThioesterase(info: ThioesteraseInfo): z.infer<typeof ThioesteraseWire> {
  return compact({ subtype: info.subtype || undefined });
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMON SURFACE
// ═══════════════════════════════════════════════════════════════════════════

export function domainSubtype(info: DomainInfo): string | undefined {
  switch (info.kind) {
    case "acyltransferase":
    case "carrier":
    case "condensation":
    case "methyltransferase":
    case "other":
    case "thioesterase":
      return info.subtype;
    default:
      return undefined;
  }
}

export function domainEvidence(info: DomainInfo): readonly SubstrateEvidence[] {
  switch (info.kind) {
    case "aminotransferase":
    case "cyclase":
    case "methyltransferase":
    case "thioesterase":
      return [];
    default:
      return info.evidence;
  }
}

/** Citations stored on the payload itself, excluding evidence */
export function domainOwnReferences(info: DomainInfo): readonly Citation[] {
  switch (info.kind) {
    case "aminotransferase":
    case "carrier":
    case "condensation":
    case "cyclase":
    case "active":
    case "other":
      return info.references;
    default:
      return [];
  }
}

/**
 * Own citations followed by the citations of every evidence item.
 */
export function domainReferences(info: DomainInfo): Citation[] {
  return [...domainOwnReferences(info), ...domainEvidence(info).flatMap((ev) => ev.references)];
}

export interface SubstrateSummary {
  readonly name: string;
  readonly structure?: string;
}

export function domainSubstrates(info: DomainInfo): readonly SubstrateSummary[] {
  switch (info.kind) {
    case "acyltransferase":
    case "adenylation":
      return info.substrates;
    case "ligase":
      return info.substrates.map((structure) => ({ name: structure, structure }));
    default:
      return [];
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════

function subtypeVocabulary(kind: DomainInfoKind): readonly string[] | undefined {
  switch (kind) {
    case "acyltransferase":
    case "carrier":
    case "condensation":
    case "methyltransferase":
    case "thioesterase":
      return DOMAIN_SUBTYPES[kind];
    default:
      return undefined;
  }
}

function sharedRules(info: DomainInfo, ctx: ValidationContext): ValidationIssue[] {
  const issues = new Issues();
  const subtype = domainSubtype(info);
  const vocabulary = subtypeVocabulary(info.kind);
  if (subtype && vocabulary) {
    issues.check(vocabulary.includes(subtype), "subtype", "invalid subtype");
  }
  issues.each("references", domainOwnReferences(info), (citation) => Citation.validate(citation, ctx));
  issues.each("evidence", domainEvidence(info), (ev) => SubstrateEvidence.validate(ev, ctx));
  if (!isRelaxed(ctx) && domainSubstrates(info).length > 0 && domainEvidence(info).length === 0) {
    issues.add("evidence", "Substrates without evidence");
  }
  return issues.list();
}

function kindRules(info: DomainInfo, ctx: ValidationContext): ValidationIssue[] {
  const issues = new Issues();
  switch (info.kind) {
    case "acyltransferase":
      issues.each("substrates", info.substrates, (sub) => ATSubstrate.validate(sub, ctx));
      if (info.inactive) {
        issues.check(info.evidence.length > 0, "evidence", "Evidence is required if inactive");
        issues.check(info.substrates.length === 0, "substrates", "Substrates are not allowed if inactive");
      }
      break;
    case "adenylation":
      issues.each("substrates", info.substrates, (sub) => AdenylationSubstrate.validate(sub, ctx));
      issues.each("precursor_biosynthesis", info.precursorBiosynthesis, (gene) => GeneId.validate(gene, ctx));
      if (info.active === false) {
        issues.check(
          info.substrates.length === 0,
          "inactive",
          "Inactive adenylation domains cannot have a substrate"
        );
        issues.check(
          info.evidence.length > 0,
          "evidence",
          "Evidence is required for inactive adenylation domains"
        );
      }
      break;
    case "aminotransferase":
      if (!isRelaxed(ctx)) {
        issues.check(info.references.length > 0, "references", "At least one reference is required");
      }
      if (info.inactive) {
        issues.check(info.references.length > 0, "references", "References are required if inactive is set");
      }
      break;
    case "condensation":
      if (info.subtype) {
        issues.check(
          isRelaxed(ctx) || info.references.length > 0,
          "references",
          "References are required for a condensation subtype"
        );
      }
      break;
    case "ketoreductase":
      if (info.stereochemistry !== undefined) {
        issues.check(
          KR_STEREOCHEMISTRY.some((value) => value === info.stereochemistry),
          "stereochemistry",
          `Invalid stereochemistry: ${info.stereochemistry}`
        );
      }
      if (!isRelaxed(ctx)) {
        issues.check(
          info.evidence.length > 0,
          "evidence",
          "Evidence is required for non-questionable quality entries"
        );
      }
      break;
    case "ligase":
      issues.each("substrates", info.substrates, (smiles) => Smiles.validate(smiles, ctx));
      break;
    case "methyltransferase":
      if (info.subtype === "other") {
        issues.check(Boolean(info.details), "details", "Missing required details for subtype 'other'");
      }
      break;
    case "other":
      issues.check(Boolean(info.subtype), "subtype", "Missing subtype");
      break;
    case "carrier":
    case "cyclase":
    case "active":
    case "thioesterase":
      break;
  }
  return issues.list();
}

/**
 * Validate a payload: the rules every kind shares, then its own.
 */
export function validateDomainInfo(info: DomainInfo, ctx: ValidationContext): ValidationIssue[] {
  return [...sharedRules(info, ctx), ...kindRules(info, ctx)];
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Payload of an active-only domain.
 */
export function activeInfo(active?: boolean, evidence: readonly SubstrateEvidence[] = []): ActiveInfo {
  return compact<ActiveInfo>({ kind: "active", active, references: [], evidence });
}

export function otherDomainInfo(subtype: string, active?: boolean): OtherDomainInfo {
  return compact<OtherDomainInfo>({ kind: "other", subtype, active, references: [], evidence: [] });
}
