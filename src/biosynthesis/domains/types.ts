/**
 * Catalytic domain types.
 *
 * The type tag of a domain fixes its payload kind through a static table;
 * two tags, "adenylation" and its legacy alias "amp-binding", share one
 * payload.
 */

import { z } from "zod";
import type { Citation } from "../../common/citation.js";
import type { SubstrateEvidence } from "../../common/evidence.js";
import type { GeneId, Smiles } from "../../common/primitives.js";
import type { AdenylationSubstrate, ATSubstrate } from "./substrates.js";

export const DomainType = z.enum([
  "acyltransferase",
  "adenylation",
  "amp-binding",
  "aminotransferase",
  "branching",
  "carrier",
  "condensation",
  "cyclase",
  "dehydratase",
  "enoylreductase",
  "epimerase",
  "hydroxylase",
  "ketoreductase",
  "ketosynthase",
  "ligase",
  "methyltransferase",
  "other",
  "oxidase",
  "product_template",
  "thioesterase",
  "thioreductase",
]);
export type DomainType = z.infer<typeof DomainType>;

// ═══════════════════════════════════════════════════════════════════════════
// PAYLOADS
// ═══════════════════════════════════════════════════════════════════════════

export interface AcyltransferaseInfo {
  readonly kind: "acyltransferase";
  readonly subtype?: string;
  readonly substrates: readonly ATSubstrate[];
  readonly evidence: readonly SubstrateEvidence[];
  readonly inactive?: boolean;
}

export interface AdenylationInfo {
  readonly kind: "adenylation";
  readonly substrates: readonly AdenylationSubstrate[];
  readonly evidence: readonly SubstrateEvidence[];
  readonly precursorBiosynthesis: readonly GeneId[];
  /** Tri-state; serialized as its inverse, "inactive" */
  readonly active?: boolean;
}

export interface AminotransferaseInfo {
  readonly kind: "aminotransferase";
  readonly inactive?: boolean;
  readonly references: readonly Citation[];
}

export interface CarrierInfo {
  readonly kind: "carrier";
  readonly subtype?: string;
  readonly betaBranching?: boolean;
  readonly references: readonly Citation[];
  readonly evidence: readonly SubstrateEvidence[];
}

export interface CondensationInfo {
  readonly kind: "condensation";
  readonly subtype?: string;
  readonly references: readonly Citation[];
  readonly evidence: readonly SubstrateEvidence[];
}

export interface CyclaseInfo {
  readonly kind: "cyclase";
  readonly references: readonly Citation[];
}

/**
 * Payload of domains that only record whether they are active: branching,
 * dehydratase, enoylreductase, epimerase, hydroxylase, ketosynthase,
 * oxidase, product template and thioreductase.
 */
export interface ActiveInfo {
  readonly kind: "active";
  readonly active?: boolean;
  readonly references: readonly Citation[];
  readonly evidence: readonly SubstrateEvidence[];
}

export interface KetoreductaseInfo {
  readonly kind: "ketoreductase";
  /** Tri-state; serialized as its inverse, "inactive" */
  readonly active?: boolean;
  readonly stereochemistry?: string;
  readonly evidence: readonly SubstrateEvidence[];
}

export interface LigaseInfo {
  readonly kind: "ligase";
  readonly substrates: readonly Smiles[];
  readonly evidence: readonly SubstrateEvidence[];
}

export interface MethyltransferaseInfo {
  readonly kind: "methyltransferase";
  readonly subtype?: string;
  readonly details?: string;
}

export interface OtherDomainInfo {
  readonly kind: "other";
  readonly subtype: string;
  readonly active?: boolean;
  readonly references: readonly Citation[];
  readonly evidence: readonly SubstrateEvidence[];
}

export interface ThioesteraseInfo {
  readonly kind: "thioesterase";
  readonly subtype?: string;
}

export type DomainInfo =
  | AcyltransferaseInfo
  | AdenylationInfo
  | AminotransferaseInfo
  | CarrierInfo
  | CondensationInfo
  | CyclaseInfo
  | ActiveInfo
  | KetoreductaseInfo
  | LigaseInfo
  | MethyltransferaseInfo
  | OtherDomainInfo
  | ThioesteraseInfo;

export type DomainInfoKind = DomainInfo["kind"];

/**
 * Payload kind of every domain type.
 */
export const PAYLOAD_KIND = {
  acyltransferase: "acyltransferase",
  adenylation: "adenylation",
  "amp-binding": "adenylation",
  aminotransferase: "aminotransferase",
  branching: "active",
  carrier: "carrier",
  condensation: "condensation",
  cyclase: "cyclase",
  dehydratase: "active",
  enoylreductase: "active",
  epimerase: "active",
  hydroxylase: "active",
  ketoreductase: "ketoreductase",
  ketosynthase: "active",
  ligase: "ligase",
  methyltransferase: "methyltransferase",
  other: "other",
  oxidase: "active",
  product_template: "active",
  thioesterase: "thioesterase",
  thioreductase: "active",
} as const satisfies Record<DomainType, DomainInfoKind>;

export type InfoOf<T extends DomainType> = Extract<DomainInfo, { kind: (typeof PAYLOAD_KIND)[T] }>;

/** Domain types whose payload is the "active"-only kind */
export type ActiveDomainType = {
  [T in DomainType]: (typeof PAYLOAD_KIND)[T] extends "active" ? T : never;
}[DomainType];
