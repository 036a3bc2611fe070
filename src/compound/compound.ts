/**
 * Compounds produced by a cluster.
 */

import { z } from "zod";
import {
  CitationList,
  encodeCitations,
  readCitations,
  validateCitationList,
  type Citation,
} from "../common/citation.js";
import { loadDataFile } from "../common/data.js";
import type { ValidationIssue } from "../common/errors.js";
import { CompoundEvidence, evidenceReferences, EvidenceWire } from "../common/evidence.js";
import { isValidCompoundName, validateSmiles, type Smiles } from "../common/primitives.js";
import { compact, entity, isRelaxed, Issues, nonEmpty } from "../common/validation.js";

// ═══════════════════════════════════════════════════════════════════════════
// CLASSES
// ═══════════════════════════════════════════════════════════════════════════

const CompoundClassTable = z.record(z.string(), z.array(z.string()));

let compoundClasses: ReadonlySet<string> | undefined;

/**
 * Chemical subclasses accepted as compound classes, read once from
 * data/compound-classes.json (top-level keys group the subclasses).
 */
export function knownCompoundClasses(): ReadonlySet<string> {
  compoundClasses ??= new Set(
    Object.values(loadDataFile("compound-classes.json", CompoundClassTable)).flat()
  );
  return compoundClasses;
}

// ═══════════════════════════════════════════════════════════════════════════
// DATABASE REFERENCES
// ═══════════════════════════════════════════════════════════════════════════

export const COMPOUND_DATABASE_PATTERNS: Readonly<Record<string, RegExp>> = {
  pubchem: /^\d+$/,
  chebi: /^\d+$/,
  chembl: /^CHEMBL\d+$/,
  chemspider: /^\d+$/,
  npatlas: /^NPA\d+$/,
  lotus: /^Q\d+$/,
  gnps: /^MSV\d+$/,
  cyanometdb: /^CyanoMetDB_\d{4}$/,
};

/** Identifier of a compound in an external database, "database:id" on the wire */
export interface CompoundRef {
  readonly database: string;
  readonly identifier: string;
}

export function parseCompoundRef(raw: string): CompoundRef {
  const separator = raw.indexOf(":");
  if (separator === -1) {
    return { database: raw, identifier: "" };
  }
  return { database: raw.slice(0, separator), identifier: raw.slice(separator + 1) };
}

export const CompoundRef = entity<CompoundRef, string>({
  name: "compound reference",
  wire: z.string(),
  read: parseCompoundRef,
  encode: (ref) => `${ref.database}:${ref.identifier}`,
  validate: (ref) => {
    const pattern = Object.hasOwn(COMPOUND_DATABASE_PATTERNS, ref.database)
      ? COMPOUND_DATABASE_PATTERNS[ref.database]
      : undefined;
    if (!pattern) {
      return [{ field: "", message: `Invalid database: ${ref.database}` }];
    }
    return pattern.test(ref.identifier) ? [] : [{ field: "", message: `Invalid identifier: ${ref.identifier}` }];
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMULA
// ═══════════════════════════════════════════════════════════════════════════

export interface FormulaPart {
  readonly atom: string;
  readonly count: number;
}

/**
 * Split a molecular formula such as "C10H16N2O3S" into atoms and counts.
 * A missing count means one.
 */
export function formulaParts(formula: string): FormulaPart[] {
  return [...formula.matchAll(/([A-Z][a-z]?)([0-9]*)/g)].map((match) => ({
    atom: match[1] ?? "",
    count: match[2] ? Number.parseInt(match[2], 10) : 1,
  }));
}

export function validateFormula(formula: string): ValidationIssue[] {
  const issues = new Issues();
  for (const part of formulaParts(formula)) {
    issues.check(part.count > 0, "", `Invalid count: ${part.count}`);
  }
  return issues.list();
}

// ═══════════════════════════════════════════════════════════════════════════
// BIOACTIVITY
// ═══════════════════════════════════════════════════════════════════════════

export const AssayWire = z.object({
  concentration: z.string(),
  target: z.string(),
});
export type AssayWire = z.infer<typeof AssayWire>;

export interface Assay {
  readonly concentration: string;
  readonly target: string;
}

export const Assay = entity<Assay, AssayWire>({
  name: "assay",
  wire: AssayWire,
  read: (raw) => ({ concentration: raw.concentration, target: raw.target }),
  encode: (assay) => ({ concentration: assay.concentration, target: assay.target }),
  validate: (assay) =>
    new Issues()
      .check(Boolean(assay.concentration), "concentration", "Missing concentration")
      .check(Boolean(assay.target), "target", "Missing target")
      .list(),
});

export const BioactivityWire = z.object({
  name: z.string(),
  observed: z.boolean(),
  references: CitationList,
  assays: z.array(AssayWire).optional(),
});
export type BioactivityWire = z.infer<typeof BioactivityWire>;

export interface Bioactivity {
  readonly name: string;
  readonly observed: boolean;
  readonly references: readonly Citation[];
  readonly assays: readonly Assay[];
}

export const Bioactivity = entity<Bioactivity, BioactivityWire>({
  name: "bioactivity",
  wire: BioactivityWire,
  read: (raw) => ({
    name: raw.name,
    observed: raw.observed,
    references: readCitations(raw.references),
    assays: (raw.assays ?? []).map(Assay.read),
  }),
  encode: (bioactivity) =>
    compact({
      name: bioactivity.name,
      observed: bioactivity.observed,
      references: encodeCitations(bioactivity.references),
      assays: nonEmpty(bioactivity.assays.map(Assay.encode)),
    }),
  validate: (bioactivity) =>
    new Issues()
      .check(Boolean(bioactivity.name), "name", "Missing name")
      .nested("references", validateCitationList(bioactivity.references, {}, "Missing references"))
      .each("assays", bioactivity.assays, (assay) => Assay.validate(assay, {}))
      .list(),
});

// ═══════════════════════════════════════════════════════════════════════════
// COMPOUND
// ═══════════════════════════════════════════════════════════════════════════

export const CompoundWire = z.object({
  name: z.string(),
  evidence: z.array(EvidenceWire),
  classes: z.array(z.string()).optional(),
  bioactivities: z.array(BioactivityWire).optional(),
  structure: z.string().optional(),
  synonyms: z.array(z.string()).optional(),
  databaseIds: z.array(z.string()).optional(),
  moieties: z.array(z.string()).optional(),
  cyclic: z.boolean().optional(),
  mass: z.number().optional(),
  formula: z.string().optional(),
});
export type CompoundWire = z.infer<typeof CompoundWire>;

export interface Compound {
  readonly name: string;
  readonly evidence: readonly CompoundEvidence[];
  readonly classes: readonly string[];
  readonly bioactivities: readonly Bioactivity[];
  readonly structure?: Smiles;
  readonly synonyms: readonly string[];
  readonly databases: readonly CompoundRef[];
  readonly moieties: readonly string[];
  readonly cyclic?: boolean;
  readonly mass?: number;
  readonly formula?: string;
}

export const Compound = entity<Compound, CompoundWire>({
  name: "compound",
  wire: CompoundWire,
  read: (raw) =>
    compact({
      name: raw.name,
      evidence: raw.evidence.map(CompoundEvidence.read),
      classes: raw.classes ?? [],
      bioactivities: (raw.bioactivities ?? []).map(Bioactivity.read),
      structure: raw.structure,
      synonyms: raw.synonyms ?? [],
      databases: (raw.databaseIds ?? []).map(CompoundRef.read),
      moieties: raw.moieties ?? [],
      cyclic: raw.cyclic,
      mass: raw.mass,
      formula: raw.formula,
    }),
  encode: (compound) =>
    compact({
      name: compound.name,
      evidence: compound.evidence.map(CompoundEvidence.encode),
      classes: nonEmpty(compound.classes),
      bioactivities: nonEmpty(compound.bioactivities.map(Bioactivity.encode)),
      structure: compound.structure || undefined,
      synonyms: nonEmpty(compound.synonyms),
      databaseIds: nonEmpty(compound.databases.map(CompoundRef.encode)),
      moieties: nonEmpty(compound.moieties),
      cyclic: compound.cyclic,
      mass: compound.mass,
      formula: compound.formula || undefined,
    }),
  validate: (compound, ctx) => {
    const issues = new Issues();
    issues.check(isValidCompoundName(compound.name), "name", `Invalid name '${compound.name}'`);
    issues.check(isRelaxed(ctx) || compound.evidence.length > 0, "evidence", "Missing evidence");
    issues.each("evidence", compound.evidence, (evidence) => CompoundEvidence.validate(evidence, ctx));
    compound.classes.forEach((value, index) => {
      issues.check(knownCompoundClasses().has(value), `classes[${index}]`, `Invalid compound class: ${value}`);
    });
    issues.each("bioactivities", compound.bioactivities, (bioactivity) => Bioactivity.validate(bioactivity, ctx));
    if (compound.structure !== undefined) {
      issues.nested("structure", validateSmiles(compound.structure));
    }
    compound.synonyms.forEach((synonym, index) => {
      issues.check(isValidCompoundName(synonym), `synonyms[${index}]`, `Invalid synonym '${synonym}'`);
    });
    issues.each("databaseIds", compound.databases, (ref) => CompoundRef.validate(ref, ctx));
    compound.moieties.forEach((moiety, index) => {
      issues.check(isValidCompoundName(moiety), `moieties[${index}]`, `Invalid moiety '${moiety}'`);
    });
    if (compound.mass !== undefined) {
      issues.check(compound.mass > 0, "mass", `Invalid mass ${compound.mass}`);
    }
    if (compound.formula !== undefined) {
      issues.nested("formula", validateFormula(compound.formula));
    }
    return issues.list();
  },
});

export function compoundReferences(compound: Compound): Citation[] {
  return [
    ...evidenceReferences(compound.evidence),
    ...compound.bioactivities.flatMap((bioactivity) => bioactivity.references),
  ];
}
