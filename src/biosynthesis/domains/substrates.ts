/**
 * Substrates of acyltransferase and adenylation domains.
 */

import { z } from "zod";
import { loadDataFile } from "../../common/data.js";
import { Smiles, validateSmiles } from "../../common/primitives.js";
import { compact, entity, isRelaxed, Issues } from "../../common/validation.js";

export const ATSubstrateName = z.enum([
  "acetyl-CoA",
  "malonyl-CoA",
  "methylmalonyl-CoA",
  "ethylmalonyl-CoA",
  "methoxymalonyl-CoA",
  "other",
]);
export type ATSubstrateName = z.infer<typeof ATSubstrateName>;

// ═══════════════════════════════════════════════════════════════════════════
// PROTEINOGENIC AMINO ACIDS
// ═══════════════════════════════════════════════════════════════════════════

const ProteinogenicTable = z.record(z.string(), z.string());

let proteinogenic: Readonly<Record<string, string>> | undefined;

function proteinogenicTable(): Readonly<Record<string, string>> {
  proteinogenic ??= loadDataFile("proteinogenic-substrates.json", ProteinogenicTable);
  return proteinogenic;
}

/** Whether a name (any case) is one of the 20 standard amino acids */
export function isProteinogenic(name: string): boolean {
  return Object.hasOwn(proteinogenicTable(), name.toLowerCase());
}

/**
 * Structure of a standard amino acid, looked up case-insensitively.
 */
export function proteinogenicStructure(name: string): Smiles | undefined {
  const key = name.toLowerCase();
  return Object.hasOwn(proteinogenicTable(), key) ? proteinogenicTable()[key] : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACYLTRANSFERASE
// ═══════════════════════════════════════════════════════════════════════════

/** Acyltransferase substrate. Unlisted substrates are "other" with details. */
export interface ATSubstrate {
  readonly name: string;
  readonly details?: string;
  readonly structure?: Smiles;
}

export const ATSubstrateWire = z.object({
  name: z.string(),
  details: z.string().optional(),
  structure: z.string().optional(),
});
export type ATSubstrateWire = z.infer<typeof ATSubstrateWire>;

export const ATSubstrate = entity<ATSubstrate, ATSubstrateWire>({
  name: "acyltransferase substrate",
  wire: ATSubstrateWire,
  read: (raw) => compact({ name: raw.name, details: raw.details, structure: raw.structure }),
  encode: (substrate) =>
    compact({
      name: substrate.name,
      details: substrate.details || undefined,
      structure: substrate.structure || undefined,
    }),
  validate: (substrate, ctx) => {
    const issues = new Issues();
    issues.check(
      ATSubstrateName.safeParse(substrate.name).success,
      "name",
      `Invalid substrate name: ${substrate.name}`
    );
    if (substrate.name === "other") {
      issues.check(Boolean(substrate.details), "details", "Details are required for 'other' substrate");
      issues.check(
        isRelaxed(ctx) || Boolean(substrate.structure),
        "structure",
        "Structure is required for 'other' substrate"
      );
    }
    if (substrate.structure) {
      issues.nested("structure", validateSmiles(substrate.structure));
    }
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// ADENYLATION
// ═══════════════════════════════════════════════════════════════════════════

export interface AdenylationSubstrate {
  readonly name: string;
  readonly proteinogenic: boolean;
  readonly structure?: Smiles;
}

export const AdenylationSubstrateWire = z.object({
  name: z.string(),
  proteinogenic: z.boolean(),
  structure: z.string().optional(),
});
export type AdenylationSubstrateWire = z.infer<typeof AdenylationSubstrateWire>;

/**
 * Build an adenylation substrate, filling in the structure of proteinogenic
 * amino acids when none is given.
 */
export function adenylationSubstrate(
  name: string,
  proteinogenic: boolean,
  structure?: Smiles
): AdenylationSubstrate {
  const filled = structure || (proteinogenic ? proteinogenicStructure(name) : undefined);
  return compact({ name, proteinogenic, structure: filled });
}

export const AdenylationSubstrate = entity<AdenylationSubstrate, AdenylationSubstrateWire>({
  name: "adenylation substrate",
  wire: AdenylationSubstrateWire,
  read: (raw) => adenylationSubstrate(raw.name, raw.proteinogenic, raw.structure),
  encode: (substrate) =>
    compact({
      name: substrate.name,
      proteinogenic: substrate.proteinogenic,
      structure: substrate.structure || undefined,
    }),
  validate: (substrate) => {
    const issues = new Issues();
    issues.check(Boolean(substrate.name), "name", "Missing name");
    if (substrate.proteinogenic && substrate.name) {
      issues.check(
        isProteinogenic(substrate.name),
        "name",
        `Invalid proteinogenic substrate ${substrate.name}`
      );
    }
    if (substrate.structure) {
      issues.nested("structure", Smiles.validate(substrate.structure, {}));
    }
    return issues.list();
  },
});
