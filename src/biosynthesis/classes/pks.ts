/**
 * Polyketide synthase class payload.
 */

import { z } from "zod";
import type { ValidationIssue } from "../../common/errors.js";
import { GeneId, GeneIdList } from "../../common/primitives.js";
import { compact, Issues, type ValidationContext } from "../../common/validation.js";
import { Monomer, MonomerWire } from "../monomer.js";

export const PKS_SUBCLASSES = [
  "Type I",
  "Type II aromatic",
  "Type II highly reducing",
  "Type II arylpolyene",
  "Type III",
] as const;

export interface PksClassInfo {
  readonly kind: "PKS";
  readonly subclass: string;
  readonly cyclases: readonly GeneId[];
  readonly starterUnit?: Monomer;
  readonly ketideLength?: number;
  readonly iterative?: boolean;
}

export const PksClassWire = z.object({
  subclass: z.string(),
  cyclases: GeneIdList,
  starter_unit: MonomerWire.optional(),
  ketide_length: z.number().int().optional(),
  iterative: z.boolean().optional(),
});
export type PksClassWire = z.infer<typeof PksClassWire>;

export function readPksClass(raw: PksClassWire): PksClassInfo {
  return compact<PksClassInfo>({
    kind: "PKS",
    subclass: raw.subclass,
    cyclases: raw.cyclases,
    starterUnit: raw.starter_unit ? Monomer.read(raw.starter_unit) : undefined,
    ketideLength: raw.ketide_length,
    iterative: raw.iterative,
  });
}

export function encodePksClass(info: PksClassInfo): PksClassWire {
  return compact({
    subclass: info.subclass,
    cyclases: [...info.cyclases],
    starter_unit: info.starterUnit ? Monomer.encode(info.starterUnit) : undefined,
    ketide_length: info.ketideLength,
    iterative: info.iterative,
  });
}

export function validatePksClass(info: PksClassInfo, ctx: ValidationContext): ValidationIssue[] {
  const issues = new Issues();
  issues.check(
    PKS_SUBCLASSES.some((subclass) => subclass === info.subclass),
    "subclass",
    `Invalid subclass: ${info.subclass}`
  );
  issues.each("cyclases", info.cyclases, (gene) => GeneId.validate(gene, ctx));
  if (info.starterUnit) {
    issues.nested("starter_unit", Monomer.validate(info.starterUnit, ctx));
  }
  if (info.ketideLength !== undefined) {
    issues.check(info.ketideLength >= 1, "ketide_length", `Invalid ketide length: ${info.ketideLength}`);
  }
  return issues.list();
}
