/**
 * Terpene class payload.
 */

import { z } from "zod";
import type { ValidationIssue } from "../../common/errors.js";
import { GeneId, GeneIdList } from "../../common/primitives.js";
import { compact, Issues, nonEmpty, type ValidationContext } from "../../common/validation.js";

export const TERPENE_SUBCLASSES = ["Diterpene", "Hemiterpene", "Monoterpene", "Sesquiterpene", "Triterpene"] as const;

export const TerpenePrecursor = z.enum(["DMAPP", "FPP", "GGPP", "GPP", "IPP"]);
export type TerpenePrecursor = z.infer<typeof TerpenePrecursor>;

export interface TerpeneClassInfo {
  readonly kind: "TERPENE";
  readonly subclass: string;
  readonly prenyltransferases: readonly GeneId[];
  readonly synthases: readonly GeneId[];
  readonly precursor?: string;
}

export const TerpeneClassWire = z.object({
  subclass: z.string(),
  prenyltransferases: GeneIdList.optional(),
  synthases: GeneIdList.optional(),
  precursor: z.string().optional(),
});
export type TerpeneClassWire = z.infer<typeof TerpeneClassWire>;

export function readTerpeneClass(raw: TerpeneClassWire): TerpeneClassInfo {
  return compact<TerpeneClassInfo>({
    kind: "TERPENE",
    subclass: raw.subclass,
    prenyltransferases: raw.prenyltransferases ?? [],
    synthases: raw.synthases ?? [],
    precursor: raw.precursor,
  });
}

export function encodeTerpeneClass(info: TerpeneClassInfo): TerpeneClassWire {
  return compact({
    subclass: info.subclass,
    prenyltransferases: nonEmpty(info.prenyltransferases),
    synthases: nonEmpty(info.synthases),
    precursor: info.precursor || undefined,
  });
}

export function validateTerpeneClass(info: TerpeneClassInfo, ctx: ValidationContext): ValidationIssue[] {
  const issues = new Issues();
  issues.check(
    TERPENE_SUBCLASSES.some((subclass) => subclass === info.subclass),
    "subclass",
    `Invalid subclass: ${info.subclass}`
  );
  issues.each("prenyltransferases", info.prenyltransferases, (gene) => GeneId.validate(gene, ctx));
  issues.each("synthases", info.synthases, (gene) => GeneId.validate(gene, ctx));
  if (info.precursor) {
    issues.check(
      TerpenePrecursor.safeParse(info.precursor).success,
      "precursor",
      `Invalid precursor: ${info.precursor}`
    );
  }
  return issues.list();
}
