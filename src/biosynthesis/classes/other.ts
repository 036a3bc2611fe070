/**
 * Catch-all class for compounds outside the major families.
 */

import { z } from "zod";
import type { ValidationIssue } from "../../common/errors.js";
import { compact, Issues } from "../../common/validation.js";

export const OtherSubclass = z.enum([
  "aminocoumarin",
  "butyrolactone",
  "cyclitol",
  "ectoine",
  "fatty acid",
  "flavin",
  "indole",
  "non-nrp beta-lactam",
  "non-nrp siderophore",
  "nucleoside",
  "other",
  "pbde",
  "phenazine",
  "phosphonate",
  "shikimate-derived",
  "trna-derived",
]);
export type OtherSubclass = z.infer<typeof OtherSubclass>;

export interface OtherClassInfo {
  readonly kind: "OTHER";
  readonly subclass: string;
  readonly details?: string;
}

export const OtherClassWire = z.object({
  subclass: z.string(),
  details: z.string().optional(),
});
export type OtherClassWire = z.infer<typeof OtherClassWire>;

export function readOtherClass(raw: OtherClassWire): OtherClassInfo {
  return compact<OtherClassInfo>({ kind: "OTHER", subclass: raw.subclass, details: raw.details });
}

export function encodeOtherClass(info: OtherClassInfo): OtherClassWire {
  return compact({ subclass: info.subclass, details: info.details || undefined });
}

export function otherClassInfo(subclass: string, details?: string): OtherClassInfo {
  return compact<OtherClassInfo>({ kind: "OTHER", subclass, details });
}

export function validateOtherClass(info: OtherClassInfo): ValidationIssue[] {
  const issues = new Issues();
  issues.check(OtherSubclass.safeParse(info.subclass).success, "subclass", `Invalid subclass: ${info.subclass}`);
  if (info.subclass === "other") {
    issues.check(Boolean(info.details), "details", "Missing details for subclass 'other'");
  }
  return issues.list();
}
