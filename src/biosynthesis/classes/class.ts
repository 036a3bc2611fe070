/**
 * Biosynthetic classes.
 *
 * A class tag selects exactly one payload. Payload rules are waived at the
 * questionable tier, where migrated records keep whatever subclass the
 * legacy data gave them.
 */

import { z } from "zod";
import type { Citation } from "../../common/citation.js";
import { entity, isRelaxed, Issues } from "../../common/validation.js";
import {
  encodeNrpsClass,
  NrpsClassWire,
  nrpsClassReferences,
  readNrpsClass,
  validateNrpsClass,
  type NrpsClassInfo,
} from "./nrps.js";
import { encodeOtherClass, OtherClassWire, readOtherClass, validateOtherClass, type OtherClassInfo } from "./other.js";
import { encodePksClass, PksClassWire, readPksClass, validatePksClass, type PksClassInfo } from "./pks.js";
import {
  encodeRibosomalClass,
  readRibosomalClass,
  RibosomalClassWire,
  validateRibosomalClass,
  type RibosomalClassInfo,
} from "./ribosomal.js";
import {
  encodeSaccharideClass,
  readSaccharideClass,
  SaccharideClassWire,
  saccharideClassReferences,
  validateSaccharideClass,
  type SaccharideClassInfo,
} from "./saccharide.js";
import {
  encodeTerpeneClass,
  readTerpeneClass,
  TerpeneClassWire,
  validateTerpeneClass,
  type TerpeneClassInfo,
} from "./terpene.js";

export const SynthesisType = z.enum(["NRPS", "PKS", "ribosomal", "saccharide", "TERPENE", "OTHER"]);
export type SynthesisType = z.infer<typeof SynthesisType>;

export type ClassInfo =
  | NrpsClassInfo
  | PksClassInfo
  | RibosomalClassInfo
  | SaccharideClassInfo
  | TerpeneClassInfo
  | OtherClassInfo;

export type ClassInfoOf<T extends SynthesisType> = Extract<ClassInfo, { kind: T }>;

export interface BiosynthesisClassOf<T extends SynthesisType> {
  readonly class: T;
  readonly info: ClassInfoOf<T>;
}

export type BiosynthesisClass = { [T in SynthesisType]: BiosynthesisClassOf<T> }[SynthesisType];

/**
 * Tag a payload with its class.
 */
export function biosynthesisClass(info: ClassInfo): BiosynthesisClass {
  switch (info.kind) {
    case "NRPS":
      return { class: info.kind, info };
    case "PKS":
      return { class: info.kind, info };
    case "ribosomal":
      return { class: info.kind, info };
    case "saccharide":
      return { class: info.kind, info };
    case "TERPENE":
      return { class: info.kind, info };
    case "OTHER":
      return { class: info.kind, info };
  }
}

export const BiosynthesisClassWire = z.discriminatedUnion("class", [
  NrpsClassWire.extend({ class: z.literal("NRPS") }),
  PksClassWire.extend({ class: z.literal("PKS") }),
  RibosomalClassWire.extend({ class: z.literal("ribosomal") }),
  SaccharideClassWire.extend({ class: z.literal("saccharide") }),
  TerpeneClassWire.extend({ class: z.literal("TERPENE") }),
  OtherClassWire.extend({ class: z.literal("OTHER") }),
]);
export type BiosynthesisClassWire = z.infer<typeof BiosynthesisClassWire>;

function readClassInfo(raw: BiosynthesisClassWire): ClassInfo {
  switch (raw.class) {
    case "NRPS":
      return readNrpsClass(raw);
    case "PKS":
      return readPksClass(raw);
    case "ribosomal":
      return readRibosomalClass(raw);
    case "saccharide":
      return readSaccharideClass(raw);
    case "TERPENE":
      return readTerpeneClass(raw);
    case "OTHER":
      return readOtherClass(raw);
  }
}

function encodeClass(value: BiosynthesisClass): BiosynthesisClassWire {
  switch (value.class) {
    case "NRPS":
      return { class: value.class, ...encodeNrpsClass(value.info) };
    case "PKS":
      return { class: value.class, ...encodePksClass(value.info) };
    case "ribosomal":
      return { class: value.class, ...encodeRibosomalClass(value.info) };
    case "saccharide":
      return { class: value.class, ...encodeSaccharideClass(value.info) };
    case "TERPENE":
      return { class: value.class, ...encodeTerpeneClass(value.info) };
    case "OTHER":
      return { class: value.class, ...encodeOtherClass(value.info) };
  }
}

export const BiosynthesisClass = entity<BiosynthesisClass, BiosynthesisClassWire>({
  name: "biosynthetic class",
  wire: BiosynthesisClassWire,
  read: (raw) => biosynthesisClass(readClassInfo(raw)),
  encode: encodeClass,
  validate: (value, ctx) => {
    const issues = new Issues();
    issues.check(
      value.class === value.info.kind,
      "class",
      `Payload '${value.info.kind}' does not match class '${value.class}'`
    );
    if (isRelaxed(ctx)) {
      return issues.list();
    }
    const info = value.info;
    switch (info.kind) {
      case "NRPS":
        return issues.nested("", validateNrpsClass(info, ctx)).list();
      case "PKS":
        return issues.nested("", validatePksClass(info, ctx)).list();
      case "ribosomal":
        return issues.nested("", validateRibosomalClass(info, ctx)).list();
      case "saccharide":
        return issues.nested("", validateSaccharideClass(info, ctx)).list();
      case "TERPENE":
        return issues.nested("", validateTerpeneClass(info, ctx)).list();
      case "OTHER":
        return issues.nested("", validateOtherClass(info)).list();
    }
  },
});

/**
 * Citations held by a class payload.
 */
export function classReferences(value: BiosynthesisClass): Citation[] {
  const info = value.info;
  switch (info.kind) {
    case "NRPS":
      return nrpsClassReferences(info);
    case "saccharide":
      return saccharideClassReferences(info);
    default:
      return [];
  }
}
