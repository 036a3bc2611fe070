/**
 * The domain codec.
 *
 * Decoding reads the type tag first and lets it pick the payload shape; an
 * unknown tag fails structurally. The payload is flattened into the domain
 * object on the wire.
 */

import { z } from "zod";
import { GeneId, Location, LocationWire, validateLocation } from "../../common/primitives.js";
import { cdsFor, entity, Issues } from "../../common/validation.js";
import {
  AcyltransferaseWire,
  ActiveWire,
  AdenylationWire,
  AminotransferaseWire,
  CarrierWire,
  CondensationWire,
  CyclaseWire,
  encodeAcyltransferase,
  encodeActive,
  encodeAdenylation,
  encodeAminotransferase,
  encodeCarrier,
  encodeCondensation,
  encodeCyclase,
  encodeKetoreductase,
  encodeLigase,
  encodeMethyltransferase,
  encodeOtherDomain,
  encodeThioesterase,
  KetoreductaseWire,
  LigaseWire,
  MethyltransferaseWire,
  OtherDomainWire,
  readAcyltransferase,
  readActive,
  readAdenylation,
  readAminotransferase,
  readCarrier,
  readCondensation,
  readCyclase,
  readKetoreductase,
  readLigase,
  readMethyltransferase,
  readOtherDomain,
  readThioesterase,
  ThioesteraseWire,
  validateDomainInfo,
} from "./payloads.js";
import { PAYLOAD_KIND, type DomainType, type InfoOf } from "./types.js";

export interface DomainOf<T extends DomainType> {
  readonly type: T;
  readonly gene: GeneId;
  readonly location: Location;
  readonly info: InfoOf<T>;
}

/** A catalytic domain; the type tag determines the payload */
export type Domain = { [T in DomainType]: DomainOf<T> }[DomainType];

const HEADER = {
  gene: z.string(),
  location: LocationWire,
};

export const DomainWire = z.discriminatedUnion("type", [
  AcyltransferaseWire.extend({ type: z.literal("acyltransferase"), ...HEADER }),
  AdenylationWire.extend({ type: z.literal("adenylation"), ...HEADER }),
  AdenylationWire.extend({ type: z.literal("amp-binding"), ...HEADER }),
  AminotransferaseWire.extend({ type: z.literal("aminotransferase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("branching"), ...HEADER }),
  CarrierWire.extend({ type: z.literal("carrier"), ...HEADER }),
  CondensationWire.extend({ type: z.literal("condensation"), ...HEADER }),
  CyclaseWire.extend({ type: z.literal("cyclase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("dehydratase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("enoylreductase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("epimerase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("hydroxylase"), ...HEADER }),
  KetoreductaseWire.extend({ type: z.literal("ketoreductase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("ketosynthase"), ...HEADER }),
  LigaseWire.extend({ type: z.literal("ligase"), ...HEADER }),
  MethyltransferaseWire.extend({ type: z.literal("methyltransferase"), ...HEADER }),
  OtherDomainWire.extend({ type: z.literal("other"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("oxidase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("product_template"), ...HEADER }),
  ThioesteraseWire.extend({ type: z.literal("thioesterase"), ...HEADER }),
  ActiveWire.extend({ type: z.literal("thioreductase"), ...HEADER }),
]);
export type DomainWire = z.infer<typeof DomainWire>;

function readDomain(raw: DomainWire): Domain {
  const gene = raw.gene;
  const location = Location.read(raw.location);
  switch (raw.type) {
    case "acyltransferase":
      return { type: raw.type, gene, location, info: readAcyltransferase(raw) };
    case "adenylation":
    case "amp-binding":
      return { type: raw.type, gene, location, info: readAdenylation(raw) };
    case "aminotransferase":
      return { type: raw.type, gene, location, info: readAminotransferase(raw) };
    case "carrier":
      return { type: raw.type, gene, location, info: readCarrier(raw) };
    case "condensation":
      return { type: raw.type, gene, location, info: readCondensation(raw) };
    case "cyclase":
      return { type: raw.type, gene, location, info: readCyclase(raw) };
    case "ketoreductase":
      return { type: raw.type, gene, location, info: readKetoreductase(raw) };
    case "ligase":
      return { type: raw.type, gene, location, info: readLigase(raw) };
    case "methyltransferase":
      return { type: raw.type, gene, location, info: readMethyltransferase(raw) };
    case "other":
      return { type: raw.type, gene, location, info: readOtherDomain(raw) };
    case "thioesterase":
      return { type: raw.type, gene, location, info: readThioesterase(raw) };
    case "branching":
    case "dehydratase":
    case "enoylreductase":
    case "epimerase":
    case "hydroxylase":
    case "ketosynthase":
    case "oxidase":
    case "product_template":
    case "thioreductase":
      return { type: raw.type, gene, location, info: readActive(raw) };
  }
}

function encodeDomain(domain: Domain): DomainWire {
  const header = { gene: domain.gene, location: Location.encode(domain.location) };
  switch (domain.type) {
    case "acyltransferase":
      return { type: domain.type, ...header, ...encodeAcyltransferase(domain.info) };
    case "adenylation":
    case "amp-binding":
      return { type: domain.type, ...header, ...encodeAdenylation(domain.info) };
    case "aminotransferase":
      return { type: domain.type, ...header, ...encodeAminotransferase(domain.info) };
    case "carrier":
      return { type: domain.type, ...header, ...encodeCarrier(domain.info) };
    case "condensation":
      return { type: domain.type, ...header, ...encodeCondensation(domain.info) };
    case "cyclase":
      return { type: domain.type, ...header, ...encodeCyclase(domain.info) };
    case "ketoreductase":
      return { type: domain.type, ...header, ...encodeKetoreductase(domain.info) };
    case "ligase":
      return { type: domain.type, ...header, ...encodeLigase(domain.info) };
    case "methyltransferase":
      return { type: domain.type, ...header, ...encodeMethyltransferase(domain.info) };
    case "other":
      return { type: domain.type, ...header, ...encodeOtherDomain(domain.info) };
    case "thioesterase":
      return { type: domain.type, ...header, ...encodeThioesterase(domain.info) };
    case "branching":
    case "dehydratase":
    case "enoylreductase":
    case "epimerase":
    case "hydroxylase":
    case "ketosynthase":
    case "oxidase":
    case "product_template":
    case "thioreductase":
      return { type: domain.type, ...header, ...encodeActive(domain.info) };
  }
}

export const Domain = entity<Domain, DomainWire>({
  name: "domain",
  wire: DomainWire,
  read: readDomain,
  encode: encodeDomain,
  validate: (domain, ctx) => {
    const issues = new Issues();
    issues.check(
      PAYLOAD_KIND[domain.type] === domain.info.kind,
      "type",
      `Payload '${domain.info.kind}' does not match domain type '${domain.type}'`
    );
    issues.nested("gene", GeneId.validate(domain.gene, ctx));
    issues.nested("location", validateLocation(domain.location, ctx, cdsFor(ctx, domain.gene)));
    issues.nested("", validateDomainInfo(domain.info, ctx));
    return issues.list();
  },
});

/**
 * Whether a domain carries a given type tag; narrows to that variant.
 */
export function isDomainOf<T extends DomainType>(
  domain: Domain,
  type: T
): domain is Extract<Domain, { readonly type: T }> {
  return domain.type === type;
}
