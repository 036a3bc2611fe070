/**
 * Catalytic domain catalog.
 */

export * from "./types.js";
export {
  ATSubstrate,
  ATSubstrateName,
  ATSubstrateWire,
  AdenylationSubstrate,
  AdenylationSubstrateWire,
  adenylationSubstrate,
  isProteinogenic,
  proteinogenicStructure,
} from "./substrates.js";
export {
  DOMAIN_SUBTYPES,
  KR_STEREOCHEMISTRY,
  activeInfo,
  domainEvidence,
  domainOwnReferences,
  domainReferences,
  domainSubstrates,
  domainSubtype,
  otherDomainInfo,
  validateDomainInfo,
  type SubstrateSummary,
} from "./payloads.js";
export { Domain, DomainWire, isDomainOf, type DomainOf } from "./domain.js";
