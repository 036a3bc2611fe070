/**
 * Legacy v3 to v4 migration.
 */

export { RELEASE_DATES, REVIEW_MESSAGES, convertChangelog, convertRelease } from "./changelog.js";
export {
  ALKALOID_DETAILS,
  LEGACY_CLASS_MAPPING,
  UNDETAILED_OTHER,
  convertBiosynthesis,
  convertOther,
  convertRibosomal,
  convertSaccharide,
  convertTerpene,
} from "./classes.js";
export {
  convertCompleteness,
  convertCompound,
  convertLegacyEntry,
  convertLocus,
  convertTaxonomy,
  type ConvertOptions,
} from "./entry.js";
export { convertEvidence, withoutPredictions } from "./evidence.js";
export { convertAnnotation, convertGeneDomain, convertGenes, convertOperons } from "./genes.js";
export { convertNonCanonical, convertNrpsClass, convertNrpsModules } from "./nrps.js";
export { convertATSubstrate, convertPks, convertPksDomain, type PksConversion } from "./pks.js";
