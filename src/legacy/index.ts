/**
 * Legacy (v3) document reader.
 */

export {
  LegacyDocument,
  describeLegacyClass,
  readLegacyDocument,
  type LegacyAnnotation,
  type LegacyChange,
  type LegacyCluster,
  type LegacyGeneDomain,
  type LegacyGenes,
  type LegacyLoci,
  type LegacyNonCanonical,
  type LegacyNrp,
  type LegacyNrpsGene,
  type LegacyNrpsModule,
  type LegacyPksModule,
  type LegacyPolyketide,
  type LegacyPrecursorGene,
  type LegacyRipp,
  type LegacySaccharide,
  type LegacySpecificity,
  type LegacySynthase,
  type LegacyTerpene,
} from "./model.js";
