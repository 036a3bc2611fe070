/**
 * Entry aggregate.
 */

export { ACCESSION_PATTERN, MibigEntry, MibigEntryWire, entryContext, entryReferences } from "./entry.js";
export { Locus, LocusWire, MIBIG_ACCESSION_PREFIX, Taxonomy, TaxonomyWire } from "./locus.js";
