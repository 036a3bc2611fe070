/**
 * Biosynthetic class catalog.
 */

export {
  BiosynthesisClass,
  BiosynthesisClassWire,
  SynthesisType,
  biosynthesisClass,
  classReferences,
  type BiosynthesisClassOf,
  type ClassInfo,
  type ClassInfoOf,
} from "./class.js";
export {
  NRPS_SUBCLASSES,
  ReleaseType,
  ReleaseTypeName,
  ReleaseTypeWire,
  type NrpsClassInfo,
} from "./nrps.js";
export { PKS_SUBCLASSES, type PksClassInfo } from "./pks.js";
export {
  Crosslink,
  CrosslinkWire,
  Precursor,
  PrecursorWire,
  RIBOSOMAL_SUBCLASSES,
  RippType,
  validateCrosslink,
  type RibosomalClassInfo,
} from "./ribosomal.js";
export {
  Glycosyltransferase,
  GlycosyltransferaseWire,
  Subcluster,
  SubclusterWire,
  UNMIGRATED_GT_SPECIFICITY,
  type SaccharideClassInfo,
} from "./saccharide.js";
export { TERPENE_SUBCLASSES, TerpenePrecursor, type TerpeneClassInfo } from "./terpene.js";
export { OtherSubclass, otherClassInfo, type OtherClassInfo } from "./other.js";
