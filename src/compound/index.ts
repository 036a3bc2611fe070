/**
 * Compound model.
 */

export {
  Assay,
  AssayWire,
  Bioactivity,
  BioactivityWire,
  COMPOUND_DATABASE_PATTERNS,
  Compound,
  CompoundRef,
  CompoundWire,
  compoundReferences,
  formulaParts,
  knownCompoundClasses,
  parseCompoundRef,
  validateFormula,
  type FormulaPart,
} from "./compound.js";
