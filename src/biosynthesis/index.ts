/**
 * Biosynthesis model: domains, modules, classes, operons and paths.
 */

export * from "./domains/index.js";
export * from "./modules/index.js";
export * from "./classes/index.js";
export { Monomer, MonomerWire } from "./monomer.js";
export { Operon, OperonWire } from "./operon.js";
export {
  ORDERED_SEPARATOR,
  Path,
  PathWire,
  Product,
  ProductWire,
  UNORDERED_SEPARATOR,
  formatSteps,
  parseSteps,
  stepModules,
  validateSteps,
  type Steps,
} from "./path.js";
export {
  Biosynthesis,
  BiosynthesisWire,
  biosynthesisReferences,
  genesReferenced,
} from "./biosynthesis.js";
