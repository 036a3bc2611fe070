/**
 * Module catalog.
 */

export {
  MODULE_PAYLOAD_KIND,
  Module,
  ModuleType,
  ModuleWire,
  moduleDomains,
  moduleReferences,
  withGene,
  type AssemblyLine,
  type CalModuleInfo,
  type ModuleInfo,
  type ModuleInfoKind,
  type ModuleInfoOf,
  type ModuleOf,
  type NrpsModuleInfo,
  type OtherModuleInfo,
  type PksIterativeInfo,
  type PksModularInfo,
  type PksModularStarterInfo,
  type PksTransAtInfo,
  type PksTransAtStarterInfo,
} from "./module.js";
export {
  NO_ITERATIONS,
  NonCanonicalActivity,
  NonCanonicalActivityWire,
  UNKNOWN_ITERATIONS,
  UNSPECIFIED_ITERATIONS,
  iterationCount,
  type Iterations,
} from "./activity.js";
