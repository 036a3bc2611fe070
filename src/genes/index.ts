/**
 * Gene curation model.
 */

export {
  AMINO_ACIDS,
  Addition,
  AdditionWire,
  Annotation,
  AnnotationWire,
  Deletion,
  DeletionWire,
  GeneLocation,
  GeneLocationWire,
  Genes,
  GenesWire,
  annotationReferences,
  isEmptyGenes,
} from "./genes.js";
export {
  GeneFunction,
  GeneFunctionName,
  GeneFunctionWire,
  MITE_REFERENCE_PATTERN,
  MutationPhenotype,
  MutationPhenotypeWire,
  TailoringFunction,
  TailoringFunctionName,
  TailoringFunctionWire,
  geneFunctionReferences,
} from "./functions.js";
