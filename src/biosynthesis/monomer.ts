/**
 * Monomers: building blocks integrated by a module or used as a starter unit.
 */

import { z } from "zod";
import {
  CitationList,
  encodeCitations,
  readCitations,
  validateCitationList,
  type Citation,
} from "../common/citation.js";
import { isValidCompoundName, validateSmiles, type Smiles } from "../common/primitives.js";
import { entity, Issues } from "../common/validation.js";

export const MonomerWire = z.object({
  name: z.string(),
  structure: z.string(),
  references: CitationList,
});
export type MonomerWire = z.infer<typeof MonomerWire>;

export interface Monomer {
  readonly name: string;
  readonly structure: Smiles;
  readonly references: readonly Citation[];
}

export const Monomer = entity<Monomer, MonomerWire>({
  name: "monomer",
  wire: MonomerWire,
  read: (raw) => ({ name: raw.name, structure: raw.structure, references: readCitations(raw.references) }),
  encode: (monomer) => ({
    name: monomer.name,
    structure: monomer.structure,
    references: encodeCitations(monomer.references),
  }),
  validate: (monomer, ctx) =>
    new Issues()
      .check(isValidCompoundName(monomer.name), "name", `Invalid name: ${monomer.name}`)
      .nested("structure", validateSmiles(monomer.structure))
      .nested("references", validateCitationList(monomer.references, ctx))
      .list(),
});
