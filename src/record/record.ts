/**
 * Reference sequence records.
 *
 * The entry model only ever asks a record for coding sequences by name and
 * for a few source attributes; loading records from sequence files happens
 * outside this package.
 */

import { MibigError } from "../common/errors.js";
import { sanitizeIdentifier } from "../common/primitives.js";

export interface CodingSequenceInit {
  locusTag?: string;
  gene?: string;
  proteinId?: string;
  translation?: string;
}

/**
 * A coding sequence, addressable by locus tag, gene name or protein id.
 */
export class CodingSequence {
  readonly locusTag?: string;
  readonly gene?: string;
  readonly proteinId?: string;
  readonly translation?: string;

  constructor(init: CodingSequenceInit) {
    const locusTag = init.locusTag ? sanitizeIdentifier(init.locusTag) : undefined;
    const gene = init.gene ? sanitizeIdentifier(init.gene) : undefined;
    const proteinId = init.proteinId ? sanitizeIdentifier(init.proteinId) : undefined;
    if (!locusTag && !gene && !proteinId) {
      throw new MibigError("At least one of locus_tag, gene, or protein_id is required");
    }
    this.locusTag = locusTag || undefined;
    this.gene = gene || undefined;
    this.proteinId = proteinId || undefined;
    this.translation = init.translation || undefined;
  }

  /** Preferred identifier: locus tag, then gene, then protein id */
  get name(): string {
    return this.locusTag ?? this.gene ?? this.proteinId ?? "";
  }

  hasName(name: string): boolean {
    return name === this.locusTag || name === this.gene || name === this.proteinId;
  }

  get translationLength(): number {
    return this.translation?.length ?? 0;
  }
}

/**
 * Lookup surface of a reference record, as used during validation.
 */
export interface SequenceRecord {
  readonly id: string;
  readonly seqLen: number;
  readonly organism?: string;
  readonly ncbiTaxId?: number;
  getCds(name: string): CodingSequence | undefined;
  hasCds(name: string): boolean;
}

export interface InMemoryRecordInit {
  id: string;
  seqLen: number;
  cdses: readonly CodingSequence[];
  organism?: string;
  ncbiTaxId?: number;
}

/**
 * Record held entirely in memory, indexed by every CDS identifier.
 */
export class InMemoryRecord implements SequenceRecord {
  readonly id: string;
  readonly seqLen: number;
  readonly organism?: string;
  readonly ncbiTaxId?: number;
  readonly cdses: readonly CodingSequence[];

  private readonly byLocus = new Map<string, CodingSequence>();
  private readonly byGene = new Map<string, CodingSequence>();
  private readonly byProtein = new Map<string, CodingSequence>();

  constructor(init: InMemoryRecordInit) {
    if (!init.id) {
      throw new MibigError("Record ID is required");
    }
    this.id = init.id;
    this.seqLen = init.seqLen;
    this.organism = init.organism;
    this.ncbiTaxId = init.ncbiTaxId;
    this.cdses = [...init.cdses];

    for (const cds of this.cdses) {
      if (cds.locusTag) this.byLocus.set(cds.locusTag, cds);
      if (cds.gene) this.byGene.set(cds.gene, cds);
      if (cds.proteinId) this.byProtein.set(cds.proteinId, cds);
    }
  }

  getCds(name: string): CodingSequence | undefined {
    return this.byLocus.get(name) ?? this.byGene.get(name) ?? this.byProtein.get(name);
  }

  hasCds(name: string): boolean {
    return this.getCds(name) !== undefined;
  }
}
