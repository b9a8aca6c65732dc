/**
 * Alignment container module exports
 *
 * @example
 * ```typescript
 * import { AlignedSequence, TabularMSA } from "alignkit";
 *
 * const msa = new TabularMSA([new AlignedSequence("AC-G", { type: "dna" })], { index: ["seq1"] });
 * ```
 *
 * @module alignment
 */

export {
  countGaps,
  GAP_CHARACTERS,
  IUPAC_DNA,
  IUPAC_PROTEIN,
  IUPAC_RNA,
  SequenceTypeSchema,
  SequenceValidator,
  ValidationMode,
} from "./alphabet";
export { AlignedSequence, type AlignedSequenceOptions } from "./sequence";
export { TabularMSA, type TabularMSAOptions } from "./tabular-msa";
export type {
  AlignmentFactories,
  AlignmentFactory,
  AlignmentInit,
  SequenceAnnotations,
  SequenceFactory,
} from "./types";
