/**
 * Sequence alphabets for aligned biological sequences
 *
 * Character validation for DNA, RNA and protein sequences using IUPAC codes,
 * with both gap characters used in alignments ('-' and '.'). Validation
 * strictness is configurable from standard residues only up to anything goes.
 *
 * @module alphabet
 */

import { type } from "arktype";
import { SequenceType } from "../types";

// =============================================================================
// IUPAC PATTERN CONSTANTS
// =============================================================================

/**
 * IUPAC DNA pattern including all standard bases, ambiguity codes and gaps
 *
 * - A, C, G, T: Standard nucleotide bases
 * - R, Y, S, W, K, M: Two-base ambiguity codes
 * - B, D, H, V: Three-base ambiguity codes
 * - N: Any base
 * - Dash, dot: Gap characters
 */
export const IUPAC_DNA: RegExp = /^[ACGTRYSWKMBDHVN.-]*$/i;

/**
 * IUPAC RNA pattern: uracil in place of thymine
 */
export const IUPAC_RNA: RegExp = /^[ACGURYSWKMBDHVN.-]*$/i;

/**
 * IUPAC protein pattern
 *
 * The 20 standard amino acids, selenocysteine (U), pyrrolysine (O), the
 * ambiguity codes B, Z, J and X, the stop codon '*' and both gap characters.
 */
export const IUPAC_PROTEIN: RegExp = /^[ACDEFGHIKLMNPQRSTVWYUOBZJX*.-]*$/i;

const STRICT_PATTERNS: Record<SequenceType, RegExp> = {
  dna: /^[ACGT.-]*$/i,
  rna: /^[ACGU.-]*$/i,
  protein: /^[ACDEFGHIKLMNPQRSTVWY*.-]*$/i,
};

const NORMAL_PATTERNS: Record<SequenceType, RegExp> = {
  dna: IUPAC_DNA,
  rna: IUPAC_RNA,
  protein: IUPAC_PROTEIN,
};

/**
 * Characters that mark an alignment gap
 */
export const GAP_CHARACTERS: ReadonlySet<string> = new Set(["-", "."]);

// =============================================================================
// VALIDATION MODES
// =============================================================================

/**
 * Validation modes for different levels of sequence strictness
 */
export const ValidationMode = {
  /** Only standard residues and gaps */
  STRICT: "strict",
  /** Standard residues plus IUPAC ambiguity codes (recommended) */
  NORMAL: "normal",
  /** Accept any character */
  PERMISSIVE: "permissive",
} as const;

/**
 * Type for validation mode values
 */
export type ValidationMode = (typeof ValidationMode)[keyof typeof ValidationMode];

/**
 * Sequence type schema for runtime type checking
 */
export const SequenceTypeSchema = type('"dna"|"rna"|"protein"');

// =============================================================================
// SEQUENCE VALIDATOR CLASS
// =============================================================================

/**
 * Instance-based validator for one sequence kind and strictness level
 *
 * @example
 * ```typescript
 * const validator = new SequenceValidator(ValidationMode.NORMAL, SequenceType.RNA);
 * validator.validate("UGAG-..N"); // true
 * validator.invalidCharacters("UGTX"); // ["T", "X"]
 * ```
 */
export class SequenceValidator {
  private readonly validationPattern: RegExp;

  constructor(
    public readonly mode: ValidationMode = "normal",
    public readonly type: SequenceType = SequenceType.PROTEIN
  ) {
    this.validationPattern = this.computeValidationPattern();
  }

  /**
   * Check whether every character belongs to the alphabet
   */
  validate(sequence: string): boolean {
    return this.validationPattern.test(sequence);
  }

  /**
   * Distinct characters outside the alphabet, in order of first appearance
   */
  invalidCharacters(sequence: string): string[] {
    if (this.mode === "permissive") return [];

    const invalid = new Set<string>();
    for (const char of sequence) {
      if (!this.validationPattern.test(char)) {
        invalid.add(char);
      }
    }
    return [...invalid];
  }

  private computeValidationPattern(): RegExp {
    switch (this.mode) {
      case "permissive":
        return /^[\s\S]*$/;
      case "strict":
        return STRICT_PATTERNS[this.type];
      case "normal":
        return NORMAL_PATTERNS[this.type];
    }
  }
}

/**
 * Count gap characters in an aligned sequence
 */
export function countGaps(sequence: string): number {
  let gaps = 0;
  for (const char of sequence) {
    if (GAP_CHARACTERS.has(char)) gaps++;
  }
  return gaps;
}
