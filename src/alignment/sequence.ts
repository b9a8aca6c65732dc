/**
 * Aligned biological sequence with per-sequence and per-position annotations
 *
 * @module alignment/sequence
 */

import { AlignmentShapeError, SequenceError } from "../errors";
import type { Metadata, PositionalMetadata, Presence } from "../types";
import { ABSENT, SequenceType, valueOr } from "../types";
import { countGaps, GAP_CHARACTERS, SequenceValidator, type ValidationMode } from "./alphabet";
import type { SequenceFactory } from "./types";

/**
 * Options for constructing an aligned sequence
 */
export interface AlignedSequenceOptions {
  /** Identifier used in error messages */
  id?: string;
  /** Sequence kind deciding the alphabet (default: protein) */
  type?: SequenceType;
  /** Alphabet strictness (default: normal) */
  validation?: ValidationMode;
  /** Whole-sequence features */
  metadata?: Presence<Metadata>;
  /** Per-position features, each exactly as long as the sequence */
  positionalMetadata?: Presence<PositionalMetadata>;
}

/**
 * One row of a multiple sequence alignment
 *
 * Characters are checked against the alphabet of the sequence kind, and every
 * positional metadata column must cover the whole sequence.
 *
 * @example
 * ```typescript
 * const seq = new AlignedSequence("UGAG-..C", { type: "rna" });
 * seq.length;     // 8
 * seq.degapped(); // "UGAGC"
 * ```
 */
export class AlignedSequence {
  readonly sequence: string;
  readonly type: SequenceType;
  readonly metadata: ReadonlyMap<string, string>;
  readonly positionalMetadata: ReadonlyMap<string, readonly string[]>;

  constructor(sequence: string, options: AlignedSequenceOptions = {}) {
    const id = options.id ?? "unknown";
    this.type = options.type ?? SequenceType.PROTEIN;

    const validator = new SequenceValidator(options.validation ?? "normal", this.type);
    const invalid = validator.invalidCharacters(sequence);
    if (invalid.length > 0) {
      throw new SequenceError(
        `Invalid ${this.type} characters: ${invalid.map((char) => `'${char}'`).join(", ")}`,
        id
      );
    }

    const positional = valueOr(options.positionalMetadata ?? ABSENT, new Map<string, string[]>());
    for (const [feature, values] of positional) {
      if (values.length !== sequence.length) {
        throw AlignmentShapeError.forPositionalMetadata(feature, sequence.length, values.length, id);
      }
    }

    this.sequence = sequence;
    this.metadata = new Map(valueOr(options.metadata ?? ABSENT, new Map<string, string>()));
    this.positionalMetadata = new Map(positional);
  }

  /**
   * Build a factory for parsers that creates sequences of one kind
   */
  static factory(
    type: SequenceType,
    validation: ValidationMode = "normal"
  ): SequenceFactory<AlignedSequence> {
    return (sequence, annotations) =>
      new AlignedSequence(sequence, {
        id: annotations.label,
        type,
        validation,
        metadata: annotations.metadata,
        positionalMetadata: annotations.positionalMetadata,
      });
  }

  get length(): number {
    return this.sequence.length;
  }

  /**
   * Character at a 0-based alignment position
   */
  at(position: number): string | undefined {
    return this.sequence[position];
  }

  gapCount(): number {
    return countGaps(this.sequence);
  }

  /**
   * The sequence with all gap characters removed
   */
  degapped(): string {
    let result = "";
    for (const char of this.sequence) {
      if (!GAP_CHARACTERS.has(char)) result += char;
    }
    return result;
  }

  toString(): string {
    return this.sequence;
  }
}
