/**
 * Tabular multiple sequence alignment container
 *
 * Rows are aligned sequences addressed by label or position; columns carry
 * optional per-column annotations. Shape is checked on construction.
 *
 * @module alignment/tabular-msa
 */

import { AlignmentShapeError, ValidationError } from "../errors";
import type { Metadata, PositionalMetadata, Presence } from "../types";
import { ABSENT, valueOr } from "../types";
import type { AlignedSequence } from "./sequence";
import type { AlignmentFactory } from "./types";

/**
 * Options for constructing a tabular alignment
 */
export interface TabularMSAOptions {
  /** Alignment-level features */
  metadata?: Metadata;
  /** Per-column features, each exactly as long as the alignment */
  positionalMetadata?: Presence<PositionalMetadata>;
  /** Row labels; defaults to "0", "1", … */
  index?: string[];
}

/**
 * Multiple sequence alignment of equal-length sequences of one kind
 *
 * @example
 * ```typescript
 * const msa = new TabularMSA(
 *   [new AlignedSequence("AC-G", { type: "dna" }), new AlignedSequence("ACTG", { type: "dna" })],
 *   { index: ["a", "b"] }
 * );
 * msa.positionCount;      // 4
 * msa.column(2);          // ["-", "T"]
 * msa.get("b")?.sequence; // "ACTG"
 * ```
 */
export class TabularMSA implements Iterable<AlignedSequence> {
  readonly sequences: readonly AlignedSequence[];
  readonly metadata: ReadonlyMap<string, string>;
  readonly positionalMetadata: ReadonlyMap<string, readonly string[]>;
  readonly index: readonly string[];
  private readonly rowsByLabel: Map<string, number>;

  constructor(sequences: AlignedSequence[], options: TabularMSAOptions = {}) {
    const index = options.index ?? sequences.map((_, i) => String(i));
    if (index.length !== sequences.length) {
      throw new AlignmentShapeError(
        `Index has ${index.length} labels for ${sequences.length} sequences`,
        sequences.length,
        index.length
      );
    }

    const rowsByLabel = new Map<string, number>();
    index.forEach((label, row) => {
      if (rowsByLabel.has(label)) {
        throw new ValidationError(`Duplicate alignment label '${label}'`);
      }
      rowsByLabel.set(label, row);
    });

    const first = sequences[0];
    const positionCount = first?.length ?? 0;
    sequences.forEach((sequence, row) => {
      const label = index[row] ?? String(row);
      if (first !== undefined && sequence.type !== first.type) {
        throw new ValidationError(
          `Sequence '${label}' is ${sequence.type}, but the alignment holds ${first.type} sequences`
        );
      }
      if (sequence.length !== positionCount) {
        throw AlignmentShapeError.forSequenceLength(label, positionCount, sequence.length);
      }
    });

    const positional = valueOr(options.positionalMetadata ?? ABSENT, new Map<string, string[]>());
    for (const [feature, values] of positional) {
      if (values.length !== positionCount) {
        throw AlignmentShapeError.forPositionalMetadata(feature, positionCount, values.length);
      }
    }

    this.sequences = [...sequences];
    this.index = [...index];
    this.metadata = new Map(options.metadata ?? []);
    this.positionalMetadata = new Map(positional);
    this.rowsByLabel = rowsByLabel;
  }

  /**
   * Factory for parsers producing TabularMSA from assembled pieces
   */
  static readonly factory: AlignmentFactory<AlignedSequence, TabularMSA> = (init) =>
    new TabularMSA(init.sequences, {
      metadata: init.metadata,
      positionalMetadata: init.positionalMetadata,
      index: init.index,
    });

  get sequenceCount(): number {
    return this.sequences.length;
  }

  get positionCount(): number {
    return this.sequences[0]?.length ?? 0;
  }

  /**
   * Sequence stored under a label
   */
  get(label: string): AlignedSequence | undefined {
    const row = this.rowsByLabel.get(label);
    return row === undefined ? undefined : this.sequences[row];
  }

  /**
   * Sequence at a 0-based row
   */
  at(row: number): AlignedSequence | undefined {
    return this.sequences[row];
  }

  has(label: string): boolean {
    return this.rowsByLabel.has(label);
  }

  /**
   * Characters of every sequence at a 0-based position, in row order
   */
  column(position: number): string[] {
    if (!Number.isInteger(position) || position < 0 || position >= this.positionCount) {
      throw new ValidationError(
        `Column ${position} is outside the alignment (0-${this.positionCount - 1})`
      );
    }
    return this.sequences.map((sequence) => sequence.sequence.charAt(position));
  }

  [Symbol.iterator](): Iterator<AlignedSequence> {
    return this.sequences[Symbol.iterator]();
  }

  /**
   * Labelled rows, in alignment order
   */
  *entries(): IterableIterator<[string, AlignedSequence]> {
    for (let row = 0; row < this.sequences.length; row++) {
      const sequence = this.sequences[row];
      const label = this.index[row];
      if (sequence !== undefined && label !== undefined) {
        yield [label, sequence];
      }
    }
  }
}
