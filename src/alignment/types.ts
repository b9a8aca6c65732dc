/**
 * Construction contracts between alignment parsers and alignment containers
 *
 * Parsers collect raw characters and annotations; building validated
 * sequence and alignment objects is delegated to these factories so callers
 * can plug in their own containers.
 *
 * @module alignment/types
 */

import type { Metadata, PositionalMetadata, Presence } from "../types";

/**
 * Everything a parser knows about one sequence besides its characters
 */
export interface SequenceAnnotations {
  /** Label the sequence was declared under */
  readonly label: string;
  /** Per-sequence features, absent when none were annotated */
  readonly metadata: Presence<Metadata>;
  /** Per-sequence per-column features, absent when none were annotated */
  readonly positionalMetadata: Presence<PositionalMetadata>;
}

/**
 * Builds a sequence value from aligned characters, failing on invalid content
 */
export type SequenceFactory<S> = (sequence: string, annotations: SequenceAnnotations) => S;

/**
 * Inputs for building an alignment
 */
export interface AlignmentInit<S> {
  /** Sequences in alignment order */
  readonly sequences: S[];
  /** Alignment-level features, possibly empty */
  readonly metadata: Metadata;
  /** Per-column features of the whole alignment */
  readonly positionalMetadata: Presence<PositionalMetadata>;
  /** Sequence labels, parallel to `sequences` */
  readonly index: string[];
}

/**
 * Builds an alignment, failing on shape mismatches
 */
export type AlignmentFactory<S, A> = (init: AlignmentInit<S>) => A;

/**
 * The pair of collaborators a parser needs
 */
export interface AlignmentFactories<S, A> {
  readonly createSequence: SequenceFactory<S>;
  readonly createAlignment: AlignmentFactory<S, A>;
}
