/**
 * Stockholm alignment assembly
 *
 * Turns the records collected by both passes into sequence values and the
 * final alignment through the caller's factories.
 *
 * @module stockholm/assembly
 */

import type { AlignmentFactories } from "../../alignment/types";
import { StockholmFormatError } from "../../errors";
import { presentIfPopulated } from "../../types";
import type { StockholmSession } from "./types";

/**
 * Build the alignment from a fully scanned session
 *
 * Sequences are constructed in label order. Empty per-sequence mappings and
 * an empty column annotation mapping are handed over as absent; alignment
 * metadata is handed over as collected, even when empty.
 *
 * @throws {StockholmFormatError} EmptyAlignment when no data line was found
 */
export function assembleAlignment<S, A>(
  session: StockholmSession,
  factories: AlignmentFactories<S, A>
): A {
  if (session.records.size === 0) {
    throw new StockholmFormatError("No data present in file", "EmptyAlignment");
  }

  const sequences: S[] = [];
  for (const record of session.records.values()) {
    sequences.push(
      factories.createSequence(record.sequence, {
        label: record.label,
        metadata: presentIfPopulated(record.metadata),
        positionalMetadata: presentIfPopulated(record.positionalMetadata),
      })
    );
  }

  return factories.createAlignment({
    sequences,
    metadata: session.metadata,
    positionalMetadata: presentIfPopulated(session.columnMetadata),
    index: [...session.records.keys()],
  });
}
