/**
 * Reading a Stockholm alignment
 *
 * Shows the parser on an in-memory alignment, the #=GS merge strategies and
 * how format errors report the offending line.
 */

import {
  detectStockholmFormat,
  StockholmFormatError,
  StockholmParser,
  type StockholmViolation,
} from "../src/index";

const alignment = `# STOCKHOLM 1.0
#=GF ID    demo-family
#=GF DE    Small RNA family used in examples
#=GS seq-one AC X00001.1

seq-one    ACGGUUCAGCUAGGAACUCG
seq-two    AGCGUU-AGCAUAGG-CUCG
#=GR seq-two PP 999999.9999999.99999
#=GC SS_cons ...<<<<....>>>>.....
//
`;

// ============================================================================
// Example 1: Parse an alignment
// ============================================================================

function example1_parse(): void {
  console.log("\n=== Example 1: Parse an alignment ===\n");

  if (!detectStockholmFormat(alignment)) {
    throw new Error("Not a Stockholm alignment");
  }

  const msa = new StockholmParser({ sequenceType: "rna" }).parseAlignment(alignment);

  console.log(`${msa.sequenceCount} sequences x ${msa.positionCount} columns`);
  for (const [label, seq] of msa.entries()) {
    console.log(`  ${label}: ${seq.sequence} (${seq.gapCount()} gaps)`);
  }
  console.log(`Structure: ${msa.positionalMetadata.get("SS_cons")?.join("")}`);
  console.log(`Description:${msa.metadata.get("DE")}`);
}

// ============================================================================
// Example 2: Repeated #=GS lines
// ============================================================================

function example2_gsMerge(): void {
  console.log("\n=== Example 2: Repeated #=GS lines ===\n");

  const annotated = "s1 ACGU\n#=GS s1 DE first half\n#=GS s1 DE second half\n";

  const keepFirst = new StockholmParser({
    sequenceType: "rna",
    onWarning: (warning, lineNumber) => console.log(`  warning (line ${lineNumber}): ${warning}`),
  });
  console.log("when-empty:", keepFirst.parseAlignment(annotated).get("s1")?.metadata);

  const concatenate = new StockholmParser({ sequenceType: "rna", gsMergeStrategy: "concatenate" });
  console.log("concatenate:", concatenate.parseAlignment(annotated).get("s1")?.metadata);
}

// ============================================================================
// Example 3: Format errors
// ============================================================================

function example3_errors(): void {
  console.log("\n=== Example 3: Format errors ===\n");

  const broken = "s1 ACGU\n#=GR s2 SS ....\n";
  try {
    new StockholmParser({ sequenceType: "rna" }).parseAlignment(broken);
  } catch (error) {
    if (error instanceof StockholmFormatError) {
      const violation: StockholmViolation = error.violation;
      console.log(`${violation} at line ${error.lineNumber}: ${error.message}`);
      console.log(error.toString());
    } else {
      throw error;
    }
  }
}

example1_parse();
example2_gsMerge();
example3_errors();
