/**
 * Stockholm parser tests
 *
 * End-to-end behaviour of StockholmParser over strings, streams and files.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { beforeEach, describe, expect, test, vi } from "vitest";
import { AlignedSequence } from "../../src/alignment/sequence";
import {
  AlignmentShapeError,
  FileError,
  ParseError,
  SequenceError,
  StockholmFormatError,
  ValidationError,
} from "../../src/errors";
import { StockholmParser } from "../../src/formats/stockholm";
import { createStream } from "../../src/io/file-reader";
import { lineSourceFromString } from "../../src/io/line-source";

const FIXTURE = fileURLToPath(new URL("../fixtures/rna-family.sto", import.meta.url));
const SAMPLE = readFileSync(FIXTURE, "utf8");

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected an error to be thrown");
}

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe("StockholmParser", () => {
  let parser: StockholmParser;

  beforeEach(() => {
    parser = new StockholmParser({ sequenceType: "rna" });
  });

  describe("Sample alignment", () => {
    test("keeps sequences in data line order", () => {
      const msa = parser.parseAlignment(SAMPLE);

      expect(msa.index).toEqual(["seq-alpha", "seq-beta", "seq-gamma", "seq-delta"]);
      expect(msa.sequenceCount).toBe(4);
      expect(msa.positionCount).toBe(23);
      expect(msa.get("seq-beta")?.sequence).toBe("AGCGUU-AGCAUAGGGGCUCGUA");
      expect(msa.get("seq-beta")?.type).toBe("rna");
    });

    test("collects alignment metadata with the text after the feature", () => {
      const msa = parser.parseAlignment(SAMPLE);

      expect(msa.metadata).toEqual(
        new Map([
          ["RA", "   Author A, Author B;"],
          ["RL", "   Placeholder Journal 1:1-10."],
        ])
      );
    });

    test("splits column annotations into one character per column", () => {
      const msa = parser.parseAlignment(SAMPLE);
      const structure = msa.positionalMetadata.get("SS_cons");

      expect(structure).toHaveLength(23);
      expect(structure?.join("")).toBe(".....<<<<....>>>>......");
      expect(structure?.[5]).toBe("<");
    });

    test("leaves unannotated sequences without metadata", () => {
      const msa = parser.parseAlignment(SAMPLE);
      const alpha = msa.get("seq-alpha");

      expect(alpha?.metadata.size).toBe(0);
      expect(alpha?.positionalMetadata.size).toBe(0);
    });

    test("reading the same source twice gives the same alignment", () => {
      const source = lineSourceFromString(SAMPLE);

      const first = parser.read(source);
      const second = parser.read(source);

      expect(second.index).toEqual(first.index);
      expect(second.sequences.map((seq) => seq.sequence)).toEqual(
        first.sequences.map((seq) => seq.sequence)
      );
      expect(second.metadata).toEqual(first.metadata);
      expect(second.positionalMetadata).toEqual(first.positionalMetadata);
    });
  });

  describe("Markup", () => {
    test("joins repeated #=GF features with a space", () => {
      const msa = parser.parseAlignment("#=GF CC first part\n#=GF CC second part\ns1 ACGU\n");
      expect(msa.metadata.get("CC")).toBe("first part second part");
    });

    test("accepts #=GR lines before their data line", () => {
      const msa = parser.parseAlignment("# STOCKHOLM 1.0\n#=GR s1 SS ..<>\ns1 ACGU\n//\n");
      expect(msa.get("s1")?.positionalMetadata.get("SS")).toEqual([".", ".", "<", ">"]);
    });

    test("attaches #=GS features to their sequence", () => {
      const msa = parser.parseAlignment("s1 ACGU\ns2 ACGA\n#=GS s2 AC P00001\n");

      expect(msa.get("s2")?.metadata.get("AC")).toBe("P00001");
      expect(msa.get("s1")?.metadata.size).toBe(0);
    });

    test("reports #=GS lines dropped under when-empty", () => {
      const onWarning = vi.fn();
      const warned = new StockholmParser({ sequenceType: "rna", onWarning });

      const msa = warned.parseAlignment(
        "s1 ACGU\n#=GS s1 AC P1\n#=GS s1 DE first\n#=GS s1 OS second\n"
      );

      expect(msa.get("s1")?.metadata).toEqual(new Map([["AC", "P1"]]));
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith(
        "Ignoring further #=GS lines for 's1': only the first #=GS line of a sequence is kept",
        3
      );
    });

    test("concatenates #=GS features when asked to", () => {
      const concatenating = new StockholmParser({
        sequenceType: "rna",
        gsMergeStrategy: "concatenate",
      });

      const msa = concatenating.parseAlignment("s1 ACGU\n#=GS s1 DE one\n#=GS s1 DE two\n");

      expect(msa.get("s1")?.metadata.get("DE")).toBe("one two");
    });

    test("rejects repeated #=GS features when asked to", () => {
      const strict = new StockholmParser({
        sequenceType: "rna",
        gsMergeStrategy: "reject-duplicates",
      });

      const error = captureError(() =>
        strict.parseAlignment("s1 ACGU\n#=GS s1 DE one\n#=GS s1 DE two\n")
      );

      expect(error).toBeInstanceOf(StockholmFormatError);
      expect(error).toMatchObject({ violation: "DuplicateSequenceFeature", lineNumber: 3 });
    });
  });

  describe("Format errors", () => {
    test("rejects a label used on two data lines", () => {
      const error = captureError(() =>
        parser.parseAlignment("# STOCKHOLM 1.0\ns1 ACGU\ns1 ACGU\n//\n")
      );

      expect(error).toBeInstanceOf(StockholmFormatError);
      expect(error).toMatchObject({
        violation: "DuplicateSequenceLabel",
        lineNumber: 3,
        message: "Found multiple data lines under same name: 's1'",
      });
    });

    test("rejects markup for a label without a data line", () => {
      const error = captureError(() => parser.parseAlignment("#=GS ghost AC X1\ns1 ACGU\n"));

      expect(error).toMatchObject({
        violation: "UndeclaredSequenceReference",
        lineNumber: 1,
        message: "Markup line references nonexistent data 'ghost'",
      });
    });

    test("rejects a repeated #=GC feature", () => {
      const error = captureError(() =>
        parser.parseAlignment("s1 ACGU\n#=GC SS_cons ....\n#=GC SS_cons ....\n")
      );

      expect(error).toMatchObject({
        violation: "DuplicateColumnFeature",
        lineNumber: 3,
        message: "Found duplicate GC label 'SS_cons'",
      });
    });

    test("rejects a repeated #=GR feature for one sequence", () => {
      const error = captureError(() =>
        parser.parseAlignment("s1 ACGU\n#=GR s1 SS ....\n#=GR s1 SS ....\n")
      );

      expect(error).toMatchObject({
        violation: "DuplicateSequenceColumnFeature",
        message: "Found duplicate GR label 'SS' associated with data label 's1'",
      });
    });

    test("rejects input without data lines", () => {
      const error = captureError(() => parser.parseAlignment("# STOCKHOLM 1.0\n//\n"));

      expect(error).toBeInstanceOf(StockholmFormatError);
      expect(error).toMatchObject({
        violation: "EmptyAlignment",
        message: "No data present in file",
      });
    });

    test("treats empty input as an empty alignment", () => {
      expect(() => parser.parseAlignment("")).toThrow("No data present in file");
    });

    test("requires the signature only when configured", () => {
      const strict = new StockholmParser({ sequenceType: "rna", requireSignature: true });

      expect(parser.parseAlignment("s1 ACGU\n").sequenceCount).toBe(1);
      expect(captureError(() => strict.parseAlignment("s1 ACGU\n"))).toMatchObject({
        violation: "MissingSignature",
        lineNumber: 1,
      });
      expect(captureError(() => strict.parseAlignment(""))).toMatchObject({
        violation: "MissingSignature",
      });
    });

    test("accepts a signature after a byte-order mark", () => {
      const strict = new StockholmParser({ sequenceType: "rna", requireSignature: true });
      const msa = strict.parseAlignment("\uFEFF# STOCKHOLM 1.0\ns1 ACGU\n//\n");

      expect(msa.index).toEqual(["s1"]);
    });

    test("rejects lines over maxLineLength", () => {
      const short = new StockholmParser({ sequenceType: "rna", maxLineLength: 10 });

      expect(captureError(() => short.parseAlignment(SAMPLE))).toMatchObject({
        violation: "LineTooLong",
        lineNumber: 1,
        line: "# STOCKHOLM 1.0",
        message: "Line too long (15 > 10)",
      });
    });

    test("keeps only the start of an over-long line in the error", () => {
      const short = new StockholmParser({ sequenceType: "rna", maxLineLength: 150 });
      const error = captureError(() => short.parseAlignment(`s1 ACGU\ns2 ${"A".repeat(200)}\n`));

      expect(error).toMatchObject({
        violation: "LineTooLong",
        lineNumber: 2,
        line: `s2 ${"A".repeat(97)}`,
        message: "Line too long (203 > 150)",
      });
    });

    test("omits line numbers when tracking is off", () => {
      const untracked = new StockholmParser({ sequenceType: "rna", trackLineNumbers: false });
      const error = captureError(() => untracked.parseAlignment("s1 ACGU\ns1 ACGU\n"));

      expect(error).toMatchObject({ violation: "DuplicateSequenceLabel", lineNumber: undefined });
    });
  });

  describe("Alignment errors", () => {
    test("rejects sequences of different lengths", () => {
      const error = captureError(() => parser.parseAlignment("s1 ACGU\ns2 ACG\n"));

      expect(error).toBeInstanceOf(AlignmentShapeError);
      expect(error).toMatchObject({
        message: "Sequence 's2' has length 3, expected 4 to match the alignment",
      });
    });

    test("rejects column annotations that do not cover the alignment", () => {
      expect(() => parser.parseAlignment("#=GC SS ..\ns1 ACGU\n")).toThrow(
        "Positional metadata 'SS' on alignment has 2 values, expected 4"
      );
    });

    test("rejects sequence annotations that do not cover the sequence", () => {
      expect(() => parser.parseAlignment("#=GR s1 SS ...\ns1 ACGU\n")).toThrow(
        "Positional metadata 'SS' on sequence 's1' has 3 values, expected 4"
      );
    });

    test("validates characters against the sequence type", () => {
      const dna = new StockholmParser({ sequenceType: "dna" });
      const error = captureError(() => dna.parseAlignment("s1 ACGU\n"));

      expect(error).toBeInstanceOf(SequenceError);
      expect(error).toMatchObject({ message: "Sequence 's1': Invalid dna characters: 'U'" });
    });

    test("skips character validation when asked to", () => {
      const lenient = new StockholmParser({ sequenceType: "dna", skipValidation: true });
      expect(lenient.parseAlignment("s1 ACGU\n").get("s1")?.sequence).toBe("ACGU");
    });

    test("defaults to protein sequences", () => {
      const msa = new StockholmParser().parseAlignment("s1 MKV-LA\n");
      expect(msa.get("s1")?.type).toBe("protein");
    });

    test("uses a custom sequence factory", () => {
      const upper = new StockholmParser({
        sequenceFactory: (sequence, annotations) =>
          new AlignedSequence(sequence.toUpperCase(), { id: annotations.label, type: "rna" }),
      });

      expect(upper.parseAlignment("s1 acgu\n").get("s1")?.sequence).toBe("ACGU");
    });
  });

  describe("Options", () => {
    test("rejects a non-positive maxLineLength", () => {
      expect(() => new StockholmParser({ maxLineLength: 0 })).toThrow(ValidationError);
    });

    test("rejects a maxLineLength above the ceiling", () => {
      expect(() => new StockholmParser({ maxLineLength: 600_000_000 })).toThrow(ValidationError);
    });

    test("stops when the signal is aborted", () => {
      const controller = new AbortController();
      const abortable = new StockholmParser({ sequenceType: "rna", signal: controller.signal });
      controller.abort();

      const error = captureError(() => abortable.parseAlignment(SAMPLE));

      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ message: "Operation was aborted", format: "ABORTED" });
    });
  });

  describe("Input sources", () => {
    test("parseString yields exactly one alignment", async () => {
      const alignments = await collect(parser.parseString(SAMPLE));

      expect(alignments).toHaveLength(1);
      expect(alignments[0]?.index).toEqual(["seq-alpha", "seq-beta", "seq-gamma", "seq-delta"]);
    });

    test("parse reads lines split across stream chunks", async () => {
      const half = Math.floor(SAMPLE.length / 2);
      const alignments = await collect(
        parser.parse(streamOf(SAMPLE.slice(0, half), SAMPLE.slice(half)))
      );

      expect(alignments).toHaveLength(1);
      expect(alignments[0]?.get("seq-gamma")?.sequence).toBe("GCCGUUCAGCAUA-GAACGCGUA");
      expect(alignments[0]?.metadata.get("RL")).toBe("   Placeholder Journal 1:1-10.");
    });

    test("parse reports over-long stream lines as format errors", async () => {
      const short = new StockholmParser({ sequenceType: "rna", maxLineLength: 10 });

      await expect(collect(short.parse(streamOf("# STOCKHOLM 1.0\n")))).rejects.toMatchObject({
        violation: "LineTooLong",
        lineNumber: 1,
        line: "# STOCKHOLM 1.0",
        message: "Line too long (15 > 10)",
      });
    });

    test("parse numbers an over-long line after shorter ones in the same chunk", async () => {
      const short = new StockholmParser({ sequenceType: "rna", maxLineLength: 10 });

      await expect(
        collect(short.parse(streamOf("s1 ACGU\ns2 ACGU\n#=GF DE too long here\n//\n")))
      ).rejects.toMatchObject({
        violation: "LineTooLong",
        lineNumber: 3,
        line: "#=GF DE too long here",
        message: "Line too long (21 > 10)",
      });
    });

    test("parse reads a stream opened on a file", async () => {
      const alignments = await collect(parser.parse(await createStream(FIXTURE)));

      expect(alignments).toHaveLength(1);
      expect(alignments[0]?.index).toEqual(["seq-alpha", "seq-beta", "seq-gamma", "seq-delta"]);
    });

    test("parse stops when the signal is aborted", async () => {
      const controller = new AbortController();
      const abortable = new StockholmParser({ signal: controller.signal });
      controller.abort();

      await expect(collect(abortable.parse(streamOf(SAMPLE)))).rejects.toThrow(
        "Operation aborted during Stockholm stream read"
      );
    });

    test("parseFile reads a Stockholm file", async () => {
      const alignments = await collect(parser.parseFile(FIXTURE));

      expect(alignments).toHaveLength(1);
      expect(alignments[0]?.positionalMetadata.get("SS_cons")).toHaveLength(23);
    });

    test("parseFile reports missing files", async () => {
      await expect(collect(parser.parseFile("/nonexistent/family.sto"))).rejects.toBeInstanceOf(
        FileError
      );
    });

    test("parseFile rejects an empty path", async () => {
      await expect(collect(parser.parseFile(""))).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
