import { describe, expect, test } from "vitest";
import { SequenceValidator } from "../../src/alignment/alphabet";
import { AlignedSequence } from "../../src/alignment/sequence";
import { AlignmentShapeError, SequenceError } from "../../src/errors";
import { ABSENT, present } from "../../src/types";

describe("AlignedSequence", () => {
  test("exposes positions, gaps and the degapped sequence", () => {
    const seq = new AlignedSequence("UGAG-..C", { type: "rna" });

    expect(seq.length).toBe(8);
    expect(seq.at(4)).toBe("-");
    expect(seq.at(8)).toBeUndefined();
    expect(seq.gapCount()).toBe(3);
    expect(seq.degapped()).toBe("UGAGC");
    expect(String(seq)).toBe("UGAG-..C");
  });

  test("defaults to protein", () => {
    expect(new AlignedSequence("MKV").type).toBe("protein");
  });

  test("rejects characters outside the alphabet", () => {
    expect(() => new AlignedSequence("ACGZ", { id: "s1", type: "dna" })).toThrow(SequenceError);
    expect(() => new AlignedSequence("ACGZ", { id: "s1", type: "dna" })).toThrow(
      "Sequence 's1': Invalid dna characters: 'Z'"
    );
  });

  test("applies the validation mode", () => {
    expect(() => new AlignedSequence("ACGN", { type: "dna", validation: "strict" })).toThrow(
      "Invalid dna characters: 'N'"
    );
    expect(new AlignedSequence("ACGN", { type: "dna" }).sequence).toBe("ACGN");
    expect(new AlignedSequence("AC?Z", { type: "dna", validation: "permissive" }).sequence).toBe(
      "AC?Z"
    );
  });

  test("copies annotations", () => {
    const seq = new AlignedSequence("AC", {
      metadata: present(new Map([["AC", "P1"]])),
      positionalMetadata: present(new Map([["SS", ["<", ">"]]])),
    });

    expect(seq.metadata.get("AC")).toBe("P1");
    expect(seq.positionalMetadata.get("SS")).toEqual(["<", ">"]);
  });

  test("rejects positional metadata of the wrong length", () => {
    const build = (): AlignedSequence =>
      new AlignedSequence("ACGU", {
        id: "s1",
        type: "rna",
        positionalMetadata: present(new Map([["SS", ["<", ">"]]])),
      });

    expect(build).toThrow(AlignmentShapeError);
    expect(build).toThrow("Positional metadata 'SS' on sequence 's1' has 2 values, expected 4");
  });

  test("factory builds sequences from parser annotations", () => {
    const create = AlignedSequence.factory("rna");
    const seq = create("ACGU", {
      label: "s1",
      metadata: present(new Map([["AC", "X1"]])),
      positionalMetadata: ABSENT,
    });

    expect(seq.type).toBe("rna");
    expect(seq.metadata.get("AC")).toBe("X1");
    expect(seq.positionalMetadata.size).toBe(0);
    expect(() => create("ACGT", { label: "s2", metadata: ABSENT, positionalMetadata: ABSENT })).toThrow(
      "Sequence 's2': Invalid rna characters: 'T'"
    );
  });
});

describe("SequenceValidator", () => {
  test("lists distinct invalid characters in order", () => {
    const validator = new SequenceValidator("normal", "rna");

    expect(validator.validate("UGAG-..N")).toBe(true);
    expect(validator.invalidCharacters("UGTXT")).toEqual(["T", "X"]);
  });

  test("is case-insensitive", () => {
    expect(new SequenceValidator("strict", "dna").validate("acgt")).toBe(true);
  });
});
