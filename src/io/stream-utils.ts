/**
 * Stream processing utilities for text data
 *
 * Turns byte streams into lines with proper buffering across chunk
 * boundaries and bounded line length.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const DEFAULT_MAX_LINE_LENGTH = 10_000_000;
const LINE_PREVIEW_LENGTH = 100;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles line buffering properly to ensure complete lines are yielded
 * even when chunks don't align with line boundaries. A final line without a
 * terminator is yielded unless it is blank. Every line before an over-long
 * one is yielded first, so callers counting lines know where it failed.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding to use (default: 'utf8')
 * @param maxLineLength Longest line accepted before failing
 * @yields Complete lines of text
 * @throws {StreamError} If stream processing fails
 * @throws {BufferError} If a line is longer than `maxLineLength`
 * @example Line-by-line processing
 * ```typescript
 * const stream = await createStream("/path/to/family.sto");
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("#=GC")) {
 *     console.log("Column annotation:", line);
 *   }
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "ascii" | "binary" = "utf8",
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): AsyncIterable<string> {
  const reader = stream.getReader();
  // TextDecoder has no 'ascii' label; iso-8859-1 is the standard label for latin1
  const decoder = new TextDecoder(encoding === "binary" ? "iso-8859-1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = splitBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        checkLineLength(line, maxLineLength);
        yield line;
      }
      checkLineLength(buffer, maxLineLength);
    }

    buffer += decoder.decode();
    const result = splitBuffer(buffer);
    for (const line of result.lines) {
      checkLineLength(line, maxLineLength);
      yield line;
    }
    checkLineLength(result.remainder, maxLineLength);

    const last = result.remainder.endsWith("\r")
      ? result.remainder.slice(0, -1)
      : result.remainder;
    if (last.trim()) {
      yield last;
    }
  } catch (error) {
    if (error instanceof BufferError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles different line ending styles (\n, \r\n, \r) and preserves
 * incomplete lines for the next processing cycle. A trailing \r stays in the
 * remainder in case the next chunk starts with \n.
 *
 * @param buffer Text buffer to process
 * @param maxLineLength Longest line accepted before failing
 * @returns Object with complete lines and remainder
 * @throws {BufferError} If a single line exceeds maximum length
 */
export function processBuffer(
  buffer: string,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): LineProcessingResult {
  const result = splitBuffer(buffer);
  for (const line of result.lines) {
    checkLineLength(line, maxLineLength);
  }
  checkLineLength(result.remainder, maxLineLength);
  return result;
}

function splitBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];
    let lineEnd: number | undefined;

    if (char === "\n") {
      lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      // Mac classic line ending (\r not followed by \n)
      lineEnd = position;
    }

    if (lineEnd !== undefined) {
      lines.push(buffer.slice(lineStart, lineEnd));
      lineStart = position + 1;
    }
  }

  return { lines, remainder: buffer.slice(lineStart) };
}

function checkLineLength(line: string, maxLineLength: number): void {
  if (line.length > maxLineLength) {
    const preview = line.slice(0, LINE_PREVIEW_LENGTH);
    throw new BufferError(
      `Line too long (${line.length} > ${maxLineLength})`,
      line.length,
      "line-length",
      `Line starts with: ${preview}`,
      preview
    );
  }
}

export const StreamUtils = {
  readLines,
  processBuffer,
} as const;
