/**
 * Rewindable line input
 *
 * Multi-pass readers need to restart from the first line. A LineSource
 * hands out physical lines without their terminators and can be rewound any
 * number of times.
 */

/**
 * Sequential, rewindable access to the lines of a text
 */
export interface LineSource {
  /** Next line without its line terminator, or undefined at end of input */
  next(): string | undefined;
  /** Restart reading from the first line */
  rewind(): void;
}

/**
 * Line source over lines already held in memory
 */
export class ArrayLineSource implements LineSource {
  private position = 0;

  constructor(private readonly lines: readonly string[]) {}

  next(): string | undefined {
    if (this.position >= this.lines.length) return undefined;
    const line = this.lines[this.position];
    this.position++;
    return line;
  }

  rewind(): void {
    this.position = 0;
  }

  get lineCount(): number {
    return this.lines.length;
  }
}

/**
 * Drop a leading byte-order mark, as left by editors that save UTF-8 with one
 */
export function stripByteOrderMark(text: string): string {
  return text.startsWith("\uFEFF") ? text.slice(1) : text;
}

/**
 * Split text into lines on \n, \r\n or \r
 *
 * A leading byte-order mark is dropped. A line terminator at the very end of
 * the text does not start another line.
 */
export function splitLines(text: string): string[] {
  const body = stripByteOrderMark(text);
  if (body === "") return [];
  const lines = body.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Line source over the lines of a string
 */
export function lineSourceFromString(text: string): ArrayLineSource {
  return new ArrayLineSource(splitLines(text));
}

/**
 * Iterate the remaining lines of a source
 */
export function* iterateLines(source: LineSource): IterableIterator<string> {
  for (let line = source.next(); line !== undefined; line = source.next()) {
    yield line;
  }
}
