/**
 * @file writer.ts
 * @description Output sinks for trace lines and layout dumps.
 *
 * The tracker only ever calls write(); where the text lands is up to the sink.
 * A sink may throw, and RegionTracker records such failures without letting
 * them escape a mutation.
 */

/** Anything that accepts text */
export interface Writer {
  write(s: string): void;
}

/** Collects output in memory, for toString() and for tests */
export class StringWriter implements Writer {
  private buf: string[] = [];

  write(s: string): void {
    this.buf.push(s);
  }

  toString(): string {
    return this.buf.join('');
  }

  /** Output split into lines, without terminators */
  lines(): string[] {
    const text = this.toString();
    if (text.length === 0) return [];
    const parts = text.split('\n');
    if (parts[parts.length - 1] === '') parts.pop();
    return parts;
  }
}

/** Default trace sink: process stdout */
export class ConsoleWriter implements Writer {
  write(s: string): void {
    process.stdout.write(s);
  }
}

/** Write an integer in base 10 */
export function writeDec(w: Writer, val: number): void {
  w.write(val.toString(10));
}
