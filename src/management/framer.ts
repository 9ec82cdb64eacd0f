const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Splits a byte stream into newline-terminated lines.
 *
 * The unconsumed tail is held as bytes, so the output does not depend on how
 * the stream was chunked, including chunk boundaries inside a UTF-8 sequence.
 */
export class LineFramer {
  private pending: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): string[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const lines: string[] = [];

    let start = 0;
    let newline = data.indexOf(NEWLINE, start);
    while (newline !== -1) {
      let end = newline;
      if (end > start && data[end - 1] === CARRIAGE_RETURN) {
        end--;
      }
      lines.push(data.toString('utf8', start, end));
      start = newline + 1;
      newline = data.indexOf(NEWLINE, start);
    }

    this.pending = Buffer.from(data.subarray(start));
    return lines;
  }

  get bufferedBytes(): number {
    return this.pending.length;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}
