/**
 * Splits a relayed byte stream into protocol lines for the log
 *
 * Lines end at `\n`; a `\r` before it is dropped. Bytes are buffered until
 * the terminator arrives, so a multi-byte character split across chunks
 * decodes whole.
 */

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

function decodeLine(bytes: Buffer): string {
  const end = bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN ? -1 : undefined;
  return bytes.subarray(0, end).toString('utf8');
}

export class LineSplitter {
  private pending: Buffer = Buffer.alloc(0);

  /**
   * Feed a chunk and return the lines it completes
   */
  push(chunk: Buffer): string[] {
    const lines: string[] = [];
    let data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    let newline = data.indexOf(NEWLINE);

    while (newline !== -1) {
      lines.push(decodeLine(data.subarray(0, newline)));
      data = data.subarray(newline + 1);
      newline = data.indexOf(NEWLINE);
    }

    this.pending = Buffer.from(data);
    return lines;
  }

  /**
   * The unterminated remainder at end of stream, if any
   */
  flush(): string | null {
    if (this.pending.length === 0) return null;
    const line = decodeLine(this.pending);
    this.pending = Buffer.alloc(0);
    return line;
  }
}
