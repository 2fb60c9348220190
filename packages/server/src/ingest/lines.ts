/**
 * Accumulates decoder output and yields only complete lines. A chunk that
 * ends mid-line leaves the tail buffered until its terminator arrives.
 */
export class LineSplitter {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  /** Unterminated text still held, discarded by the caller at end of stream. */
  get pending(): string {
    return this.buffer;
  }

  reset(): string {
    const rest = this.buffer;
    this.buffer = '';
    return rest;
  }
}
