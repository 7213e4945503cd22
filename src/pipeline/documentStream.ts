/** In-memory, rewindable view of the uploaded document. */
export class DocumentStream {
  private offset = 0;

  constructor(private readonly content: Buffer) {}

  get length(): number {
    return this.content.length;
  }

  get position(): number {
    return this.offset;
  }

  read(size: number = this.content.length - this.offset): Buffer {
    const end = Math.min(this.content.length, this.offset + Math.max(0, size));
    const chunk = this.content.subarray(this.offset, end);
    this.offset = end;
    return chunk;
  }

  /** Reads the whole document from the start, leaving the position at the end. */
  readAll(): Buffer {
    this.rewind();
    return this.read();
  }

  rewind(): void {
    this.offset = 0;
  }
}
