import { type LineSource } from './line-source';

/** Counts the lines taken from a {@link LineSource} so errors can name them. */
export class LineCursor {
  private consumed = 0;

  constructor(private readonly source: LineSource) {}

  /** 1-based number of the most recently consumed line; 0 before the first. */
  get lineNumber(): number {
    return this.consumed;
  }

  peek(): string | undefined {
    return this.source.peek();
  }

  next(): string | undefined {
    const line = this.source.next();
    if (line !== undefined) {
      this.consumed += 1;
    }
    return line;
  }
}
