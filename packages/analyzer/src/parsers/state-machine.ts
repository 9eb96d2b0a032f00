import { SmapsParseError, SmapsStateError } from '../errors';
import { LineCursor } from '../io/line-cursor';
import { type LineSource } from '../io/line-source';
import { type Mapping, type Usage } from '../model';
import { parseMappingLine } from './mapping';
import { parseUsageBlock, skipUsageBlock } from './usage';

export type HeaderStep =
  | { status: 'mapping'; mapping: Mapping; state: ExpectUsage }
  | { status: 'malformed'; error: SmapsParseError; state: ExpectUsage }
  | { status: 'end' };

export type UsageStep =
  | { status: 'usage'; usage: Usage; state: ExpectHeader }
  | { status: 'invalid'; error: SmapsParseError; state: ExpectHeader };

abstract class ParserState {
  private spent = false;

  protected constructor(protected readonly cursor: LineCursor, private readonly stateName: string) {}

  protected claim(): void {
    if (this.spent) {
      throw new SmapsStateError(this.stateName);
    }
    this.spent = true;
  }
}

/**
 * Waiting for a mapping header. Every state object may be advanced exactly
 * once; the step it returns carries the state to continue from.
 */
export class ExpectHeader extends ParserState {
  readonly phase = 'header' as const;

  constructor(cursor: LineCursor) {
    super(cursor, 'ExpectHeader');
  }

  /**
   * Consumes one line. A line that fails to decode is reported as `malformed`
   * with an {@link ExpectUsage} state, so the caller can skip the detail block
   * that belongs to it and carry on.
   */
  advance(): HeaderStep {
    this.claim();

    const line = this.cursor.next();
    if (line === undefined) {
      return { status: 'end' };
    }

    const state = new ExpectUsage(this.cursor);
    const mapping = parseMappingLine(line);
    if (!mapping) {
      return {
        status: 'malformed',
        error: new SmapsParseError('malformed-header', line, this.cursor.lineNumber),
        state,
      };
    }
    return { status: 'mapping', mapping, state };
  }
}

/** Positioned right after a header, before its (possibly empty) detail block. */
export class ExpectUsage extends ParserState {
  readonly phase = 'usage' as const;

  constructor(cursor: LineCursor) {
    super(cursor, 'ExpectUsage');
  }

  advance(): UsageStep {
    this.claim();

    const result = parseUsageBlock(this.cursor);
    const state = new ExpectHeader(this.cursor);
    return result.valid
      ? { status: 'usage', usage: result.usage, state }
      : { status: 'invalid', error: result.error, state };
  }

  /** Steps over the detail block by the header discriminator alone; never fails to decode. */
  skip(): ExpectHeader {
    this.claim();

    skipUsageBlock(this.cursor);
    return new ExpectHeader(this.cursor);
  }
}

export const createParser = (source: LineSource): ExpectHeader => new ExpectHeader(new LineCursor(source));
