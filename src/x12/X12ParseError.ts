/**
 * Errors raised while reading or writing X12.
 *
 * Every failure aborts the parse. Errors that concern one segment carry that
 * segment's raw tokens so the offending line can be shown to the sender.
 */

import type { X12Delimiters } from './X12Document.js';

export type X12ParseErrorKind =
  | 'TruncatedInput'
  | 'DelimiterCollision'
  | 'MalformedSegment'
  | 'OutOfOrderSegment'
  | 'EnvelopeMismatch';

export type SegmentTokens = readonly string[];

/**
 * Base class for all X12 parse failures.
 */
export class X12ParseError extends Error {
  constructor(
    public readonly kind: X12ParseErrorKind,
    public readonly reason: string,
    public readonly segment?: SegmentTokens
  ) {
    super(
      segment
        ? `Unable to parse X12 document: ${reason} (segment: ${segment.join('*')})`
        : `Unable to parse X12 document: ${reason}`
    );
    this.name = 'X12ParseError';
  }
}

/**
 * The input ends before the ISA delimiter positions.
 */
export class TruncatedInputError extends X12ParseError {
  constructor(
    public readonly length: number,
    public readonly requiredLength: number
  ) {
    super(
      'TruncatedInput',
      `input is ${length} characters long, at least ${requiredLength} are needed to read the ISA delimiters`
    );
    this.name = 'TruncatedInputError';
  }
}

/**
 * Two of the element, sub-element and segment delimiters are the same character.
 */
export class DelimiterCollisionError extends X12ParseError {
  constructor(public readonly delimiters: X12Delimiters) {
    super(
      'DelimiterCollision',
      `delimiters must be distinct, found element ${JSON.stringify(delimiters.elementDelimiter)}, ` +
        `sub-element ${JSON.stringify(delimiters.subelementDelimiter)}, ` +
        `segment ${JSON.stringify(delimiters.segmentDelimiter)}`
    );
    this.name = 'DelimiterCollisionError';
  }
}

/**
 * An ISA, GS or ST segment with fewer elements than its fixed layout requires,
 * or a body segment with nothing after its tag.
 */
export class MalformedSegmentError extends X12ParseError {
  /** Token count of the offending segment, tag included */
  public readonly receivedElements: number;

  constructor(
    public readonly tag: string,
    public readonly requiredElements: number,
    segment: SegmentTokens
  ) {
    super(
      'MalformedSegment',
      `${tag} segment has ${segment.length} elements, at least ${requiredElements} required`,
      segment
    );
    this.name = 'MalformedSegmentError';
    this.receivedElements = segment.length;
  }
}

/**
 * A segment arrived while the envelope it belongs in was not open.
 */
export class OutOfOrderSegmentError extends X12ParseError {
  constructor(
    public readonly tag: string,
    public readonly requiredEnvelope: EnvelopeLevel,
    segment: SegmentTokens
  ) {
    super('OutOfOrderSegment', `${tag} segment found with no open ${ENVELOPE_OPENERS[requiredEnvelope]}`, segment);
    this.name = 'OutOfOrderSegmentError';
  }
}

export type EnvelopeLevel = 'interchange' | 'functional-group' | 'transaction';

export type EnvelopeMismatchField = 'count' | 'control-number';

const ENVELOPE_OPENERS: Record<EnvelopeLevel, string> = {
  interchange: 'interchange (ISA)',
  'functional-group': 'functional group (GS)',
  transaction: 'transaction set (ST)',
};

/**
 * A trailer disagrees with its opener or with what was parsed in between.
 */
export class EnvelopeMismatchError extends X12ParseError {
  /**
   * @param expected - value implied by the opener or by the parsed contents
   * @param actual - value declared by the trailer
   */
  constructor(
    public readonly envelope: EnvelopeLevel,
    public readonly mismatch: EnvelopeMismatchField,
    public readonly expected: string,
    public readonly actual: string,
    segment: SegmentTokens
  ) {
    super(
      'EnvelopeMismatch',
      `${envelope} validation failed: ${mismatch === 'count' ? 'incorrect count' : 'mismatched control number'}, ` +
        `expected ${JSON.stringify(expected)} but trailer declares ${JSON.stringify(actual)}`,
      segment
    );
    this.name = 'EnvelopeMismatchError';
  }
}

export function isX12ParseError(value: unknown): value is X12ParseError {
  return value instanceof X12ParseError;
}
