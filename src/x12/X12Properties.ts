/**
 * Delimiter discovery and parser options.
 *
 * An X12 interchange describes its own delimiters: the ISA segment has fixed
 * field widths, so with the usual three-letter tag the characters at offsets
 * 103, 104 and 105 are always the element delimiter, the sub-element
 * delimiter (ISA16) and the segment delimiter.
 *
 *   ISA*00*          *00*          *ZZ*SENDERISA      *...*0*T*>~
 *                                                            ^^^
 *                                                          103..105
 */

import type { X12Delimiters } from './X12Document.js';
import { DelimiterCollisionError, TruncatedInputError } from './X12ParseError.js';
import type { TransactionNameLookup } from './TransactionNames.js';

export const ELEMENT_DELIMITER_OFFSET = 103;
export const SUBELEMENT_DELIMITER_OFFSET = 104;
export const SEGMENT_DELIMITER_OFFSET = 105;

/** Shortest input that reaches the segment delimiter position */
export const X12_MIN_HEADER_LENGTH = SEGMENT_DELIMITER_OFFSET + 1;

/**
 * Delimiters used when building documents by hand.
 */
export function getDefaultX12Delimiters(): X12Delimiters {
  return {
    elementDelimiter: '*',
    subelementDelimiter: ':',
    segmentDelimiter: '~',
  };
}

/**
 * Throws DelimiterCollisionError unless the three delimiters are pairwise distinct.
 */
export function assertDistinctDelimiters(delimiters: X12Delimiters): void {
  const { elementDelimiter, subelementDelimiter, segmentDelimiter } = delimiters;
  if (
    elementDelimiter === subelementDelimiter ||
    elementDelimiter === segmentDelimiter ||
    subelementDelimiter === segmentDelimiter
  ) {
    throw new DelimiterCollisionError(delimiters);
  }
}

/**
 * Read the delimiters from their fixed ISA positions.
 *
 * @throws TruncatedInputError when the text is too short to reach offset 105
 * @throws DelimiterCollisionError when any two of the three characters are equal
 */
export function extractX12Delimiters(text: string): X12Delimiters {
  if (text.length < X12_MIN_HEADER_LENGTH) {
    throw new TruncatedInputError(text.length, X12_MIN_HEADER_LENGTH);
  }

  const delimiters: X12Delimiters = {
    elementDelimiter: text.charAt(ELEMENT_DELIMITER_OFFSET),
    subelementDelimiter: text.charAt(SUBELEMENT_DELIMITER_OFFSET),
    segmentDelimiter: text.charAt(SEGMENT_DELIMITER_OFFSET),
  };
  assertDistinctDelimiters(delimiters);

  return delimiters;
}

/**
 * Options accepted by the parser.
 */
export interface X12ParseOptions {
  /**
   * Cross-check IEA/GE/SE counts and control numbers against their openers
   * (default: true). When false the trailers still have to arrive in order,
   * but their values are not compared.
   */
  strict: boolean;
  /** Resolves ST01 to a transaction-set name (default: the bundled table) */
  transactionNames: TransactionNameLookup;
}
