/**
 * Splits X12 text into segments and elements.
 *
 * Sub-elements are not split: an element such as "HC>99213" stays one string.
 */

import type { X12Delimiters } from './X12Document.js';
import type { SegmentTokens } from './X12ParseError.js';

/**
 * Tokenize a whole document.
 *
 * Candidate segments are trimmed and empty ones dropped, so line breaks
 * placed around the segment delimiter do not produce segments of their own.
 * The first token of each group is the segment tag.
 */
export function tokenizeX12(text: string, delimiters: X12Delimiters): SegmentTokens[] {
  const tokens: SegmentTokens[] = [];

  for (const candidate of text.split(delimiters.segmentDelimiter)) {
    const segment = candidate.trim();
    if (!segment) continue;

    tokens.push(segment.split(delimiters.elementDelimiter));
  }

  return tokens;
}
