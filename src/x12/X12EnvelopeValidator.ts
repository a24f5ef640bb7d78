/**
 * Trailer checks for the three envelope levels.
 *
 * Each check compares a closing segment against state recorded when its
 * opener was parsed and throws EnvelopeMismatchError on the first
 * disagreement. Nothing here modifies the tree.
 *
 *   IEA01 = number of functional groups     IEA02 = ISA13
 *   GE01  = number of transaction sets      GE02  = GS06
 *   SE01  = number of segments incl. ST/SE  SE02  = ST02
 */

import type { FunctionalGroup, Interchange, Transaction } from './X12Document.js';
import { EnvelopeMismatchError } from './X12ParseError.js';
import type { EnvelopeLevel, SegmentTokens } from './X12ParseError.js';

/**
 * SE01 counts the ST and SE segments as well as the body.
 */
export const TRANSACTION_ENVELOPE_SEGMENTS = 2;

export function validateInterchangeTrailer(interchange: Interchange, tokens: SegmentTokens): void {
  checkTrailer(
    'interchange',
    interchange.functionalGroups.length,
    interchange.interchangeControlNumber,
    tokens
  );
}

export function validateFunctionalGroupTrailer(group: FunctionalGroup, tokens: SegmentTokens): void {
  checkTrailer('functional-group', group.transactions.length, group.groupControlNumber, tokens);
}

export function validateTransactionTrailer(transaction: Transaction, tokens: SegmentTokens): void {
  checkTrailer(
    'transaction',
    transaction.segments.length + TRANSACTION_ENVELOPE_SEGMENTS,
    transaction.transactionSetControlNumber,
    tokens
  );
}

/**
 * Count first, then control number. A missing element reads as "" and so
 * never matches.
 */
function checkTrailer(
  envelope: EnvelopeLevel,
  expectedCount: number,
  expectedControlNumber: string,
  tokens: SegmentTokens
): void {
  const declaredCount = (tokens[1] ?? '').trim();
  if (!/^\d+$/.test(declaredCount) || Number(declaredCount) !== expectedCount) {
    throw new EnvelopeMismatchError(envelope, 'count', String(expectedCount), declaredCount, tokens);
  }

  const declaredControlNumber = (tokens[2] ?? '').trim();
  if (declaredControlNumber !== expectedControlNumber) {
    throw new EnvelopeMismatchError(
      envelope,
      'control-number',
      expectedControlNumber,
      declaredControlNumber,
      tokens
    );
  }
}
