/**
 * Folds the token stream into the Interchange > FunctionalGroup >
 * Transaction > Segment tree.
 *
 * The assembler keeps one index per envelope level pointing at the container
 * that is currently open. Openers append a node and open it, closers validate
 * the open node and close it, and every other segment goes into the open
 * transaction. Anything arriving without its enclosing envelope open is an
 * OutOfOrderSegmentError in both modes; only the trailer value checks depend
 * on `strict`.
 */

import type { Logger } from '../logging/index.js';
import type { FunctionalGroup, Interchange, Segment, Transaction } from './X12Document.js';
import {
  validateFunctionalGroupTrailer,
  validateInterchangeTrailer,
  validateTransactionTrailer,
} from './X12EnvelopeValidator.js';
import { MalformedSegmentError, OutOfOrderSegmentError } from './X12ParseError.js';
import type { SegmentTokens } from './X12ParseError.js';
import type { X12ParseOptions } from './X12Properties.js';

/** Minimum token counts, tag included */
export const ISA_MIN_ELEMENTS = 16;
export const GS_MIN_ELEMENTS = 9;
export const ST_MIN_ELEMENTS = 3;
/** A body segment needs at least one element after its tag */
export const SEGMENT_MIN_ELEMENTS = 2;

export interface X12AssemblerOptions extends X12ParseOptions {
  logger?: Logger;
}

export class X12DocumentAssembler {
  private interchanges: Interchange[] = [];
  private openInterchangeIndex: number | null = null;
  private openGroupIndex: number | null = null;
  private openTransactionIndex: number | null = null;

  constructor(private readonly options: X12AssemblerOptions) {}

  /**
   * Assemble a complete token stream. Each call starts from an empty tree.
   */
  assemble(segments: readonly SegmentTokens[]): Interchange[] {
    this.interchanges = [];
    this.openInterchangeIndex = null;
    this.openGroupIndex = null;
    this.openTransactionIndex = null;

    for (const tokens of segments) {
      this.consume(tokens);
    }

    return this.interchanges;
  }

  private consume(tokens: SegmentTokens): void {
    const tag = field(tokens, 0);

    switch (tag) {
      case 'ISA':
        this.openInterchange(tokens);
        break;
      case 'GS':
        this.openFunctionalGroup(tokens);
        break;
      case 'ST':
        this.openTransaction(tokens);
        break;
      case 'SE':
        this.closeTransaction(tokens);
        break;
      case 'GE':
        this.closeFunctionalGroup(tokens);
        break;
      case 'IEA':
        this.closeInterchange(tokens);
        break;
      default:
        this.appendSegment(tag, tokens);
    }
  }

  private openInterchange(tokens: SegmentTokens): void {
    requireElements('ISA', ISA_MIN_ELEMENTS, tokens);
    this.interchanges.push(parseInterchange(tokens));
    this.openInterchangeIndex = this.interchanges.length - 1;
    this.openGroupIndex = null;
    this.openTransactionIndex = null;
  }

  private openFunctionalGroup(tokens: SegmentTokens): void {
    const interchange = this.requireInterchange('GS', tokens);
    requireElements('GS', GS_MIN_ELEMENTS, tokens);
    interchange.functionalGroups.push(parseFunctionalGroup(tokens));
    this.openGroupIndex = interchange.functionalGroups.length - 1;
    this.openTransactionIndex = null;
  }

  private openTransaction(tokens: SegmentTokens): void {
    const group = this.requireFunctionalGroup('ST', tokens);
    requireElements('ST', ST_MIN_ELEMENTS, tokens);
    group.transactions.push(parseTransaction(tokens, this.options.transactionNames));
    this.openTransactionIndex = group.transactions.length - 1;
  }

  private appendSegment(tag: string, tokens: SegmentTokens): void {
    const transaction = this.requireTransaction(tag, tokens);
    requireElements(tag, SEGMENT_MIN_ELEMENTS, tokens);
    transaction.segments.push(parseSegment(tag, tokens));
  }

  private closeTransaction(tokens: SegmentTokens): void {
    const transaction = this.requireTransaction('SE', tokens);
    if (this.options.strict) {
      validateTransactionTrailer(transaction, tokens);
    } else {
      this.options.logger?.trace(`Skipping SE checks for transaction ${transaction.transactionSetControlNumber}`);
    }
    this.openTransactionIndex = null;
  }

  private closeFunctionalGroup(tokens: SegmentTokens): void {
    const group = this.requireFunctionalGroup('GE', tokens);
    if (this.options.strict) {
      validateFunctionalGroupTrailer(group, tokens);
    } else {
      this.options.logger?.trace(`Skipping GE checks for group ${group.groupControlNumber}`);
    }
    this.openGroupIndex = null;
    this.openTransactionIndex = null;
  }

  private closeInterchange(tokens: SegmentTokens): void {
    const interchange = this.requireInterchange('IEA', tokens);
    if (this.options.strict) {
      validateInterchangeTrailer(interchange, tokens);
    } else {
      this.options.logger?.trace(
        `Skipping IEA checks for interchange ${interchange.interchangeControlNumber}`
      );
    }
    this.openInterchangeIndex = null;
    this.openGroupIndex = null;
    this.openTransactionIndex = null;
  }

  private requireInterchange(tag: string, tokens: SegmentTokens): Interchange {
    const interchange =
      this.openInterchangeIndex === null ? undefined : this.interchanges[this.openInterchangeIndex];
    if (!interchange) {
      throw new OutOfOrderSegmentError(tag, 'interchange', tokens);
    }
    return interchange;
  }

  private requireFunctionalGroup(tag: string, tokens: SegmentTokens): FunctionalGroup {
    const group =
      this.openGroupIndex === null
        ? undefined
        : this.requireInterchange(tag, tokens).functionalGroups[this.openGroupIndex];
    if (!group) {
      throw new OutOfOrderSegmentError(tag, 'functional-group', tokens);
    }
    return group;
  }

  private requireTransaction(tag: string, tokens: SegmentTokens): Transaction {
    const transaction =
      this.openTransactionIndex === null
        ? undefined
        : this.requireFunctionalGroup(tag, tokens).transactions[this.openTransactionIndex];
    if (!transaction) {
      throw new OutOfOrderSegmentError(tag, 'transaction', tokens);
    }
    return transaction;
  }
}

function field(tokens: SegmentTokens, index: number): string {
  return (tokens[index] ?? '').trim();
}

function requireElements(tag: string, required: number, tokens: SegmentTokens): void {
  if (tokens.length < required) {
    throw new MalformedSegmentError(tag, required, tokens);
  }
}

function parseInterchange(tokens: SegmentTokens): Interchange {
  return {
    authorizationQualifier: field(tokens, 1),
    authorizationInformation: field(tokens, 2),
    securityQualifier: field(tokens, 3),
    securityInformation: field(tokens, 4),
    senderQualifier: field(tokens, 5),
    senderId: field(tokens, 6),
    receiverQualifier: field(tokens, 7),
    receiverId: field(tokens, 8),
    date: field(tokens, 9),
    time: field(tokens, 10),
    standardsId: field(tokens, 11),
    version: field(tokens, 12),
    interchangeControlNumber: field(tokens, 13),
    acknowledgmentRequested: field(tokens, 14),
    testIndicator: field(tokens, 15),
    functionalGroups: [],
  };
}

function parseFunctionalGroup(tokens: SegmentTokens): FunctionalGroup {
  return {
    functionalIdentifierCode: field(tokens, 1),
    applicationSenderCode: field(tokens, 2),
    applicationReceiverCode: field(tokens, 3),
    date: field(tokens, 4),
    time: field(tokens, 5),
    groupControlNumber: field(tokens, 6),
    responsibleAgencyCode: field(tokens, 7),
    version: field(tokens, 8),
    transactions: [],
  };
}

function parseTransaction(tokens: SegmentTokens, lookup: (code: string) => string): Transaction {
  const transactionCode = field(tokens, 1);
  const transaction: Transaction = {
    transactionCode,
    transactionName: lookup(transactionCode),
    transactionSetControlNumber: field(tokens, 2),
    segments: [],
  };
  if (tokens.length > ST_MIN_ELEMENTS) {
    transaction.implementationConventionReference = field(tokens, 3);
  }
  return transaction;
}

function parseSegment(tag: string, tokens: SegmentTokens): Segment {
  return { tag, elements: tokens.slice(1) };
}
