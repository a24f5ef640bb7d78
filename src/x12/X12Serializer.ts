/**
 * Writes a document tree (or any part of it) back out as X12 text.
 *
 * Trailers are never copied from the input: IEA, GE and SE are rebuilt from
 * the live tree, so a document assembled in code serializes with consistent
 * counts even if it was never parsed. ISA01..ISA15 are right-padded to their
 * fixed widths; every other element is written as stored. Every segment,
 * the last one included, ends with the segment delimiter.
 */

import type {
  FunctionalGroup,
  Interchange,
  Segment,
  Transaction,
  X12Delimiters,
  X12Document,
} from './X12Document.js';
import { GS_FIELDS, ISA_FIELDS, ISA_FIELD_WIDTHS } from './X12Document.js';
import { TRANSACTION_ENVELOPE_SEGMENTS } from './X12EnvelopeValidator.js';
import { assertDistinctDelimiters, getDefaultX12Delimiters } from './X12Properties.js';

export class X12Serializer {
  private readonly delimiters: X12Delimiters;

  /**
   * @throws DelimiterCollisionError when any two delimiters are equal
   */
  constructor(delimiters?: Partial<X12Delimiters>) {
    const defaults = getDefaultX12Delimiters();
    this.delimiters = {
      elementDelimiter: delimiters?.elementDelimiter ?? defaults.elementDelimiter,
      subelementDelimiter: delimiters?.subelementDelimiter ?? defaults.subelementDelimiter,
      segmentDelimiter: delimiters?.segmentDelimiter ?? defaults.segmentDelimiter,
    };
    assertDistinctDelimiters(this.delimiters);
  }

  getDelimiters(): X12Delimiters {
    return { ...this.delimiters };
  }

  serializeDocument(document: X12Document): string {
    return this.join(document.interchanges.flatMap((interchange) => this.interchangeLines(interchange)));
  }

  serializeInterchange(interchange: Interchange): string {
    return this.join(this.interchangeLines(interchange));
  }

  serializeFunctionalGroup(group: FunctionalGroup): string {
    return this.join(this.functionalGroupLines(group));
  }

  serializeTransaction(transaction: Transaction): string {
    return this.join(this.transactionLines(transaction));
  }

  serializeSegment(segment: Segment): string {
    return this.join([this.segmentLine(segment)]);
  }

  private interchangeLines(interchange: Interchange): string[] {
    const header = ISA_FIELDS.map((name, i) => padRight(interchange[name], ISA_FIELD_WIDTHS[i] ?? 0));
    header.push(this.delimiters.subelementDelimiter);

    return [
      this.line('ISA', header),
      ...interchange.functionalGroups.flatMap((group) => this.functionalGroupLines(group)),
      this.line('IEA', [String(interchange.functionalGroups.length), interchange.interchangeControlNumber]),
    ];
  }

  private functionalGroupLines(group: FunctionalGroup): string[] {
    return [
      this.line('GS', GS_FIELDS.map((name) => group[name])),
      ...group.transactions.flatMap((transaction) => this.transactionLines(transaction)),
      this.line('GE', [String(group.transactions.length), group.groupControlNumber]),
    ];
  }

  private transactionLines(transaction: Transaction): string[] {
    const header = [transaction.transactionCode, transaction.transactionSetControlNumber];
    if (transaction.implementationConventionReference !== undefined) {
      header.push(transaction.implementationConventionReference);
    }

    return [
      this.line('ST', header),
      ...transaction.segments.map((segment) => this.segmentLine(segment)),
      this.line('SE', [
        String(transaction.segments.length + TRANSACTION_ENVELOPE_SEGMENTS),
        transaction.transactionSetControlNumber,
      ]),
    ];
  }

  private segmentLine(segment: Segment): string {
    return this.line(segment.tag, segment.elements);
  }

  private line(tag: string, elements: readonly string[]): string {
    return [tag, ...elements].join(this.delimiters.elementDelimiter);
  }

  private join(lines: readonly string[]): string {
    return lines.map((line) => line + this.delimiters.segmentDelimiter).join('');
  }
}

/**
 * Pad with trailing spaces up to width. Longer values are left as they are.
 */
export function padRight(value: string, width: number): string {
  return value.padEnd(width, ' ');
}

/**
 * Serialize a whole document with the delimiters it carries.
 */
export function toX12String(document: X12Document): string {
  return new X12Serializer(document.delimiters).serializeDocument(document);
}
