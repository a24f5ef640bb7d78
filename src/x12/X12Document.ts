/**
 * X12 document tree
 *
 * Four levels: Interchange (ISA/IEA) > FunctionalGroup (GS/GE) >
 * Transaction (ST/SE) > Segment. Nodes are plain data: each level owns the
 * next, nothing points back up, and a whole document survives JSON.stringify.
 *
 * Envelope fields are stored without their fixed-width padding. Generic
 * segment elements are stored as they appeared, sub-element delimiters
 * included.
 */

/**
 * The three format-defining characters of an interchange.
 */
export interface X12Delimiters {
  /** Separates elements within a segment (ISA position 103, usually "*") */
  elementDelimiter: string;
  /** Separates components within an element (ISA16, usually ":" or ">") */
  subelementDelimiter: string;
  /** Terminates a segment (ISA position 105, usually "~") */
  segmentDelimiter: string;
}

/**
 * Any segment that is not one of the six envelope segments.
 */
export interface Segment {
  /** Segment ID, e.g. "BGN" or "N1" */
  tag: string;
  /** Elements after the tag, in order */
  elements: string[];
}

/**
 * ST/SE envelope.
 */
export interface Transaction {
  /** ST01, e.g. "850" */
  transactionCode: string;
  /** Human-readable name of ST01, "unidentified" when the code is unknown */
  transactionName: string;
  /** ST02. SE02 must repeat it. */
  transactionSetControlNumber: string;
  /** ST03, only present when the ST segment carried a third element */
  implementationConventionReference?: string;
  segments: Segment[];
}

/**
 * GS/GE envelope.
 */
export interface FunctionalGroup {
  /** GS01, e.g. "PO" for purchase orders or "HC" for health care claims */
  functionalIdentifierCode: string;
  /** GS02 */
  applicationSenderCode: string;
  /** GS03 */
  applicationReceiverCode: string;
  /** GS04, CCYYMMDD */
  date: string;
  /** GS05, HHMM with optional seconds and decimal seconds */
  time: string;
  /** GS06. GE02 must repeat it. */
  groupControlNumber: string;
  /** GS07, "X" for ASC X12 */
  responsibleAgencyCode: string;
  /** GS08, version/release/industry identifier such as "004010" */
  version: string;
  transactions: Transaction[];
}

/**
 * ISA/IEA envelope.
 */
export interface Interchange {
  /** ISA01 */
  authorizationQualifier: string;
  /** ISA02 */
  authorizationInformation: string;
  /** ISA03 */
  securityQualifier: string;
  /** ISA04 */
  securityInformation: string;
  /** ISA05 */
  senderQualifier: string;
  /** ISA06 */
  senderId: string;
  /** ISA07 */
  receiverQualifier: string;
  /** ISA08 */
  receiverId: string;
  /** ISA09, YYMMDD */
  date: string;
  /** ISA10, HHMM */
  time: string;
  /** ISA11, repetition separator in 00402 and later, "U" before that */
  standardsId: string;
  /** ISA12 */
  version: string;
  /** ISA13. IEA02 must repeat it. */
  interchangeControlNumber: string;
  /** ISA14, "0" or "1" */
  acknowledgmentRequested: string;
  /** ISA15, "T" test, "P" production or "I" information */
  testIndicator: string;
  functionalGroups: FunctionalGroup[];
}

export interface X12Document {
  delimiters: X12Delimiters;
  interchanges: Interchange[];
}

/**
 * Interchange properties in ISA01..ISA15 order.
 */
export const ISA_FIELDS = [
  'authorizationQualifier',
  'authorizationInformation',
  'securityQualifier',
  'securityInformation',
  'senderQualifier',
  'senderId',
  'receiverQualifier',
  'receiverId',
  'date',
  'time',
  'standardsId',
  'version',
  'interchangeControlNumber',
  'acknowledgmentRequested',
  'testIndicator',
] as const satisfies readonly (keyof Interchange)[];

export type InterchangeHeaderField = (typeof ISA_FIELDS)[number];

/**
 * Mandated widths of ISA01..ISA15. ISA16 is the one-character sub-element
 * delimiter and is not listed.
 */
export const ISA_FIELD_WIDTHS: readonly number[] = [2, 10, 2, 10, 2, 15, 2, 15, 6, 4, 1, 5, 9, 1, 1];

/**
 * FunctionalGroup properties in GS01..GS08 order.
 */
export const GS_FIELDS = [
  'functionalIdentifierCode',
  'applicationSenderCode',
  'applicationReceiverCode',
  'date',
  'time',
  'groupControlNumber',
  'responsibleAgencyCode',
  'version',
] as const satisfies readonly (keyof FunctionalGroup)[];

export type FunctionalGroupHeaderField = (typeof GS_FIELDS)[number];

/** Tags handled by the assembler itself rather than stored as segments */
export const ENVELOPE_TAGS = ['ISA', 'IEA', 'GS', 'GE', 'ST', 'SE'] as const;

export type EnvelopeTag = (typeof ENVELOPE_TAGS)[number];

const ENVELOPE_TAG_SET: ReadonlySet<string> = new Set(ENVELOPE_TAGS);

export function isEnvelopeTag(tag: string): tag is EnvelopeTag {
  return ENVELOPE_TAG_SET.has(tag);
}
