/**
 * X12 Module
 *
 * Parses ANSI X12 interchanges into a document tree, validates envelope
 * trailers, and serializes trees back to X12 text.
 */

// Data model
export { ISA_FIELDS, ISA_FIELD_WIDTHS, GS_FIELDS, ENVELOPE_TAGS, isEnvelopeTag } from './X12Document.js';
export type {
  X12Document,
  X12Delimiters,
  Interchange,
  FunctionalGroup,
  Transaction,
  Segment,
  InterchangeHeaderField,
  FunctionalGroupHeaderField,
  EnvelopeTag,
} from './X12Document.js';

// Errors
export {
  X12ParseError,
  TruncatedInputError,
  DelimiterCollisionError,
  MalformedSegmentError,
  OutOfOrderSegmentError,
  EnvelopeMismatchError,
  isX12ParseError,
} from './X12ParseError.js';
export type {
  X12ParseErrorKind,
  SegmentTokens,
  EnvelopeLevel,
  EnvelopeMismatchField,
} from './X12ParseError.js';

// Properties and delimiters
export {
  X12_MIN_HEADER_LENGTH,
  ELEMENT_DELIMITER_OFFSET,
  SUBELEMENT_DELIMITER_OFFSET,
  SEGMENT_DELIMITER_OFFSET,
  getDefaultX12Delimiters,
  assertDistinctDelimiters,
  extractX12Delimiters,
} from './X12Properties.js';
export type { X12ParseOptions } from './X12Properties.js';

// Tokenizer, assembler, validator
export { tokenizeX12 } from './X12Tokenizer.js';
export {
  X12DocumentAssembler,
  ISA_MIN_ELEMENTS,
  GS_MIN_ELEMENTS,
  ST_MIN_ELEMENTS,
  SEGMENT_MIN_ELEMENTS,
} from './X12Assembler.js';
export type { X12AssemblerOptions } from './X12Assembler.js';
export {
  validateInterchangeTrailer,
  validateFunctionalGroupTrailer,
  validateTransactionTrailer,
  TRANSACTION_ENVELOPE_SEGMENTS,
} from './X12EnvelopeValidator.js';

// Parser (X12 -> tree)
export { X12Parser, parseX12, looseParseX12, tryParseX12 } from './X12Parser.js';
export type { X12ParseResult } from './X12Parser.js';

// Serializer (tree -> X12)
export { X12Serializer, toX12String, padRight } from './X12Serializer.js';

// Transaction-set names
export {
  UNIDENTIFIED_TRANSACTION,
  DEFAULT_TRANSACTION_TABLE_PATH,
  createTransactionNameLookup,
  loadTransactionNameTable,
  getDefaultTransactionNameLookup,
  resetTransactionNameCache,
} from './TransactionNames.js';
export type { TransactionNameLookup, TransactionNameTable } from './TransactionNames.js';

// Metadata
export { getX12MetaData } from './X12MetaData.js';
export type { X12MetaData } from './X12MetaData.js';
