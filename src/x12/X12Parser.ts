/**
 * Entry points for reading X12 text into a document tree.
 *
 *   text --extractX12Delimiters--> delimiters
 *        --tokenizeX12-----------> segment tokens
 *        --X12DocumentAssembler--> interchanges
 *
 * Strict parsing (the default) checks every IEA/GE/SE against its opener.
 * Loose parsing accepts trailers whose counts or control numbers disagree,
 * but still rejects segments that arrive outside their envelope.
 */

import { getLogger, registerComponent } from '../logging/index.js';
import { X12DocumentAssembler } from './X12Assembler.js';
import type { X12Document } from './X12Document.js';
import { isX12ParseError } from './X12ParseError.js';
import type { X12ParseError } from './X12ParseError.js';
import { extractX12Delimiters } from './X12Properties.js';
import type { X12ParseOptions } from './X12Properties.js';
import { tokenizeX12 } from './X12Tokenizer.js';
import { getDefaultTransactionNameLookup } from './TransactionNames.js';

registerComponent('x12-parser', 'X12 document parser');
const logger = getLogger('x12-parser');

export type X12ParseResult =
  | { success: true; document: X12Document }
  | { success: false; error: X12ParseError };

export class X12Parser {
  private readonly options: X12ParseOptions;

  constructor(options?: Partial<X12ParseOptions>) {
    this.options = {
      strict: options?.strict ?? true,
      transactionNames: options?.transactionNames ?? getDefaultTransactionNameLookup(),
    };
  }

  isStrict(): boolean {
    return this.options.strict;
  }

  /**
   * @throws X12ParseError (or one of its subclasses) on the first problem found
   */
  parse(text: string): X12Document {
    try {
      const delimiters = extractX12Delimiters(text);
      logger.debug('Found X12 delimiters', { ...delimiters });

      const segments = tokenizeX12(text, delimiters);
      const assembler = new X12DocumentAssembler({ ...this.options, logger: logger.child('assembler') });
      const interchanges = assembler.assemble(segments);

      logger.debug(`Parsed X12 document: ${interchanges.length} interchange(s), ${segments.length} segment(s)`, {
        strict: this.options.strict,
      });
      return { delimiters, interchanges };
    } catch (error) {
      if (isX12ParseError(error)) {
        logger.debug(`X12 parse failed: ${error.reason}`, { kind: error.kind });
      }
      throw error;
    }
  }

  /**
   * Like parse(), but reports X12 problems as a result instead of throwing.
   * Errors that are not X12ParseErrors are still thrown.
   */
  tryParse(text: string): X12ParseResult {
    try {
      return { success: true, document: this.parse(text) };
    } catch (error) {
      if (isX12ParseError(error)) {
        return { success: false, error };
      }
      throw error;
    }
  }
}

/**
 * Parse with envelope validation.
 */
export function parseX12(text: string, options?: Partial<Omit<X12ParseOptions, 'strict'>>): X12Document {
  return new X12Parser({ ...options, strict: true }).parse(text);
}

/**
 * Parse without cross-checking trailer counts and control numbers.
 */
export function looseParseX12(text: string, options?: Partial<Omit<X12ParseOptions, 'strict'>>): X12Document {
  return new X12Parser({ ...options, strict: false }).parse(text);
}

export function tryParseX12(text: string, options?: Partial<X12ParseOptions>): X12ParseResult {
  return new X12Parser(options).tryParse(text);
}
