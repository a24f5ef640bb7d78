/**
 * Transaction-set names
 *
 * Maps ST01 codes ("850") to their published names ("Purchase Order").
 * The parser receives the lookup as a plain function; the bundled table is
 * read from resources/transaction-sets.json once and cached.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export type TransactionNameLookup = (code: string) => string;

/** Name given to transaction sets whose code is not in the table */
export const UNIDENTIFIED_TRANSACTION = 'unidentified';

export const DEFAULT_TRANSACTION_TABLE_PATH = path.resolve(
  __dirname,
  '../../resources/transaction-sets.json'
);

const TransactionTableSchema = z.record(
  z.string().regex(/^\d{3}$/, 'transaction set codes are three digits'),
  z.string().min(1)
);

export type TransactionNameTable = z.infer<typeof TransactionTableSchema>;

let defaultLookup: TransactionNameLookup | null = null;

/**
 * Build a lookup over a fixed table. The table is copied, so later changes
 * to the argument do not leak into the lookup.
 */
export function createTransactionNameLookup(
  table: ReadonlyMap<string, string> | Readonly<Record<string, string>>
): TransactionNameLookup {
  const names = new Map<string, string>(table instanceof Map ? table : Object.entries(table));
  return (code: string) => names.get(code.trim()) ?? UNIDENTIFIED_TRANSACTION;
}

/**
 * Read and validate a JSON table of code to name.
 *
 * @throws Error when the file is not valid JSON or not a code-to-name record
 */
export function loadTransactionNameTable(
  filePath: string = DEFAULT_TRANSACTION_TABLE_PATH
): TransactionNameTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const result = TransactionTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid transaction set table ${filePath}: ${issues}`);
  }
  return result.data;
}

/**
 * Lookup over the bundled table, loaded on first use.
 */
export function getDefaultTransactionNameLookup(): TransactionNameLookup {
  if (!defaultLookup) {
    defaultLookup = createTransactionNameLookup(loadTransactionNameTable());
  }
  return defaultLookup;
}

/**
 * Drop the cached bundled lookup (for testing)
 */
export function resetTransactionNameCache(): void {
  defaultLookup = null;
}
