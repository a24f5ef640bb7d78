/**
 * Message metadata for routing and display.
 *
 * Mirrors what integration engines show for an X12 message:
 * - source: ISA06, or GS02 when the sender ID is blank
 * - type: ST01 of the first transaction set
 * - version: GS08 of the first functional group
 */

import type { X12Document } from './X12Document.js';

export interface X12MetaData {
  source?: string;
  type?: string;
  version?: string;
}

export function getX12MetaData(document: X12Document): X12MetaData {
  const metadata: X12MetaData = {};
  const interchange = document.interchanges[0];
  if (!interchange) {
    return metadata;
  }

  const group = interchange.functionalGroups[0];
  const source = interchange.senderId || group?.applicationSenderCode;
  if (source) {
    metadata.source = source;
  }

  if (group) {
    if (group.version) {
      metadata.version = group.version;
    }
    const transaction = group.transactions[0];
    if (transaction?.transactionCode) {
      metadata.type = transaction.transactionCode;
    }
  }

  return metadata;
}
