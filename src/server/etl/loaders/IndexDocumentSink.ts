/**
 * Index document sinks
 *
 * The boundary to the external index store. A sink receives one complete batch per
 * report and treats `id` as the document key (upsert-or-insert). Builders always mint
 * fresh ids, so repeated runs append rather than overwrite.
 */

import type { IndexDocument } from '../contracts/types.js';

export interface IndexUploadResult {
  /** Store-specific name of the target (collection, index, ...) */
  target: string;
  submitted: number;
  inserted: number;
  updated: number;
}

export interface IndexDocumentSink {
  readonly target: string;
  upload(documents: readonly IndexDocument[]): Promise<IndexUploadResult>;
}

export function emptyUploadResult(target: string): IndexUploadResult {
  return { target, submitted: 0, inserted: 0, updated: 0 };
}

/**
 * Keeps uploaded batches in memory. Used for dry runs and tests.
 */
export class InMemoryIndexDocumentSink implements IndexDocumentSink {
  readonly target: string;
  private readonly documents = new Map<string, IndexDocument>();
  private readonly batches: IndexDocument[][] = [];

  constructor(target: string = 'memory') {
    this.target = target;
  }

  async upload(documents: readonly IndexDocument[]): Promise<IndexUploadResult> {
    if (documents.length === 0) {
      return emptyUploadResult(this.target);
    }

    let inserted = 0;
    let updated = 0;
    for (const document of documents) {
      if (this.documents.has(document.id)) {
        updated++;
      } else {
        inserted++;
      }
      this.documents.set(document.id, structuredClone(document));
    }
    this.batches.push(documents.map((document) => structuredClone(document)));

    return { target: this.target, submitted: documents.length, inserted, updated };
  }

  getBatches(): IndexDocument[][] {
    return this.batches.map((batch) => [...batch]);
  }

  getDocuments(): IndexDocument[] {
    return [...this.documents.values()];
  }
}
