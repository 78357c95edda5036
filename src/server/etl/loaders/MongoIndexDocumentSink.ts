/**
 * MongoDB index document sink
 *
 * Bulk-writes one report's batch as `replaceOne` upserts keyed by `id`. The field
 * indexes mirror what the downstream search schema filters and sorts on.
 */

import type { AnyBulkWriteOperation, BulkWriteOptions, Db, IndexDescription } from 'mongodb';
import type { IndexDocument } from '../contracts/types.js';
import { IndexUploadError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { emptyUploadResult, type IndexDocumentSink, type IndexUploadResult } from './IndexDocumentSink.js';

/**
 * The part of a MongoDB collection the sink uses
 */
export interface IndexDocumentCollection {
  readonly collectionName: string;
  bulkWrite(
    operations: AnyBulkWriteOperation<IndexDocument>[],
    options?: BulkWriteOptions
  ): Promise<{ upsertedCount: number; modifiedCount: number; matchedCount: number }>;
  createIndexes(indexSpecs: IndexDescription[]): Promise<string[]>;
}

export const INDEX_DOCUMENT_INDEXES: IndexDescription[] = [
  { key: { id: 1 }, name: 'id_unique', unique: true },
  { key: { testId: 1 }, name: 'testId' },
  { key: { result: 1 }, name: 'result' },
  { key: { timestamp: -1 }, name: 'timestamp_desc' },
  { key: { processed_at: -1 }, name: 'processed_at_desc' },
  { key: { 'environment.platform_type': 1 }, name: 'environment_platform_type' },
];

export class MongoIndexDocumentSink implements IndexDocumentSink {
  private readonly collection: IndexDocumentCollection;

  constructor(collection: IndexDocumentCollection) {
    this.collection = collection;
  }

  /**
   * Create a sink for a collection of the given database
   */
  static fromDb(db: Db, collectionName: string): MongoIndexDocumentSink {
    return new MongoIndexDocumentSink(db.collection<IndexDocument>(collectionName));
  }

  get target(): string {
    return this.collection.collectionName;
  }

  /**
   * Create the key and filter indexes if they do not exist yet
   *
   * @throws {IndexUploadError} if index creation fails
   */
  async ensureIndexes(): Promise<string[]> {
    try {
      const created = await this.collection.createIndexes(INDEX_DOCUMENT_INDEXES);
      logger.debug({ collection: this.target, indexes: created }, 'Ensured index document indexes');
      return created;
    } catch (error) {
      throw new IndexUploadError(this.target, error instanceof Error ? error.message : String(error), { stage: 'ensureIndexes' });
    }
  }

  /**
   * @throws {IndexUploadError} if the bulk write fails
   */
  async upload(documents: readonly IndexDocument[]): Promise<IndexUploadResult> {
    if (documents.length === 0) {
      logger.debug({ collection: this.target }, 'No index documents to upload');
      return emptyUploadResult(this.target);
    }

    const operations: AnyBulkWriteOperation<IndexDocument>[] = documents.map((document) => ({
      replaceOne: {
        filter: { id: document.id },
        replacement: { ...document },
        upsert: true,
      },
    }));

    try {
      const result = await this.collection.bulkWrite(operations, { ordered: false });
      logger.info(
        { collection: this.target, submitted: documents.length, upserted: result.upsertedCount, modified: result.modifiedCount },
        'Uploaded index documents'
      );
      return {
        target: this.target,
        submitted: documents.length,
        inserted: result.upsertedCount,
        updated: result.modifiedCount,
      };
    } catch (error) {
      throw new IndexUploadError(
        this.target,
        error instanceof Error ? error.message : String(error),
        { submitted: documents.length }
      );
    }
  }
}
