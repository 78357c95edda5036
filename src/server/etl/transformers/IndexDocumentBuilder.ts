/**
 * IndexDocumentBuilder - Flatten a parsed report into index documents
 *
 * One document per test case, in report order. Each document carries its own copy
 * of the environment so it stands alone in the index store. Pure transformation:
 * no network or storage access.
 */

import { randomUUID } from 'crypto';
import { validateIndexDocument, type IndexDocument, type ReportDocument } from '../contracts/index.js';
import { toCanonicalUtc } from '../../utils/dateUtils.js';

/**
 * Source of document ids. Must return a fresh, collision-resistant token per call.
 */
export type IdGenerator = () => string;

export interface IndexDocumentBuilderOptions {
  /** Defaults to `crypto.randomUUID` */
  generateId?: IdGenerator;
}

export class IndexDocumentBuilder {
  private readonly generateId: IdGenerator;

  constructor(options: IndexDocumentBuilderOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Build the index batch for one report
   *
   * @throws {InvalidTimestampError} if the report's `processed_at` cannot be parsed
   * @throws {ContractValidationError} if a built document fails the index schema
   */
  build(report: ReportDocument): IndexDocument[] {
    // Every run is a fresh batch: timestamp and processed_at both come from the run metadata
    const processedAt = toCanonicalUtc(report.processed_at);

    return report.tests.map((test, position) =>
      validateIndexDocument(
        {
          id: this.generateId(),
          testId: test.test_id,
          result: test.result,
          duration: test.duration,
          log: test.log,
          timestamp: processedAt,
          environment: structuredClone(report.environment),
          attachments: structuredClone(test.attachments),
          processed_by: report.processed_by,
          processed_at: processedAt,
          processor_version: report.processor_version,
          title: report.title,
        },
        position
      )
    );
  }
}
