/**
 * Report index pipeline
 *
 * load -> parse -> build -> upload for one report. The batch is fully built and
 * validated before the sink sees it, so a failure at any step leaves the index
 * untouched for that report.
 */

import { randomUUID } from 'crypto';
import type { IndexDocument } from '../contracts/types.js';
import type { ReportParser } from '../../extraction/report/ReportParser.js';
import type { EnvironmentFallbackReason, EnvironmentSource } from '../../extraction/report/EnvironmentExtractor.js';
import type { IndexDocumentBuilder } from '../transformers/IndexDocumentBuilder.js';
import type { IndexDocumentSink, IndexUploadResult } from '../loaders/IndexDocumentSink.js';
import { loadReportSource, type LoadReportOptions, type LoadedReport } from '../loaders/reportSourceLoader.js';
import { createChildLogger, runContext } from '../../utils/logger.js';

export type ReportLoader = (location: string) => Promise<LoadedReport>;

export interface ReportIndexPipelineOptions {
  parser: ReportParser;
  builder: IndexDocumentBuilder;
  sink: IndexDocumentSink;
  /** Defaults to loadReportSource with `loadOptions` */
  loader?: ReportLoader;
  loadOptions?: LoadReportOptions;
}

export interface ReportIndexRunResult {
  source: string;
  title: string;
  documentCount: number;
  environmentSource: EnvironmentSource;
  fallbackReason?: EnvironmentFallbackReason;
  documents: IndexDocument[];
  upload: IndexUploadResult;
}

export class ReportIndexPipeline {
  private readonly parser: ReportParser;
  private readonly builder: IndexDocumentBuilder;
  private readonly sink: IndexDocumentSink;
  private readonly loader: ReportLoader;

  constructor(options: ReportIndexPipelineOptions) {
    this.parser = options.parser;
    this.builder = options.builder;
    this.sink = options.sink;
    const loadOptions = options.loadOptions ?? {};
    this.loader = options.loader ?? ((location) => loadReportSource(location, loadOptions));
  }

  /**
   * Index one report
   *
   * @param source - File path or http(s) URL of the report
   * @throws {ReportSourceError} if the report cannot be loaded
   * @throws {ReportParseError} if the report has no markup
   * @throws {InvalidTimestampError} if the processing time cannot be normalized
   * @throws {IndexUploadError} if the sink rejects the batch
   */
  async run(source: string): Promise<ReportIndexRunResult> {
    return runContext.run({ runId: randomUUID(), source }, async () => {
      const log = createChildLogger({ component: 'ReportIndexPipeline' });
      const startedAt = Date.now();

      const loaded = await this.loader(source);
      const { report, diagnostics } = this.parser.parseDetailed(loaded.html, loaded.location);
      const documents = this.builder.build(report);

      if (diagnostics.fallbackReason) {
        log.warn({ fallbackReason: diagnostics.fallbackReason }, 'Environment read from table');
      }

      const upload = await this.sink.upload(documents);

      log.info(
        {
          title: report.title,
          documentCount: documents.length,
          environmentSource: diagnostics.environmentSource,
          target: upload.target,
          durationMs: Date.now() - startedAt,
        },
        'Indexed test report'
      );

      return {
        source: loaded.location,
        title: report.title,
        documentCount: documents.length,
        environmentSource: diagnostics.environmentSource,
        fallbackReason: diagnostics.fallbackReason,
        documents,
        upload,
      };
    });
  }
}
