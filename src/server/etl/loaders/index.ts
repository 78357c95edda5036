export {
  InMemoryIndexDocumentSink,
  emptyUploadResult,
  type IndexDocumentSink,
  type IndexUploadResult,
} from './IndexDocumentSink.js';
export {
  INDEX_DOCUMENT_INDEXES,
  MongoIndexDocumentSink,
  type IndexDocumentCollection,
} from './MongoIndexDocumentSink.js';
export {
  createAxiosReportFetcher,
  loadReportSource,
  type LoadReportOptions,
  type LoadedReport,
  type ReportFetcher,
} from './reportSourceLoader.js';
