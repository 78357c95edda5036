export { cleanVersionString } from './versionStringCleaner.js';
export {
  JSON_BLOB_REPAIR_RULES,
  repairJsonBlob,
  type JsonBlobRepairRule,
} from './jsonBlobRepairer.js';
export {
  createEmptyEnvironment,
  decideEnvironmentSource,
  decideFromBlob,
  extractEnvironment,
  extractEnvironmentFromBlob,
  extractEnvironmentFromTable,
  resolveEnvironment,
  type EnvironmentExtraction,
  type EnvironmentFallbackReason,
  type EnvironmentSource,
  type EnvironmentSourceDecision,
} from './EnvironmentExtractor.js';
export { NO_LOG_SENTINEL, extractTestCases, readTestCase } from './TestResultExtractor.js';
export {
  DEFAULT_REPORT_TITLE,
  ReportParser,
  type ReportParseDiagnostics,
  type ReportParseResult,
} from './ReportParser.js';
