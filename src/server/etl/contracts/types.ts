/**
 * Test Report Contract Types
 *
 * Shapes exchanged between the report parser, the index document builder and the
 * index store. Property names are the field names the downstream index sees.
 */

/**
 * Versions of the core test packages, already passed through the version cleaner
 */
export interface PackageVersions {
  pytest: string;
  pluggy: string;
}

/**
 * Versions of the test runner plugins, already passed through the version cleaner
 */
export interface PluginVersions {
  base_url: string;
  playwright: string;
  asyncio: string;
  html: string;
  metadata: string;
}

/**
 * Test environment of one report. Every leaf is a string; missing data is `''`.
 */
export interface EnvironmentRecord {
  interpreter_version: string;
  platform: string;
  packages: PackageVersions;
  plugins: PluginVersions;
  platform_type: string;
  base_url: string;
}

export type AttachmentFormat = 'image';

export interface Attachment {
  name: string;
  format_type: AttachmentFormat;
  /** Image source reference (URL or data URI) */
  content: string;
}

export interface TestCaseRecord {
  test_id: string;
  /** Reporter label such as `Passed`, `Failed` or `Skipped`; passed through as-is */
  result: string;
  /** Duration text as rendered by the reporter, e.g. `00:00:07` */
  duration: string;
  log: string;
  attachments: Attachment[];
}

/**
 * Run metadata supplied by the invoking process, never read from the report
 */
export interface ProcessingContext {
  processed_by: string;
  /** `YYYY-MM-DD HH:MM:SS` (naive, read as UTC) or an ISO 8601 instant */
  processed_at: string;
  processor_version: string;
}

/**
 * Normalized result of parsing one report. Deep-frozen by the parser.
 */
export interface ReportDocument {
  readonly title: string;
  readonly environment: Readonly<EnvironmentRecord>;
  readonly tests: readonly TestCaseRecord[];
  readonly processed_by: string;
  readonly processed_at: string;
  readonly processor_version: string;
}

/**
 * Self-contained, index-ready record for one test case
 */
export interface IndexDocument {
  /** Fresh random UUID; the index store key */
  id: string;
  testId: string;
  result: string;
  duration: string;
  log: string;
  /** `YYYY-MM-DDTHH:MM:SSZ` */
  timestamp: string;
  environment: EnvironmentRecord;
  attachments: Attachment[];
  processed_by: string;
  /** `YYYY-MM-DDTHH:MM:SSZ` */
  processed_at: string;
  processor_version: string;
  title: string;
}
