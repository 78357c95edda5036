/**
 * ReportParser - Normalized report document from raw report HTML
 *
 * Composes the title lookup, environment extraction and test-case extraction, and
 * stamps the run metadata supplied at construction. Missing optional data degrades to
 * defaults; only input with no markup at all is rejected.
 */

import * as cheerio from 'cheerio';
import type { ProcessingContext, ReportDocument } from '../../etl/contracts/types.js';
import { validateProcessingContext } from '../../etl/contracts/validation.js';
import { ReportParseError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  resolveEnvironment,
  type EnvironmentFallbackReason,
  type EnvironmentSource,
} from './EnvironmentExtractor.js';
import { extractTestCases } from './TestResultExtractor.js';

export const DEFAULT_REPORT_TITLE = 'report.html';

const MARKUP_TAG = /<\s*[a-z!][^>]*>/i;

/**
 * Report parsing diagnostics
 */
export interface ReportParseDiagnostics {
  environmentSource: EnvironmentSource;
  fallbackReason?: EnvironmentFallbackReason;
  testCount: number;
}

export interface ReportParseResult {
  report: ReportDocument;
  diagnostics: ReportParseDiagnostics;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function readTitle($: cheerio.CheerioAPI): string {
  const title = $('h1#title').first().text().trim();
  return title || DEFAULT_REPORT_TITLE;
}

export class ReportParser {
  private readonly context: Readonly<ProcessingContext>;
  private readonly log = createChildLogger({ component: 'ReportParser' });

  /**
   * @throws {ContractValidationError} if the processing context is incomplete
   */
  constructor(context: ProcessingContext) {
    this.context = Object.freeze({ ...validateProcessingContext(context) });
  }

  /**
   * Parse report HTML into a frozen ReportDocument
   *
   * @param html - Raw report HTML
   * @param source - Where the report came from; used in error messages
   * @throws {ReportParseError} if the input contains no markup
   */
  parse(html: string, source: string = DEFAULT_REPORT_TITLE): ReportDocument {
    return this.parseDetailed(html, source).report;
  }

  /**
   * Parse report HTML and report which environment path was taken
   *
   * @throws {ReportParseError} if the input contains no markup
   */
  parseDetailed(html: string, source: string = DEFAULT_REPORT_TITLE): ReportParseResult {
    if (html.trim().length === 0) {
      throw new ReportParseError(source, 'document is empty');
    }
    if (!MARKUP_TAG.test(html)) {
      throw new ReportParseError(source, 'document contains no markup');
    }

    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (error) {
      throw new ReportParseError(source, error instanceof Error ? error.message : String(error));
    }

    const { environment, source: environmentSource, fallbackReason } = resolveEnvironment($);
    if (fallbackReason) {
      this.log.debug({ source, fallbackReason }, 'Environment blob unusable, using environment table');
    }

    const tests = extractTestCases($);

    const report: ReportDocument = deepFreeze({
      title: readTitle($),
      environment,
      tests,
      processed_by: this.context.processed_by,
      processed_at: this.context.processed_at,
      processor_version: this.context.processor_version,
    });

    this.log.debug({ source, environmentSource, testCount: tests.length }, 'Parsed test report');

    return {
      report,
      diagnostics: { environmentSource, fallbackReason, testCount: tests.length },
    };
  }
}
