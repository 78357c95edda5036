import { describe, expect, it } from 'vitest';
import { DEFAULT_REPORT_TITLE, ReportParser } from '../../../../../src/server/extraction/report/ReportParser.js';
import { NO_LOG_SENTINEL } from '../../../../../src/server/extraction/report/TestResultExtractor.js';
import { createEmptyEnvironment } from '../../../../../src/server/extraction/report/EnvironmentExtractor.js';
import type { ProcessingContext } from '../../../../../src/server/etl/contracts/types.js';
import { ContractValidationError, ReportParseError } from '../../../../../src/server/types/errors.js';
import { TEST_CONTEXT, readReportFixture, reportPage } from '../../../../helpers/fixtures.js';

describe('ReportParser', () => {
  const parser = new ReportParser(TEST_CONTEXT);

  it('parses a report whose environment is only in the table', () => {
    const report = parser.parse(readReportFixture('table-environment.html'));

    expect(report.title).toBe('report.html');
    expect(report.tests[0]).toEqual({
      test_id: 'test_2.py::test_google_search',
      result: 'Passed',
      duration: '00:00:07',
      log: NO_LOG_SENTINEL,
      attachments: [],
    });
    expect(report.environment.interpreter_version).toBe('3.11.9');
    expect(report.processed_by).toBe('ci-runner');
    expect(report.processed_at).toBe('2025-07-30 21:01:11');
    expect(report.processor_version).toBe('2.0.3');
  });

  it('reports which environment path was taken', () => {
    expect(parser.parseDetailed(readReportFixture('table-environment.html')).diagnostics).toEqual({
      environmentSource: 'html-table',
      fallbackReason: 'missing-container',
      testCount: 2,
    });

    const { report, diagnostics } = parser.parseDetailed(readReportFixture('json-blob-environment.html'));
    expect(diagnostics).toEqual({ environmentSource: 'json-blob', fallbackReason: undefined, testCount: 3 });
    expect(report.title).toBe('nightly-api.html');
    expect(report.environment.interpreter_version).toBe('3.12.4');
  });

  it('returns a deeply frozen document', () => {
    const report = parser.parse(readReportFixture('table-environment.html'));
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.environment.packages)).toBe(true);
    expect(Object.isFrozen(report.tests)).toBe(true);
    expect(Object.isFrozen(report.tests[1].attachments[0])).toBe(true);
  });

  it('falls back to defaults for a page without report sections', () => {
    const report = parser.parse(reportPage('<p>nothing to see</p>'));
    expect(report.title).toBe(DEFAULT_REPORT_TITLE);
    expect(report.tests).toEqual([]);
    expect(report.environment).toEqual(createEmptyEnvironment());
  });

  it('repairs a malformed blob', () => {
    const html = reportPage(
      `<div id="data-container" data-jsonblob="{environment:{Python:'3.11.9', Packages:{pytest:'pytest: 8.3.3'}}}"></div>`
    );
    const { report, diagnostics } = parser.parseDetailed(html);
    expect(diagnostics.environmentSource).toBe('json-blob');
    expect(report.environment.interpreter_version).toBe('3.11.9');
    expect(report.environment.packages.pytest).toBe('8.3.3');
  });

  it('falls back to the table for a blob it cannot repair', () => {
    const html = reportPage(`
      <div id="data-container" data-jsonblob="{environment: {Python: 3.11.9}}"></div>
      <table id="environment"><tr><td>Python</td><td>3.10.14</td></tr></table>`);
    const { report, diagnostics } = parser.parseDetailed(html);
    expect(diagnostics.fallbackReason).toBe('unparseable-blob');
    expect(report.environment.interpreter_version).toBe('3.10.14');
  });

  it('rejects input without markup', () => {
    expect(() => parser.parse('')).toThrow(ReportParseError);
    expect(() => parser.parse('  \n\t')).toThrow("Failed to parse test report 'report.html': document is empty");
    expect(() => parser.parse('just some text, no tags', 'reports/run-7.html')).toThrow(
      "Failed to parse test report 'reports/run-7.html': document contains no markup"
    );
  });

  it('rejects an incomplete processing context', () => {
    expect(() => new ReportParser({ ...TEST_CONTEXT, processed_by: '' })).toThrow(ContractValidationError);
    expect(() => new ReportParser({ ...TEST_CONTEXT, processed_at: 'yesterday' })).toThrow(ContractValidationError);
  });

  it('rejects a processing time the index documents could not carry', () => {
    expect(() => new ReportParser({ ...TEST_CONTEXT, processed_at: '2025-02-30 10:00:00' })).toThrow(
      ContractValidationError
    );
    expect(() => new ReportParser({ ...TEST_CONTEXT, processed_at: '2025-07-30T21:01:11' })).toThrow(
      ContractValidationError
    );
  });

  it('is not affected by later changes to the context it was given', () => {
    const context: ProcessingContext = { ...TEST_CONTEXT };
    const ownParser = new ReportParser(context);
    context.processed_by = 'someone-else';
    expect(ownParser.parse(readReportFixture('table-environment.html')).processed_by).toBe('ci-runner');
  });
});
