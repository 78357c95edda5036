import { describe, expect, it } from 'vitest';
import { parseIndexReportArgs } from '../../../../src/server/scripts/index-test-report.js';

describe('parseIndexReportArgs', () => {
  it('reads the report location and flags', () => {
    expect(parseIndexReportArgs(['reports/run-7.html', '--dry-run', '--processed-by=release-bot'])).toEqual({
      report: 'reports/run-7.html',
      dryRun: true,
      print: false,
      processedBy: 'release-bot',
      processedAt: undefined,
    });
  });

  it('accepts options before the report', () => {
    expect(parseIndexReportArgs(['--print', '--processed-at=2025-07-30 21:01:11', 'https://reports.example.test/r.html'])).toEqual({
      report: 'https://reports.example.test/r.html',
      dryRun: false,
      print: true,
      processedBy: undefined,
      processedAt: '2025-07-30 21:01:11',
    });
  });

  it('treats an empty option value as unset', () => {
    expect(parseIndexReportArgs(['r.html', '--processed-by='])?.processedBy).toBeUndefined();
  });

  it('returns null without a report', () => {
    expect(parseIndexReportArgs([])).toBeNull();
    expect(parseIndexReportArgs(['--dry-run'])).toBeNull();
  });
});
