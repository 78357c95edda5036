import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import {
  NO_LOG_SENTINEL,
  extractTestCases,
} from '../../../../../src/server/extraction/report/TestResultExtractor.js';
import { readReportFixture, reportPage } from '../../../../helpers/fixtures.js';

function group(result: string, testId: string, duration: string, extras: string = ''): string {
  return `
    <tbody class="results-table-row">
      <tr class="collapsible">
        <td class="col-result">${result}</td>
        <td class="col-testId">${testId}</td>
        <td class="col-duration">${duration}</td>
      </tr>
      ${extras ? `<tr class="extras-row"><td class="extra">${extras}</td></tr>` : ''}
    </tbody>`;
}

function loadResults(groups: string): cheerio.CheerioAPI {
  return cheerio.load(reportPage(`<table id="results-table">${groups}</table>`));
}

describe('extractTestCases', () => {
  it('reads every row group of the results table', () => {
    const $ = cheerio.load(readReportFixture('table-environment.html'));
    expect(extractTestCases($)).toEqual([
      {
        test_id: 'test_2.py::test_google_search',
        result: 'Passed',
        duration: '00:00:07',
        log: NO_LOG_SENTINEL,
        attachments: [],
      },
      {
        test_id: 'test_login.py::test_invalid_password',
        result: 'Failed',
        duration: '00:00:03',
        log: 'AssertionError: expected error banner',
        attachments: [{ name: 'Screenshot', format_type: 'image', content: 'assets/test_invalid_password.png' }],
      },
    ]);
  });

  it('drops groups missing a result, identifier or duration', () => {
    const $ = loadResults(
      group('Passed', 'test_a.py::test_one', '00:00:01') +
        group('', 'test_a.py::test_two', '00:00:01') +
        group('Passed', '   ', '00:00:01') +
        group('Passed', 'test_a.py::test_four', ' ')
    );
    expect(extractTestCases($).map((test) => test.test_id)).toEqual(['test_a.py::test_one']);
  });

  it('drops groups without a primary row', () => {
    const $ = loadResults(
      `<tbody class="results-table-row"><tr class="extras-row"><td><div class="log">orphan</div></td></tr></tbody>`
    );
    expect(extractTestCases($)).toEqual([]);
  });

  it('uses the sentinel only when the log element is absent', () => {
    const $ = loadResults(
      group('Passed', 'test_a.py::test_blank', '00:00:01', '<div class="log">   \n  </div>') +
        group('Passed', 'test_a.py::test_empty', '00:00:01', '<div class="media"></div><div class="log"></div>') +
        group('Passed', 'test_a.py::test_no_log_div', '00:00:01', '<div class="media"></div>') +
        group('Passed', 'test_a.py::test_absent', '00:00:01')
    );
    expect(extractTestCases($).map((test) => test.log)).toEqual(['', '', NO_LOG_SENTINEL, NO_LOG_SENTINEL]);
  });

  it('trims cell text and log output', () => {
    const $ = loadResults(
      group('\n  Failed\n', '  test_a.py::test_trim  ', ' 00:00:02 ', '<div class="log">\n  Traceback here\n</div>')
    );
    expect(extractTestCases($)).toEqual([
      {
        test_id: 'test_a.py::test_trim',
        result: 'Failed',
        duration: '00:00:02',
        log: 'Traceback here',
        attachments: [],
      },
    ]);
  });

  it('takes only the first screenshot', () => {
    const $ = loadResults(
      group(
        'Failed',
        'test_a.py::test_shots',
        '00:00:04',
        '<div class="media"><img src=" data:image/png;base64,AAAA "/><img src="second.png"/></div>'
      )
    );
    expect(extractTestCases($)[0].attachments).toEqual([
      { name: 'Screenshot', format_type: 'image', content: 'data:image/png;base64,AAAA' },
    ]);
  });

  it('keeps the first position and the last content of a repeated identifier', () => {
    const $ = loadResults(
      group('Failed', 'test_a.py::test_retry', '00:00:01') +
        group('Passed', 'test_a.py::test_other', '00:00:01') +
        group('Passed', 'test_a.py::test_retry', '00:00:05')
    );
    expect(extractTestCases($).map((test) => [test.test_id, test.result, test.duration])).toEqual([
      ['test_a.py::test_retry', 'Passed', '00:00:05'],
      ['test_a.py::test_other', 'Passed', '00:00:01'],
    ]);
  });

  it('returns nothing without a results table', () => {
    expect(extractTestCases(cheerio.load(reportPage('<p>empty run</p>')))).toEqual([]);
  });
});
