/**
 * TestResultExtractor - Per-test records from the report's results table
 *
 * Layout read here:
 *
 * ```html
 * <table id="results-table">
 *   <tbody class="results-table-row">
 *     <tr class="collapsible">
 *       <td class="col-result">Passed</td>
 *       <td class="col-testId">test_2.py::test_google_search</td>
 *       <td class="col-duration">00:00:07</td>
 *     </tr>
 *     <tr class="extras-row">
 *       <td><div class="media"><img src="..."></div><div class="log">...</div></td>
 *     </tr>
 *   </tbody>
 * </table>
 * ```
 */

import type * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { Attachment, TestCaseRecord } from '../../etl/contracts/types.js';
import { testCaseRecordSchema } from '../../etl/contracts/schemas.js';

/**
 * Log value for tests whose group has no `div.log`. Downstream consumers match on it.
 */
export const NO_LOG_SENTINEL = 'No log output captured.';

export const SCREENSHOT_ATTACHMENT_NAME = 'Screenshot';

function readAttachments(group: cheerio.Cheerio<Element>): Attachment[] {
  const src = group.find('tr.extras-row div.media img').first().attr('src')?.trim();
  if (!src) {
    return [];
  }
  return [{ name: SCREENSHOT_ATTACHMENT_NAME, format_type: 'image', content: src }];
}

// An empty `div.log` is an empty captured log, not a missing one
function readLog(group: cheerio.Cheerio<Element>): string {
  const log = group.find('div.log').first();
  return log.length > 0 ? log.text().trim() : NO_LOG_SENTINEL;
}

/**
 * Read one `tbody.results-table-row` group.
 *
 * @returns The record, or `null` when the primary row or any of result, identifier
 *          or duration is missing or blank
 */
export function readTestCase(group: cheerio.Cheerio<Element>): TestCaseRecord | null {
  const primaryRow = group.find('tr.collapsible').first();
  if (primaryRow.length === 0) {
    return null;
  }

  const candidate = testCaseRecordSchema.safeParse({
    test_id: primaryRow.find('td.col-testId').first().text().trim(),
    result: primaryRow.find('td.col-result').first().text().trim(),
    duration: primaryRow.find('td.col-duration').first().text().trim(),
    log: readLog(group),
    attachments: readAttachments(group),
  });
  return candidate.success ? candidate.data : null;
}

/**
 * Extract all test cases in document order.
 *
 * Incomplete groups are dropped rather than defaulted. A repeated `test_id` keeps the
 * position of its first occurrence and the content of its last.
 */
export function extractTestCases($: cheerio.CheerioAPI): TestCaseRecord[] {
  const byId = new Map<string, TestCaseRecord>();

  $('table#results-table').first().find('tbody.results-table-row').each((_, group) => {
    const record = readTestCase($(group));
    if (record) {
      byId.set(record.test_id, record);
    }
  });

  return [...byId.values()];
}
