import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { ProcessingContext } from '../../src/server/etl/contracts/types.js';

const REPORTS_DIR = new URL('../fixtures/reports/', import.meta.url);

export function reportFixturePath(name: string): string {
  return fileURLToPath(new URL(name, REPORTS_DIR));
}

export function readReportFixture(name: string): string {
  return readFileSync(reportFixturePath(name), 'utf-8');
}

export const TEST_CONTEXT: ProcessingContext = {
  processed_by: 'ci-runner',
  processed_at: '2025-07-30 21:01:11',
  processor_version: '2.0.3',
};

/**
 * Minimal report page around the given body markup
 */
export function reportPage(body: string): string {
  return `<!DOCTYPE html><html><head><title>report</title></head><body>${body}</body></html>`;
}
