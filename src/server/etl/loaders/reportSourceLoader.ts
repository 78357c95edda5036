/**
 * Report Source Loader
 *
 * Retrieves raw report HTML from a local path or an http(s) URL.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { isAxiosError, type AxiosInstance } from 'axios';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { isUrl } from '../../../shared/typeGuards.js';
import { ReportSourceError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Fetches the body of a report URL as text
 */
export type ReportFetcher = (url: string) => Promise<string>;

export interface LoadReportOptions {
  /** Replaces the default axios-based fetcher */
  fetcher?: ReportFetcher;
  /** Timeout for the default fetcher */
  timeoutMs?: number;
}

export interface LoadedReport {
  /** Location as given (URL) or resolved (absolute file path) */
  location: string;
  html: string;
}

/**
 * Build the default fetcher on top of the shared axios configuration
 */
export function createAxiosReportFetcher(
  timeoutMs: number = HTTP_TIMEOUTS.LONG,
  client: AxiosInstance = createHttpClient({ timeout: timeoutMs })
): ReportFetcher {
  return async (url) => {
    const response = await client.get<string>(url, {
      responseType: 'text',
      // Keep the HTML as-is; axios would otherwise try JSON.parse on text bodies
      transformResponse: [(data: unknown) => data],
    });
    return typeof response.data === 'string' ? response.data : String(response.data);
  };
}

function describeError(error: unknown): { message: string; context?: Record<string, unknown> } {
  if (isAxiosError(error)) {
    return {
      message: error.response ? `HTTP ${error.response.status}` : error.message,
      context: { status: error.response?.status, code: error.code },
    };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: String(error) };
}

/**
 * Load a report's HTML
 *
 * @param location - File path or http(s) URL
 * @throws {ReportSourceError} if the report cannot be read
 */
export async function loadReportSource(location: string, options: LoadReportOptions = {}): Promise<LoadedReport> {
  if (isUrl(location)) {
    const fetcher = options.fetcher ?? createAxiosReportFetcher(options.timeoutMs);
    try {
      const html = await fetcher(location);
      logger.debug({ location, bytes: Buffer.byteLength(html, 'utf8') }, 'Fetched test report');
      return { location, html };
    } catch (error) {
      const { message, context } = describeError(error);
      throw new ReportSourceError(location, message, context);
    }
  }

  const filePath = path.resolve(location);
  try {
    const html = await fs.readFile(filePath, 'utf-8');
    logger.debug({ location: filePath, bytes: Buffer.byteLength(html, 'utf8') }, 'Read test report from disk');
    return { location: filePath, html };
  } catch (error) {
    const { message } = describeError(error);
    throw new ReportSourceError(filePath, message);
  }
}
