/**
 * EnvironmentExtractor - Test environment metadata from an HTML test report
 *
 * Two sources, never merged:
 * 1. the `data-jsonblob` attribute of `div#data-container`, repaired and parsed;
 * 2. when that is missing or unparseable, the rendered `table#environment`.
 *
 * The choice is made by `decideEnvironmentSource`, which returns a tagged result so
 * the fallback can be tested without provoking a parse exception.
 */

import type * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { isBoolean, isNumber, isObject, isString } from '../../../shared/typeGuards.js';
import type { EnvironmentRecord, PackageVersions, PluginVersions } from '../../etl/contracts/types.js';
import { repairJsonBlob } from './jsonBlobRepairer.js';
import { cleanVersionString } from './versionStringCleaner.js';

export type EnvironmentFallbackReason = 'missing-container' | 'unparseable-blob' | 'invalid-blob-shape';

export type EnvironmentSourceDecision =
  | { kind: 'parsed'; environment: EnvironmentRecord }
  | { kind: 'fallback'; reason: EnvironmentFallbackReason; detail?: string };

export type EnvironmentSource = 'json-blob' | 'html-table';

export interface EnvironmentExtraction {
  environment: EnvironmentRecord;
  source: EnvironmentSource;
  fallbackReason?: EnvironmentFallbackReason;
}

type VersionFieldMap<K extends string> = ReadonlyArray<readonly [name: string, field: K]>;

// List items match on a `name:` substring (`pytest-playwright: 0.5.2` -> playwright); first match wins
const PACKAGE_FIELDS: VersionFieldMap<keyof PackageVersions> = [
  ['pytest', 'pytest'],
  ['pluggy', 'pluggy'],
];

const PLUGIN_FIELDS: VersionFieldMap<keyof PluginVersions> = [
  ['base-url', 'base_url'],
  ['playwright', 'playwright'],
  ['asyncio', 'asyncio'],
  ['html', 'html'],
  ['metadata', 'metadata'],
];

export function createEmptyEnvironment(): EnvironmentRecord {
  return {
    interpreter_version: '',
    platform: '',
    packages: { pytest: '', pluggy: '' },
    plugins: { base_url: '', playwright: '', asyncio: '', html: '', metadata: '' },
    platform_type: '',
    base_url: '',
  };
}

function toText(value: unknown): string {
  if (isString(value)) return value;
  if (isNumber(value) || isBoolean(value)) return String(value);
  return '';
}

function asRecord(value: unknown): Record<string, unknown> {
  return isObject(value) ? value : {};
}

/**
 * Map a parsed blob to an EnvironmentRecord.
 *
 * Scalars (`Python`, `Platform`, `PLATFORM`, `Base URL`) are copied as text;
 * package and plugin versions go through the version cleaner. Absent keys, `null`,
 * arrays and nested objects in scalar positions all become `''`.
 */
export function extractEnvironmentFromBlob(parsed: Record<string, unknown>): EnvironmentRecord {
  const env = asRecord(parsed.environment);
  const packages = asRecord(env.Packages);
  const plugins = asRecord(env.plugins);

  return {
    interpreter_version: toText(env.Python),
    platform: toText(env.Platform),
    packages: {
      pytest: cleanVersionString(toText(packages.pytest)),
      pluggy: cleanVersionString(toText(packages.pluggy)),
    },
    plugins: {
      base_url: cleanVersionString(toText(plugins['base-url'])),
      playwright: cleanVersionString(toText(plugins.playwright)),
      asyncio: cleanVersionString(toText(plugins.asyncio)),
      html: cleanVersionString(toText(plugins.html)),
      metadata: cleanVersionString(toText(plugins.metadata)),
    },
    platform_type: toText(env.PLATFORM),
    base_url: toText(env['Base URL']),
  };
}

/**
 * Decide the environment source from a raw blob value (or its absence)
 */
export function decideFromBlob(blob: string | undefined): EnvironmentSourceDecision {
  if (blob === undefined) {
    return { kind: 'fallback', reason: 'missing-container' };
  }

  const repaired = repairJsonBlob(blob);
  let parsed: unknown;
  try {
    parsed = JSON.parse(repaired);
  } catch (error) {
    return {
      kind: 'fallback',
      reason: 'unparseable-blob',
      detail: error instanceof Error ? error.message : String(error),
    };
  }

  if (!isObject(parsed)) {
    return { kind: 'fallback', reason: 'invalid-blob-shape', detail: `expected an object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}` };
  }

  return { kind: 'parsed', environment: extractEnvironmentFromBlob(parsed) };
}

/**
 * Read the embedded blob attribute, if the container carries one
 */
export function readJsonBlob($: cheerio.CheerioAPI): string | undefined {
  return $('div#data-container').first().attr('data-jsonblob');
}

export function decideEnvironmentSource($: cheerio.CheerioAPI): EnvironmentSourceDecision {
  return decideFromBlob(readJsonBlob($));
}

function assignVersions<K extends string>(
  $: cheerio.CheerioAPI,
  cell: cheerio.Cheerio<Element>,
  fields: VersionFieldMap<K>,
  target: Record<K, string>
): void {
  cell.find('li').each((_, item) => {
    const text = $(item).text().trim();
    const match = fields.find(([name]) => text.includes(`${name}:`));
    if (match) {
      target[match[1]] = cleanVersionString(text);
    }
  });
}

/**
 * Scrape `table#environment`.
 *
 * Two-column rows; `Packages` and `Plugins` cells hold `<li>name: version</li>` lists.
 * A missing table yields the empty record.
 */
export function extractEnvironmentFromTable($: cheerio.CheerioAPI): EnvironmentRecord {
  const environment = createEmptyEnvironment();

  $('table#environment').first().find('tr').each((_, row) => {
    const cells = $(row).find('td');
    if (cells.length < 2) {
      return;
    }

    const key = cells.eq(0).text().trim();
    const valueCell = cells.eq(1);

    switch (key) {
      case 'Packages':
        assignVersions($, valueCell, PACKAGE_FIELDS, environment.packages);
        break;
      case 'Plugins':
        assignVersions($, valueCell, PLUGIN_FIELDS, environment.plugins);
        break;
      case 'Python':
        environment.interpreter_version = valueCell.text().trim();
        break;
      case 'Platform':
        environment.platform = valueCell.text().trim();
        break;
      case 'PLATFORM':
        environment.platform_type = valueCell.text().trim();
        break;
      case 'Base URL':
        environment.base_url = valueCell.text().trim();
        break;
      default:
        break;
    }
  });

  return environment;
}

/**
 * Resolve the environment and report which path produced it
 */
export function resolveEnvironment($: cheerio.CheerioAPI): EnvironmentExtraction {
  const decision = decideEnvironmentSource($);
  if (decision.kind === 'parsed') {
    return { environment: decision.environment, source: 'json-blob' };
  }
  return {
    environment: extractEnvironmentFromTable($),
    source: 'html-table',
    fallbackReason: decision.reason,
  };
}

/**
 * Extract the environment record. Total: never throws, every field populated.
 */
export function extractEnvironment($: cheerio.CheerioAPI): EnvironmentRecord {
  return resolveEnvironment($).environment;
}
