/**
 * JSON blob repair
 *
 * The reporter embeds its metadata as a JSON-like string in a `data-jsonblob`
 * attribute. The templating step that writes it sometimes under-escapes quotes or
 * emits bare object keys. Instead of rejecting such blobs, an ordered list of textual
 * rewrite rules turns them into text that `JSON.parse` can usually read. Rule order
 * matters: later rules assume earlier ones already normalized quoting.
 *
 * The repairer never parses; deciding whether the result is usable is the caller's job.
 */

import { logger } from '../../utils/logger.js';

export interface JsonBlobRepairRule {
  readonly name: string;
  readonly apply: (text: string) => string;
}

const SURROUNDING_QUOTES = /^(["'])([\s\S]*)\1$/;

export const trimOuterQuotes: JsonBlobRepairRule = {
  name: 'trim-outer-quotes',
  apply: (text) => {
    const trimmed = text.trim();
    const match = trimmed.match(SURROUNDING_QUOTES);
    return match ? match[2] : trimmed;
  },
};

export const unescapeQuotesAndWhitespace: JsonBlobRepairRule = {
  name: 'unescape-quotes-and-whitespace',
  apply: (text) => text.replace(/\\"/g, '"').replace(/\\n/g, ' ').replace(/\\t/g, ' '),
};

export const quoteBareKeys: JsonBlobRepairRule = {
  name: 'quote-bare-keys',
  apply: (text) => text.replace(/([{,]\s*)([a-zA-Z0-9_-]+)\s*:/g, '$1"$2":'),
};

export const tightenStringValues: JsonBlobRepairRule = {
  name: 'tighten-string-values',
  apply: (text) => text.replace(/:\s*"([^"]*)"([},])/g, ':"$1"$2'),
};

export const singleToDoubleQuotes: JsonBlobRepairRule = {
  name: 'single-to-double-quotes',
  apply: (text) => text.replace(/'/g, '"'),
};

/**
 * Default repair rules, in application order
 */
export const JSON_BLOB_REPAIR_RULES: readonly JsonBlobRepairRule[] = [
  trimOuterQuotes,
  unescapeQuotesAndWhitespace,
  quoteBareKeys,
  tightenStringValues,
  singleToDoubleQuotes,
];

/**
 * Apply the repair rules to a raw blob.
 *
 * Never throws. If a rule fails, the text as it stood before that rule is returned.
 *
 * @param blob - Raw attribute value
 * @param rules - Rules to apply in order (defaults to `JSON_BLOB_REPAIR_RULES`)
 * @returns Best-effort JSON text
 */
export function repairJsonBlob(
  blob: string,
  rules: readonly JsonBlobRepairRule[] = JSON_BLOB_REPAIR_RULES
): string {
  let text = blob;
  for (const rule of rules) {
    try {
      text = rule.apply(text);
    } catch (error) {
      logger.warn({ error, rule: rule.name }, 'JSON blob repair rule failed, returning partially repaired text');
      return text;
    }
  }
  return text;
}
