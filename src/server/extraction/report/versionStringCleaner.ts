/**
 * Version string cleaning for environment metadata.
 *
 * The HTML reporter renders package and plugin versions as free text such as
 * `pytest: 8.3.3`, `'1.2.3'` or `marker\npytest: 8.3.3` (a literal backslash-n left
 * behind by the reporter's templating). Both extraction paths pass every version
 * token through `cleanVersionString` so the index sees one form.
 */

const REPORTER_ARTIFACTS = /marker\\n|["']/g;

function cleanOnce(token: string): string {
  let cleaned = token.replace(REPORTER_ARTIFACTS, '');

  const colon = cleaned.indexOf(':');
  if (colon !== -1) {
    cleaned = cleaned.slice(colon + 1);
  }

  return cleaned.trim();
}

/**
 * Normalize one version token.
 *
 * Removes `marker\n` artifacts and quote characters, keeps only the text after the
 * first colon, and trims. The pass is repeated until the value stops changing, so
 * `cleanVersionString(cleanVersionString(x)) === cleanVersionString(x)` holds even
 * for tokens like `a: b: 1.0` or `mark"er\n`.
 */
export function cleanVersionString(token: string | null | undefined): string {
  if (!token) {
    return '';
  }

  let current = token;
  for (;;) {
    const next = cleanOnce(current);
    if (next === current) {
      return next;
    }
    current = next;
  }
}
