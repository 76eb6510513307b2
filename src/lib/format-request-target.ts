const SECRET_PARAMS = ['secret', 'oauth_token', 'api_key', 'token', 'password', 'pw'];

/**
 * Path and query of a request target for log lines, with secret parameter
 * values replaced by asterisks.
 *
 * @example
 * formatRequestTarget('/download?file=report.pdf&token=abc123')
 * // Returns: '/download?file=report.pdf&token=***'
 */
export function formatRequestTarget(target: string): string {
  let parsed: URL;
  try {
    parsed = new URL(target, 'http://localhost');
  } catch (_error) {
    // Not parseable as a URL: log it as received
    return target;
  }

  for (const param of SECRET_PARAMS) {
    if (parsed.searchParams.has(param)) {
      parsed.searchParams.set(param, '***');
    }
  }

  return `${parsed.pathname}${parsed.search}`;
}
