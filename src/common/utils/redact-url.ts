/**
 * Reduces a URL to scheme, host and path for logs and error messages.
 * Query strings, fragments and userinfo can carry tokens and are dropped.
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return '[invalid URL]';
  }

  // `origin` is "null" for file: and other non-special schemes.
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
}
