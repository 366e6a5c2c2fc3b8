// https://datatracker.ietf.org/doc/html/rfc6265#section-4.2

/**
 * Reads the name/value pairs from `Cookie` headers. If a name appears more than once, the
 * first value is kept (user agents send more specific cookies first). Malformed pairs are
 * ignored.
 */
export function parseCookies(headers: readonly string[]): Map<string, string> {
  const result = new Map<string, string>();
  for (const header of headers) {
    for (const pair of header.split(';')) {
      const sep = pair.indexOf('=');
      if (sep === -1) {
        continue;
      }
      const name = pair.substring(0, sep).trim();
      let value = pair.substring(sep + 1).trim();
      if (value.length >= 2 && value[0] === '"' && value[value.length - 1] === '"') {
        value = value.substring(1, value.length - 1);
      }
      if (name && !result.has(name)) {
        result.set(name, value);
      }
    }
  }
  return result;
}
