import { splitFirst } from '../util/splitFirst.mts';

export interface RequestTarget {
  /** lowercase scheme from an absolute-form target */
  scheme?: string | undefined;
  /** authority from an absolute-form or authority-form target */
  authority?: string | undefined;
  path: string;
  /** the query string without its leading `?` */
  queryString: string;
}

const ABSOLUTE_FORM = /^([a-zA-Z][a-zA-Z0-9+\-.]*):\/\/([^/?#]*)(.*)$/;

/**
 * Splits a request-target into its components. No percent-decoding is applied to the
 * path or query string.
 */
export function parseRequestTarget(target: string, method: string): RequestTarget {
  if (target === '*') {
    return { path: '*', queryString: '' };
  }
  if (method === 'CONNECT' && !target.startsWith('/')) {
    return { authority: target, path: '', queryString: '' };
  }
  const absolute = ABSOLUTE_FORM.exec(target);
  const [rest] = splitFirst(absolute ? absolute[3]! : target, '#');
  const [path, queryString = ''] = splitFirst(rest, '?');
  if (absolute) {
    return {
      scheme: absolute[1]!.toLowerCase(),
      authority: absolute[2]!,
      path: path || '/',
      queryString,
    };
  }
  return { path, queryString };
}

const HOST = /^([a-z0-9.\-]+|\[[a-f0-9]*:[a-f0-9.:]+\])(?::(\d+))?$/;

/**
 * Splits a `host[:port]` string. The host is lowercased and any trailing dot removed.
 *
 * @returns undefined if the host is not valid
 */
export function splitHostPort(raw: string): { host: string; port: number | undefined } | undefined {
  const match = HOST.exec(raw.toLowerCase());
  if (!match) {
    return undefined;
  }
  let host = match[1]!;
  if (host.endsWith('.')) {
    host = host.substring(0, host.length - 1);
  }
  if (match[2] === undefined) {
    return { host, port: undefined };
  }
  const port = Number.parseInt(match[2], 10);
  if (port > 65535) {
    return undefined;
  }
  return { host, port };
}

export const DEFAULT_PORTS = new Map([
  ['http', 80],
  ['https', 443],
  ['ws', 80],
  ['wss', 443],
]);
