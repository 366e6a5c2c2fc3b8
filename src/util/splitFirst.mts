/** splits `value` at the first `delimiter`. The second item is undefined if there is none */
export function splitFirst(value: string, delimiter: string): [string, string | undefined] {
  const p = value.indexOf(delimiter);
  return p === -1 ? [value, undefined] : [value.slice(0, p), value.slice(p + delimiter.length)];
}
