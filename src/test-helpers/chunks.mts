/** splits the data into chunks of `size` bytes (the last chunk may be shorter) */
export function splitChunks(data: Buffer | string, size: number) {
  const buf = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  if (size >= buf.byteLength) {
    return [buf];
  }
  const parts: Buffer[] = [];
  for (let i = 0; i < buf.byteLength; i += size) {
    parts.push(buf.subarray(i, i + size));
  }
  return parts;
}

export const byteChunks = (data: Buffer | string) => splitChunks(data, 1);
