export interface TestPart {
  name?: string;
  filename?: string;
  contentType?: string;
  /** extra raw header lines */
  headers?: string[];
  /** replaces the generated Content-Disposition header */
  disposition?: string;
  value: string | Buffer;
}

export interface TestBodyOptions {
  preamble?: string;
  epilogue?: string;
  lineEnding?: string;
}

export const TEST_BOUNDARY = 'TestBoundary123';
export const TEST_CONTENT_TYPE = `multipart/form-data; boundary=${TEST_BOUNDARY}`;

export function makeMultipartBody(
  parts: TestPart[],
  { preamble = '', epilogue = '', lineEnding = '\r\n' }: TestBodyOptions = {},
  boundary = TEST_BOUNDARY,
) {
  const nl = lineEnding;
  const chunks: Buffer[] = [Buffer.from(preamble)];
  for (const part of parts) {
    const headers: string[] = [];
    if (part.disposition !== undefined) {
      headers.push(`Content-Disposition: ${part.disposition}`);
    } else {
      let disposition = `Content-Disposition: form-data; name="${part.name ?? ''}"`;
      if (part.filename !== undefined) {
        disposition += `; filename="${part.filename}"`;
      }
      headers.push(disposition);
    }
    if (part.contentType) {
      headers.push(`Content-Type: ${part.contentType}`);
    }
    headers.push(...(part.headers ?? []));
    chunks.push(Buffer.from(`--${boundary}${nl}${headers.map((h) => h + nl).join('')}${nl}`));
    chunks.push(typeof part.value === 'string' ? Buffer.from(part.value) : part.value);
    chunks.push(Buffer.from(nl));
  }
  chunks.push(Buffer.from(`--${boundary}--${nl}${epilogue}`));
  return Buffer.concat(chunks);
}
