import { tmpdir } from 'node:os';
import { isKnownCharset } from '../util/charset.mts';

export interface ParserLimits {
  /** maximum number of named parts (fields and files) in a request */
  readonly maxFieldCount: number;
  /** files up to this size are kept in memory, larger files are written to disk */
  readonly maxFileMemorySize: number;
  /** maximum size of a single field value in bytes */
  readonly maxFieldSize: number;
  /** maximum combined size of all field names and values */
  readonly maxFieldsMemorySize: number;
  readonly maxFileSize: number;
  /** maximum length of any header line (including its line ending) */
  readonly lineLengthLimit: number;
  /** maximum size of a part's header block */
  readonly maxHeaderSize: number;
  /** preferred read size; upload handlers can request smaller reads */
  readonly chunkSize: number;
  /** charset used to decode field values which do not specify one */
  readonly defaultCharset: string;
  /** charset used to decode non-extended header parameters (e.g. `filename`) */
  readonly paramCharset: string;
  /** reject malformed parts rather than skipping them */
  readonly strict: boolean;
  /** keep the directory portion of uploaded filenames */
  readonly preservePath: boolean;
  /** parent directory for temporary upload files */
  readonly tempDir: string;
}

export type ParserOptions = Partial<ParserLimits>;

const KiB = 1024;
const MiB = 1024 * KiB;

export const DEFAULT_LIMITS: Omit<ParserLimits, 'tempDir'> = {
  maxFieldCount: 4096,
  maxFileMemorySize: 4 * KiB,
  maxFieldSize: 1 * MiB,
  maxFieldsMemorySize: 50 * MiB,
  maxFileSize: Number.POSITIVE_INFINITY,
  lineLengthLimit: 8 * KiB,
  maxHeaderSize: 16 * KiB,
  chunkSize: 64 * KiB,
  defaultCharset: 'utf-8',
  paramCharset: 'utf-8',
  strict: false,
  preservePath: false,
};

export function makeParserLimits(options: ParserOptions = {}): ParserLimits {
  const d = DEFAULT_LIMITS;
  const limits: ParserLimits = {
    maxFieldCount: options.maxFieldCount ?? d.maxFieldCount,
    maxFileMemorySize: options.maxFileMemorySize ?? d.maxFileMemorySize,
    maxFieldSize: options.maxFieldSize ?? d.maxFieldSize,
    maxFieldsMemorySize: options.maxFieldsMemorySize ?? d.maxFieldsMemorySize,
    maxFileSize: options.maxFileSize ?? d.maxFileSize,
    lineLengthLimit: options.lineLengthLimit ?? d.lineLengthLimit,
    maxHeaderSize: options.maxHeaderSize ?? d.maxHeaderSize,
    chunkSize: options.chunkSize ?? d.chunkSize,
    defaultCharset: options.defaultCharset ?? d.defaultCharset,
    paramCharset: options.paramCharset ?? d.paramCharset,
    strict: options.strict ?? d.strict,
    preservePath: options.preservePath ?? d.preservePath,
    tempDir: options.tempDir ?? tmpdir(),
  };
  checkSize('maxFieldCount', limits.maxFieldCount, 0);
  checkSize('maxFileMemorySize', limits.maxFileMemorySize, 0);
  checkSize('maxFieldSize', limits.maxFieldSize, 0);
  checkSize('maxFieldsMemorySize', limits.maxFieldsMemorySize, 0);
  checkSize('maxFileSize', limits.maxFileSize, 0);
  // long enough for a boundary line (2 + 70 + 2 + optional transport padding)
  checkSize('lineLengthLimit', limits.lineLengthLimit, 80);
  checkSize('maxHeaderSize', limits.maxHeaderSize, limits.lineLengthLimit);
  checkSize('chunkSize', limits.chunkSize, 1);
  if (!Number.isFinite(limits.chunkSize)) {
    throw new RangeError('chunkSize must be finite');
  }
  if (!isKnownCharset(limits.defaultCharset)) {
    throw new RangeError(`unknown defaultCharset: ${limits.defaultCharset}`);
  }
  if (!isKnownCharset(limits.paramCharset)) {
    throw new RangeError(`unknown paramCharset: ${limits.paramCharset}`);
  }
  return limits;
}

function checkSize(name: string, value: number, min: number) {
  if (Number.isNaN(value) || value < min) {
    throw new RangeError(`${name} must be at least ${min}`);
  }
  if (Number.isFinite(value) && !Number.isInteger(value)) {
    throw new RangeError(`${name} must be an integer`);
  }
}
