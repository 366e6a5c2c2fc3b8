import type { LogLevel } from '../../util/log.mts';

export interface Config {
  maxFieldCount?: number;
  maxFileMemorySize?: number;
  maxFieldSize?: number;
  maxFieldsMemorySize?: number;
  maxFileSize?: number;
  lineLengthLimit?: number;
  maxHeaderSize?: number;
  maxRequestHeaderSize?: number;
  chunkSize?: number;
  defaultCharset?: string;
  paramCharset?: string;
  strict?: boolean;
  preservePath?: boolean;
  tempDir?: string;
  scheme?: 'http' | 'https';
  log: LogLevel;
}
