import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Mapper } from './schema.mts';
import type { Config } from './types.mts';

const shorthands = new Map<string, string>([
  ['', 'input'],
  ['-c', 'config-file'],
  ['-C', 'config-json'],
  ['-h', 'help'],
  ['-m', 'max-memory'],
  ['-p', 'preserve-path'],
  ['-s', 'strict'],
  ['-t', 'temp-dir'],
  ['-v', 'version'],
]);
const params = new Map<string, { type: 'string' | 'number' | 'boolean' }>([
  ['input', { type: 'string' }],
  ['config-file', { type: 'string' }],
  ['config-json', { type: 'string' }],
  ['max-memory', { type: 'number' }],
  ['max-file-size', { type: 'number' }],
  ['max-field-size', { type: 'number' }],
  ['max-fields', { type: 'number' }],
  ['temp-dir', { type: 'string' }],
  ['charset', { type: 'string' }],
  ['strict', { type: 'boolean' }],
  ['preserve-path', { type: 'boolean' }],
  ['scheme', { type: 'string' }],
  ['log', { type: 'string' }],
  ['help', { type: 'boolean' }],
  ['version', { type: 'boolean' }],
]);

// flag name -> configuration property
const CONFIG_FLAGS = new Map<string, keyof Config>([
  ['max-memory', 'maxFileMemorySize'],
  ['max-file-size', 'maxFileSize'],
  ['max-field-size', 'maxFieldSize'],
  ['max-fields', 'maxFieldCount'],
  ['temp-dir', 'tempDir'],
  ['charset', 'defaultCharset'],
  ['strict', 'strict'],
  ['preserve-path', 'preservePath'],
  ['scheme', 'scheme'],
  ['log', 'log'],
]);

const canonicalKey = (k: string) => (shorthands.get(k) ?? k).toLowerCase();

export function readArgs(argv: string[]) {
  const config: [string, string][] = [];
  for (let i = 0; i < argv.length; ++i) {
    const arg = argv[i]!;
    if (arg === '--') {
      continue;
    }
    const longParts = /^--([^ =\-][^ =]*)=(.*)$/.exec(arg);
    if (longParts) {
      config.push([longParts[1]!, longParts[2]!]);
      continue;
    }
    const shortParts = /^-([^ =]*)([^ =])=(.*)$/.exec(arg);
    if (shortParts && arg[1] !== '-') {
      for (const c of shortParts[1]!) {
        config.push(['-' + c, '']);
      }
      config.push(['-' + shortParts[2]!, shortParts[3]!]);
      continue;
    }
    if (arg[0] !== '-' || arg === '-') {
      config.push(['', arg]);
      continue;
    }
    const last = arg[1] === '-' ? arg.slice(2) : '-' + arg[arg.length - 1]!;
    let next = argv[i + 1];
    if (next && next[0] === '-' && next.length > 1) {
      next = undefined;
    }
    if (params.get(canonicalKey(last))?.type === 'boolean') {
      // booleans only take a value through --flag=value
      next = undefined;
    }
    if (next !== undefined) {
      ++i;
    }
    if (arg[1] === '-') {
      config.push([last, next ?? '']);
    } else {
      for (const c of arg.slice(1, arg.length - 1)) {
        config.push(['-' + c, '']);
      }
      config.push([last, next ?? '']);
    }
  }
  const lookup = new Map<string, unknown>();
  for (const [k, v] of config) {
    const key = canonicalKey(k);
    const type = params.get(key);
    if (!type) {
      throw new Error(`unknown flag: ${k}`);
    }
    let value: unknown;
    switch (type.type) {
      case 'string':
        value = v;
        break;
      case 'number':
        value = Number.parseFloat(v);
        break;
      case 'boolean':
        value = ['', 'on', 'true', 'yes', 'y', '1'].includes(v.toLowerCase());
        break;
    }
    if (lookup.has(key)) {
      throw new Error(`multiple values for ${key}`);
    }
    lookup.set(key, value);
  }
  return lookup;
}

export interface Invocation {
  config: Config;
  /** path of the raw request to read, or `-` for stdin */
  input: string;
}

export async function loadConfig(
  parser: Mapper<Config>,
  args: Map<string, unknown>,
): Promise<Invocation> {
  const stringParam = (name: string) => {
    const value = args.get(name);
    return typeof value === 'string' ? value : undefined;
  };

  const file = stringParam('config-file');
  const json = stringParam('config-json');
  const input = stringParam('input');

  if (file && json) {
    throw new Error('multiple config files are not supported');
  }
  if (!input) {
    throw new Error('no request file given (use - to read from stdin)');
  }

  const context = { file: file ?? '', path: '' };
  let config: Config;
  if (file) {
    config = parser(JSON.parse(await readFile(file, 'utf-8')), context);
  } else {
    config = parser(json ? JSON.parse(json) : {}, context);
  }

  const overrides: Record<string, unknown> = {};
  for (const [flag, property] of CONFIG_FLAGS) {
    if (args.has(flag)) {
      overrides[property] = args.get(flag);
    }
  }
  const tempDir = stringParam('temp-dir');
  if (tempDir !== undefined) {
    // relative to the working directory, not the config file
    overrides['tempDir'] = resolve(tempDir);
  }
  if (Object.keys(overrides).length) {
    config = parser({ ...config, ...overrides }, context);
  }
  return { config, input };
}
