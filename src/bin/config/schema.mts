import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { SchemaObject } from 'ajv';

export const loadSchema = async (): Promise<SchemaObject> =>
  JSON.parse(await readFile(new URL('schema.json', import.meta.url), 'utf-8'));

/**
 * Builds a mapper which validates configuration against `schema`, fills in defaults, and
 * resolves `uri-reference` strings relative to the file being read.
 *
 * Only the keywords which schema.json uses are supported: `type` (`object`, `string`,
 * `integer`, `number`, `boolean`), `enum`, `default`, `properties`, `required`,
 * `additionalProperties`, `minimum`, `maximum`, `pattern` and `format`.
 */
export function makeSchemaParser<T>(schema: SchemaObject) {
  const convert = (part: SchemaObject): Mapper<unknown> => {
    const validator = makeValidator(part, convert);
    if (part['default'] !== undefined) {
      // each caller gets its own copy
      const def = JSON.stringify(part['default']);
      return (o, ctx) => validator(o === undefined ? JSON.parse(def) : o, ctx);
    }
    return (o, ctx) => (o === undefined ? undefined : validator(o, ctx));
  };
  return convert(schema) as Mapper<T>;
}

function makeValidator(
  part: SchemaObject,
  convert: (part: SchemaObject) => Mapper<unknown>,
): Mapper<unknown> {
  if (Array.isArray(part['enum'])) {
    return mEnum(part['enum']);
  }
  switch (part['type']) {
    case 'boolean':
      return mBoolean;
    case 'integer':
      return mNumber(true, part['minimum'], part['maximum']);
    case 'number':
      return mNumber(false, part['minimum'], part['maximum']);
    case 'object': {
      const additional = part['additionalProperties'] ?? true;
      const properties: [string, SchemaObject][] = Object.entries(part['properties'] ?? {});
      return mObject(
        new Map(properties.map(([k, d]) => [k, convert(d)])),
        typeof additional === 'object' ? convert(additional) : additional ? mAny : mNever,
        part['required'] ?? [],
      );
    }
    case 'string':
      return mString(part['pattern'] ? new RegExp(part['pattern']) : null, part['format'] ?? '');
    default:
      throw new Error(`unsupported schema ${JSON.stringify(part)}`);
  }
}

const mEnum =
  (values: unknown[]): Mapper<unknown> =>
  (o, ctx) => {
    if (!values.includes(o)) {
      throw new ConfigError(`expected one of ${JSON.stringify(values)}`, ctx);
    }
    return o;
  };

const mBoolean: Mapper<boolean> = (o, ctx) => {
  if (typeof o !== 'boolean') {
    throw new ConfigError(`expected boolean, got ${typeof o}`, ctx);
  }
  return o;
};

const mNumber =
  (int: boolean, min: number | undefined, max: number | undefined): Mapper<number> =>
  (o, ctx) => {
    if (typeof o !== 'number') {
      throw new ConfigError(`expected number, got ${typeof o}`, ctx);
    }
    if (int && !Number.isInteger(o)) {
      throw new ConfigError(`expected integer, got ${o}`, ctx);
    }
    if (typeof min === 'number' && o < min) {
      throw new ConfigError(`value cannot be less than ${min}`, ctx);
    }
    if (typeof max === 'number' && o > max) {
      throw new ConfigError(`value cannot be greater than ${max}`, ctx);
    }
    return o;
  };

const mString =
  (pattern: RegExp | null, format: string): Mapper<string> =>
  (o, ctx) => {
    if (typeof o !== 'string') {
      throw new ConfigError(`expected string, got ${typeof o}`, ctx);
    }
    if (pattern && !pattern.test(o)) {
      throw new ConfigError(`expected string matching ${pattern}`, ctx);
    }
    if (format === 'uri-reference' && ctx.file && !o.includes('://')) {
      return resolve(dirname(ctx.file), o);
    }
    return o;
  };

const mObject =
  (
    known: Map<string, Mapper<unknown>>,
    other: Mapper<unknown>,
    required: string[],
  ): Mapper<object> =>
  (o, ctx) => {
    if (typeof o !== 'object' || !o || Array.isArray(o)) {
      throw new ConfigError(`expected object, got ${typeName(o)}`, ctx);
    }
    const r: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(o)) {
      const val = (known.get(k) ?? other)(v, { ...ctx, path: `${ctx.path}.${k}` });
      if (val !== undefined) {
        r[k] = val;
      }
    }
    for (const [k, valueMapper] of known) {
      if (!Object.hasOwn(o, k)) {
        const val = valueMapper(undefined, { ...ctx, path: `${ctx.path}.${k}` });
        if (val !== undefined) {
          r[k] = val;
        }
      }
    }
    for (const req of required) {
      if (r[req] === undefined) {
        throw new ConfigError(`missing required property ${JSON.stringify(req)}`, ctx);
      }
    }
    return r;
  };

const typeName = (o: unknown) => (o === null ? 'null' : Array.isArray(o) ? 'list' : typeof o);

const mAny: Mapper<unknown> = (o) => o;
const mNever: Mapper<never> = (_, ctx) => {
  throw new ConfigError('unknown property', ctx);
};

export interface Context {
  /** the file being parsed, used to resolve relative paths (empty if not from a file) */
  file: string;
  /** location of the current value, for error messages */
  path: string;
}

export type Mapper<T> = (o: unknown, context: Context) => T;

export class ConfigError extends Error {
  constructor(message: string, ctx: Context) {
    super(`${message} at ${ctx.path || 'root'}`);
  }
}
