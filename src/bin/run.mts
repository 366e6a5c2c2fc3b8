#!/usr/bin/env -S node --disable-proto=delete --disallow-code-generation-from-strings
import { createReadStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { ParseError } from '../core/ParseError.mts';
import { parseRequest } from '../request/parseRequest.mts';
import { makeLogger, type Logger } from '../util/log.mts';
import { helpText } from './config/help.mts';
import { loadConfig, readArgs } from './config/loader.mts';
import type { Config } from './config/types.mts';
import { loadSchema, makeSchemaParser } from './config/schema.mts';
import { summariseRequest } from './summary.mts';

const writeLog = (message: string) => process.stderr.write(message + '\n');
let log: Logger = makeLogger('warn', writeLog);

function handleError(error: unknown) {
  process.stdin.destroy();
  process.exitCode = 1;
  if (error instanceof ParseError) {
    log(0, `${error.code} (${error.statusCode}): ${error.message}`);
  } else {
    log(0, error instanceof Error ? error.message : String(error));
  }
}

process.on('unhandledRejection', handleError);
process.on('uncaughtException', handleError);

async function run() {
  const args = readArgs(process.argv.slice(2));

  if (args.get('version') || args.get('help')) {
    const pkg = JSON.parse(await readFile(new URL('../../package.json', import.meta.url), 'utf-8'));
    process.stdout.write(`${pkg.name} ${pkg.version}\n`);
    if (args.get('help')) {
      process.stdout.write(helpText(pkg.name).join('\n') + '\n');
    }
    return;
  }

  const parser = makeSchemaParser<Config>(await loadSchema());
  const { config, input } = await loadConfig(parser, args);
  log = makeLogger(config.log, writeLog);

  const source = input === '-' ? process.stdin : createReadStream(input);
  const req = await parseRequest(source, { ...config, log });
  try {
    log(2, `${req.method} ${req.getFullPath()} (${req.contentType ?? 'no body type'})`);
    await req.parseBody();
    process.stdout.write(JSON.stringify(summariseRequest(req), null, 2) + '\n');
  } finally {
    source.destroy();
    await req.release();
  }
}

run().catch(handleError);
