export const helpText = (name: string) => [
  '',
  `Usage: ${name} [options] <request-file>`,
  '',
  'Reads a raw HTTP request from <request-file> (or stdin if <request-file> is -),',
  'parses its body, and writes a JSON summary to stdout.',
  '',
  'Options:',
  '  -c, --config-file <file>  read options from a JSON file (see schema.json)',
  '  -C, --config-json <json>  read options from a JSON string',
  '  -m, --max-memory <bytes>  largest file to keep in memory',
  '  --max-file-size <bytes>   largest accepted file',
  '  --max-field-size <bytes>  largest accepted field value',
  '  --max-fields <count>      maximum number of fields and files',
  '  -t, --temp-dir <dir>      parent directory for temporary upload files',
  '  --charset <charset>       charset of fields which do not specify one',
  '  -s, --strict              reject malformed parts instead of skipping them',
  '  -p, --preserve-path       keep directories in uploaded filenames',
  '  --scheme <http|https>     scheme to assume for origin-form requests',
  '  --log <none|warn|progress>',
  '  -h, --help                show this help',
  '  -v, --version             show the version',
];
