import { tmpdir } from 'node:os';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import 'lean-test';

export function makeTestTempDir(prefix: string) {
  return beforeEach<string>(async ({ setParameter }) => {
    const dir = await mkdtemp(join(tmpdir(), prefix));
    setParameter(dir);
    return () => rm(dir, { recursive: true });
  });
}

/** lists all files and directories under `dir`, relative to `dir` */
export async function listTree(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { recursive: true });
  return entries.sort();
}
