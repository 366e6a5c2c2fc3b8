import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';

export interface TempFileStorage {
  /** the directory, or null if it has not been created yet */
  readonly dir: string | null;
  /** returns a new unique path in the temporary directory (creating the directory if needed) */
  nextFile(): Promise<string>;
  /** deletes the directory and everything in it */
  release(): Promise<void>;
}

export function makeTempFileStorage(parentDir: string): TempFileStorage {
  let dirPromise: Promise<string> | null = null;
  let dir: string | null = null;
  let released = false;
  let fileIndex = 0;

  const getDir = () => {
    if (!dirPromise) {
      dirPromise = mkdtemp(join(parentDir, 'upload')).then((created) => {
        dir = created;
        return created;
      });
    }
    return dirPromise;
  };

  return {
    get dir() {
      return dir;
    },

    async nextFile() {
      if (released) {
        throw new Error('temporary storage has been released');
      }
      const base = await getDir();
      return join(base, (++fileIndex).toString(10).padStart(6, '0'));
    },

    async release() {
      released = true;
      if (dirPromise) {
        // creation failures have already been reported by nextFile
        const created = await dirPromise.catch(() => null);
        if (created) {
          await rm(created, { recursive: true, force: true });
        }
      }
    },
  };
}
