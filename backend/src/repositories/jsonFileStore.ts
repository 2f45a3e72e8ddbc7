import path from 'path';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { KeyedLock } from '../lib/keyedLock';

export class CorruptDataFileError extends Error {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Data file ${filePath} is not a valid record list`, { cause });
    this.name = 'CorruptDataFileError';
  }
}

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

/**
 * A JSON array of records in one file. Every call reads the file afresh;
 * mutations hold a per-file lock across their read-modify-write.
 */
export class JsonFileStore<T extends { id: string }> {
  private static readonly locks = new KeyedLock();

  readonly filePath: string;

  constructor(dataDir: string, fileName: string, private readonly schema: z.ZodType<T>) {
    this.filePath = path.join(dataDir, fileName);
  }

  async readAll(): Promise<T[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (e) {
      if (isMissingFile(e)) return [];
      throw e;
    }

    try {
      return z.array(this.schema).parse(JSON.parse(raw));
    } catch (e) {
      throw new CorruptDataFileError(this.filePath, e);
    }
  }

  /** Applies `change` to the current records and writes them back when it asks to. */
  async mutate<R>(change: (records: T[]) => { result: R; write: boolean }): Promise<R> {
    return JsonFileStore.locks.run(this.filePath, async () => {
      const records = await this.readAll();
      const { result, write } = change(records);
      if (write) await this.persist(records);
      return result;
    });
  }

  private async persist(records: T[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(records, null, 2), 'utf-8');
  }
}
