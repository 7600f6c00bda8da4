import { promises as fs } from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import { Logger } from 'pino';
import baseLogger from '../utils/logger';

/**
 * Serialises async critical sections per key within this process.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export class CorruptRecordError extends Error {
  public filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Stored record at ${filePath} is not valid JSON`);
    this.name = 'CorruptRecordError';
    this.filePath = filePath;
    this.cause = cause;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON documents on disk. Writes go through a temp file and rename so a
 * reader never observes a half-written document.
 */
export class JsonFileStore {
  private readonly lock = new KeyedLock();

  private readonly logger: Logger;

  constructor(private readonly rootDir: string, logger?: Logger) {
    this.logger = logger ?? baseLogger.child({ module: 'json-store' });
  }

  resolve(...segments: string[]): string {
    return path.join(this.rootDir, ...segments);
  }

  async read(filePath: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new CorruptRecordError(filePath, error);
    }
  }

  async write(filePath: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${nanoid(8)}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    try {
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async remove(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(dirPath: string, extension = '.json'): Promise<string[]> {
    try {
      const entries = await fs.readdir(dirPath);
      return entries.filter((entry) => entry.endsWith(extension)).map((entry) => path.join(dirPath, entry));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  /** Read-modify-write under the per-file lock. */
  async mutate<T>(filePath: string, mutator: (current: unknown) => Promise<T> | T, serialise: (result: T) => unknown): Promise<T> {
    return this.lock.run(filePath, async () => {
      const current = await this.read(filePath);
      const next = await mutator(current);
      await this.write(filePath, serialise(next));
      this.logger.trace({ filePath }, 'json document written');
      return next;
    });
  }

  withLock<T>(filePath: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(filePath, task);
  }
}
