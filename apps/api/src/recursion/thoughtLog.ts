import { appendFile, mkdir } from 'fs/promises';
import { resolve } from 'path';
import type { ThoughtLogEntry } from '@recursive-witness/shared';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

/** `thoughts_YYYYMMDD.ndjson`, keyed on the UTC day of the entry. */
export function logFileName(date: Date): string {
  const day = date.toISOString().slice(0, 10).replace(/-/g, '');
  return `thoughts_${day}.ndjson`;
}

/**
 * Append-only record of every successful recursion step.
 * Entries are kept in memory for status reporting and written one JSON
 * object per line to a file per calendar day. Nothing reads the files back.
 */
export class ThoughtLog {
  private readonly memory: ThoughtLogEntry[] = [];
  private dirCreated = false;

  constructor(
    private readonly dir: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  filePathFor(date: Date): string {
    return resolve(this.dir, logFileName(date));
  }

  count(): number {
    return this.memory.length;
  }

  entries(): readonly ThoughtLogEntry[] {
    return this.memory;
  }

  async append(entry: ThoughtLogEntry): Promise<void> {
    this.memory.push(entry);

    const path = this.filePathFor(new Date(entry.timestamp));
    try {
      await this.ensureDir();
      await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf-8');
    } catch (err) {
      // The step itself succeeded; a lost log line must not undo it.
      this.logger.error({ err, path }, '[thoughts] Failed to append log entry');
    }
  }

  private async ensureDir(): Promise<void> {
    if (this.dirCreated) return;
    await mkdir(this.dir, { recursive: true });
    this.dirCreated = true;
  }
}
