import * as fs from 'fs';
import * as path from 'path';
import PQueue from 'p-queue';
import { IOFailure, errorMessage } from '../errors';

export function formatTsvRow(fields: readonly string[]): string {
  return fields.map(field => field.replace(/[\t\r\n]+/g, ' ')).join('\t') + '\n';
}

/**
 * Append-only TSV file shared by concurrent workers. Appends go through a
 * single-slot queue, one row per write.
 */
export class TsvAppender {
  private readonly queue = new PQueue({ concurrency: 1 });
  private rows = 0;

  constructor(readonly filePath: string) {}

  get rowCount(): number {
    return this.rows;
  }

  /** Creates the file (and its directory), discarding previous contents. */
  async reset(): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, '', 'utf8');
    } catch (error) {
      throw new IOFailure(this.filePath, `Could not create ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
    this.rows = 0;
  }

  async append(fields: readonly string[]): Promise<void> {
    const line = formatTsvRow(fields);
    await this.queue.add(async () => {
      try {
        await fs.promises.appendFile(this.filePath, line, 'utf8');
      } catch (error) {
        throw new IOFailure(this.filePath, `Could not append to ${this.filePath}: ${errorMessage(error)}`, { cause: error });
      }
      this.rows++;
    });
  }

  async flush(): Promise<void> {
    await this.queue.onIdle();
  }
}
