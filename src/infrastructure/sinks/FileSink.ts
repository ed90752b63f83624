/**
 * @lumberline/core - File Sink
 */

import { appendFile, writeFile } from 'fs/promises';
import type { RenderedRecord } from '../../application/dispatch/ISubscriberStage';
import { stripAnsi } from '../formatting/ansi';
import type { ISink } from './ISink';

/**
 * File sink options.
 */
export interface FileSinkOptions {
  /**
   * `truncate` empties the file before the first write.
   * @defaultValue 'append'
   */
  mode?: 'append' | 'truncate';
}

/**
 * FileSink - appends each batch to a file, ANSI colour codes removed.
 *
 * @example
 * ```typescript
 * const sink = new FileSink('/var/log/app.log');
 * ```
 */
export class FileSink implements ISink {
  private truncatePending: boolean;

  constructor(
    readonly path: string,
    options: FileSinkOptions = {},
  ) {
    this.truncatePending = options.mode === 'truncate';
  }

  async write(batch: readonly RenderedRecord[]): Promise<void> {
    if (this.truncatePending) {
      await writeFile(this.path, '');
      this.truncatePending = false;
    }
    if (batch.length === 0) return;

    const text = batch.map((record) => `${stripAnsi(record.text)}\n`).join('');
    await appendFile(this.path, text, 'utf8');
  }

  async flush(): Promise<void> {
    // appendFile opens and closes the file on every write
  }
}
