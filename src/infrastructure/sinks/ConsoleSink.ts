/**
 * @lumberline/core - Console Sink
 */

import { Level } from '../../domain/metadata/Level';
import type { RenderedRecord } from '../../application/dispatch/ISubscriberStage';
import type { ISink } from './ISink';

/**
 * Output streams of a console sink.
 */
export interface ConsoleStreams {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * ConsoleSink - Warn and Error to stderr, everything else to stdout.
 *
 * Each record is written as one line, in batch order.
 */
export class ConsoleSink implements ISink {
  private readonly streams: ConsoleStreams;

  constructor(streams?: Partial<ConsoleStreams>) {
    this.streams = {
      stdout: streams?.stdout ?? process.stdout,
      stderr: streams?.stderr ?? process.stderr,
    };
  }

  async write(batch: readonly RenderedRecord[]): Promise<void> {
    for (const record of batch) {
      const stream =
        record.level >= Level.Warn ? this.streams.stderr : this.streams.stdout;
      await writeLine(stream, record.text);
    }
  }

  async flush(): Promise<void> {
    // process streams flush on their own
  }
}

/**
 * Write `text` plus a newline, resolving once the stream took it.
 */
export function writeLine(
  stream: NodeJS.WritableStream,
  text: string,
): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(`${text}\n`, (error?: Error | null) => {
      if (error) reject(error);
      else resolve();
    });
  });
}
