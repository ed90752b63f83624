/**
 * @lumberline/core - Basic Example
 *
 * Instruments a small request handler with nested spans and events.
 * Records go to the console in colour and to a log file in the temp
 * directory with colour codes removed.
 *
 * Run with: npm run build && npm run example
 */

import { tmpdir } from 'os';
import { join } from 'path';
import {
  ConsoleSink,
  FileSink,
  Level,
  TextFormatter,
  createTelemetry,
  loadConfigFromEnv,
  staticFieldsEnricher,
  type ISink,
  type RenderedRecord,
} from '../src';

/**
 * Sink that fans a batch out to several sinks.
 */
class TeeSink implements ISink {
  constructor(private readonly sinks: readonly ISink[]) {}

  async write(batch: readonly RenderedRecord[]): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.write(batch)));
  }

  async flush(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.flush()));
  }
}

const telemetry = createTelemetry(
  { ...loadConfigFromEnv(), minLevel: Level.Debug },
  {
    target: 'orders',
    sink: new TeeSink([
      new ConsoleSink(),
      new FileSink(join(tmpdir(), 'orders-example.log'), { mode: 'truncate' }),
    ]),
    formatter: new TextFormatter({ color: true }),
    stages: [staticFieldsEnricher({ service: 'orders-api' })],
  },
);

async function loadOrder(orderId: number): Promise<{ id: number; total: number }> {
  return telemetry.withSpan(
    'db.load-order',
    async (span) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      span.addField('rows', 1);
      return { id: orderId, total: 42.5 };
    },
    { orderId },
    { level: Level.Debug, target: 'orders.db' },
  );
}

async function handleRequest(orderId: number): Promise<void> {
  await telemetry.withSpan(
    'GET /orders/:id',
    async (span) => {
      telemetry.info('request received', { orderId });
      const order = await loadOrder(orderId);
      telemetry.debug('order loaded', { order });
      span.addField('status', 200);
    },
    { method: 'GET' },
  );
}

async function main(): Promise<void> {
  await Promise.all([handleRequest(1), handleRequest(2)]);
  telemetry.warn('cache miss ratio high', { ratio: 0.4 });

  await telemetry.shutdown();
  console.log('counters:', telemetry.counters.snapshot());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
