/**
 * @lumberline/core - Background Services
 *
 * Long-running loops owned by the telemetry core, such as an exporter's
 * drain loop.
 */

import { describeError } from '../../domain/exceptions/exceptions';
import { consoleLogger, type ILogger } from '../diagnostics/logger';

/**
 * Background service interface
 */
export interface IBackgroundService {
  /** Service name */
  readonly name: string;

  /** Start the service */
  start(): Promise<void>;

  /** Stop the service */
  stop(): Promise<void>;

  /** Check if service is running */
  isRunning(): boolean;
}

/**
 * Abstract base class for background services
 */
export abstract class BackgroundServiceBase implements IBackgroundService {
  abstract readonly name: string;
  protected running = false;
  protected abortController: AbortController | null = null;
  protected loop: Promise<void> | null = null;

  constructor(protected readonly logger: ILogger = consoleLogger) {}

  async start(): Promise<void> {
    if (this.running) return;

    this.running = true;
    this.abortController = new AbortController();

    // Start the execution loop
    this.loop = this.executeAsync(this.abortController.signal)
      .catch((error: unknown) => {
        this.logger.error(`[${this.name}] Service error: ${describeError(error)}`);
      })
      .finally(() => {
        this.running = false;
      });
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    this.abortController?.abort();
    await this.loop;
    this.abortController = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Implement this method to run the background task
   */
  protected abstract executeAsync(signal: AbortSignal): Promise<void>;
}
