import {
  MonitorBatchError,
  type MonitorRegistry,
  type MonitorRunResult,
  type MonitorRunner,
} from '@vigil/monitor-engine';
import { type Logger, describeError } from '@vigil/shared';

export interface MonitorTickWorkerOptions {
  runner: MonitorRunner;
  registry: MonitorRegistry;
  logger: Logger;
}

/**
 * Runs every registered monitor on a fixed interval. A tick that starts while
 * the previous one is still running is skipped.
 */
export class MonitorTickWorker {
  private readonly runner: MonitorRunner;
  private readonly registry: MonitorRegistry;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | undefined;
  private inFlight: Promise<MonitorRunResult[]> | undefined;

  constructor(options: MonitorTickWorkerOptions) {
    this.runner = options.runner;
    this.registry = options.registry;
    this.logger = options.logger;
  }

  get isStarted(): boolean {
    return this.timer !== undefined;
  }

  async tick(): Promise<MonitorRunResult[]> {
    if (this.inFlight !== undefined) {
      this.logger.warn('previous monitor tick still running, skipping');
      return [];
    }

    this.inFlight = this.runner.runAll(this.registry.list());
    try {
      const results = await this.inFlight;
      this.logSummary(results);
      return results;
    } catch (error) {
      if (error instanceof MonitorBatchError) {
        for (const entry of error.errors) {
          this.logger.error('monitor run misconfigured', {
            monitor: entry.monitor,
            environment: entry.environment ?? null,
            error: entry.error.message,
          });
        }
        this.logSummary(error.results);
        return error.results;
      }

      this.logger.error('monitor tick failed', { error: describeError(error) });
      return [];
    } finally {
      this.inFlight = undefined;
    }
  }

  private logSummary(results: MonitorRunResult[]): void {
    this.logger.info('monitor tick complete', {
      runs: results.length,
      failures: results.filter((result) => result.outcome.isFailure()).length,
      disabled: results.filter((result) => result.outcome.isDisabled()).length,
    });
  }

  start(intervalMs: number): void {
    if (this.timer !== undefined) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }
}
