import { describeError } from '../errors/taxonomy.js';
import type { EventLogger } from '../infra/logger.js';
import type { HedgeEngine } from './hedgeEngine.js';

export class EngineWorker {
  private timer?: NodeJS.Timeout;
  private running = false;
  private inFlight = false;

  constructor(
    private readonly engine: HedgeEngine,
    private readonly logger: EventLogger,
    private readonly intervalMs: number,
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    while (this.inFlight) {
      await new Promise((resolve) => setTimeout(resolve, 50));
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  private async tick(): Promise<void> {
    // Overlapping ticks are skipped, not queued.
    if (!this.running || this.inFlight) return;
    this.inFlight = true;

    try {
      const outcomes = await this.engine.tick();
      const admitted = outcomes.filter((outcome) => outcome.status === 'admitted');
      if (admitted.length > 0) {
        await this.logger.log('debug', 'worker.tick', { admitted: admitted.length, pairs: outcomes.length });
      }
    } catch (error) {
      await this.logger.log('error', 'worker.loop.error', {
        error: describeError(error),
      });
    } finally {
      this.inFlight = false;
    }
  }
}
