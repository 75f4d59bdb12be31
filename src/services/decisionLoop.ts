import { describeError } from '../errors/taxonomy.js';
import { EventLogger } from '../infra/logger.js';
import { DecisionEngine } from './decisionEngine.js';

export class DecisionLoop {
  private timer?: NodeJS.Timeout;
  private running = false;
  private inFlight = false;
  private skipped = 0;

  constructor(
    private readonly engine: DecisionEngine,
    private readonly logger: EventLogger,
    private readonly intervalMs: number,
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /** Ticks that were skipped because the previous one was still running. */
  overlapsSkipped(): number {
    return this.skipped;
  }

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
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
    await this.engine.settle();
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    if (this.inFlight) {
      this.skipped += 1;
      return;
    }
    this.inFlight = true;

    try {
      await this.engine.tick();
    } catch (error) {
      await this.logger.log('error', 'loop.tick_error', {
        error: describeError(error),
      });
    } finally {
      this.inFlight = false;
    }
  }
}
