// ──────────────────────────────────────────
// Runtime: scheduled batch runs
// ──────────────────────────────────────────

import type { BatchCoordinator } from './domains/batch/coordinator';
import type { FactLoader } from './domains/warehouse/fact.loader';
import { errorMessage } from './shared/errors';
import type { Logger } from './shared/types';

export class Runtime {
  private interval: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private coordinator: BatchCoordinator,
    private factLoader: FactLoader | null,
    private logger: Logger = console
  ) {}

  start(intervalMs: number): void {
    if (intervalMs <= 0 || this.interval) return;
    this.interval = setInterval(() => {
      this.tick().catch((err) => this.logger.error('[Runtime] Scheduled run error:', errorMessage(err)));
    }, intervalMs);
    this.logger.log(`[Runtime] Started scheduled batch runs (every ${intervalMs}ms)`);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.logger.log('[Runtime] Stopped scheduled batch runs');
    }
  }

  /** Skips a tick while the previous one is still going. */
  async tick(): Promise<boolean> {
    if (this.running) return false;
    this.running = true;
    try {
      await this.runOnce();
      return true;
    } finally {
      this.running = false;
    }
  }

  async runOnce(): Promise<void> {
    this.logger.log('[Runtime] Running batch once...');
    await this.coordinator.run();
    if (this.factLoader) {
      await this.factLoader.run();
    }
    this.logger.log('[Runtime] Completed single run');
  }
}
