// ──────────────────────────────────────────
// Runtime: Background refresh
// ──────────────────────────────────────────
// Re-runs the pipeline on an interval so the cache is warm when a request
// arrives. Unchanged files make each tick a cache hit.

import { SnapshotProvider } from './shared/contracts';

export class Runtime {
  private interval: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private pipeline: SnapshotProvider,
    private intervalMs: number
  ) {}

  start(): void {
    if (this.intervalMs <= 0 || this.interval) return;

    this.interval = setInterval(() => {
      this.tick().catch((err) =>
        console.error('[Runtime] Refresh error:', err instanceof Error ? err.message : err)
      );
    }, this.intervalMs);

    console.log(`[Runtime] Started background refresh (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    console.log('[Runtime] Stopped background refresh');
  }

  async runOnce(): Promise<void> {
    const result = await this.pipeline.refresh();
    if (result.status !== 'ok') {
      console.warn(`[Runtime] Pipeline status: ${result.status}`);
    }
  }

  // Skips a tick while the previous refresh is still in flight
  private async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      await this.runOnce();
    } finally {
      this.running = false;
    }
  }
}
