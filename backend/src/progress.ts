// Live scan progress: counters bumped by workers, rendered on a timer.
import type { ProgressSnapshot } from './types.js';

/**
 * Counters are only mutated synchronously on the event loop (never across an await),
 * so readers see a consistent value without locking.
 */
export class ProgressTracker {
  readonly total: number;
  readonly startedAt: number;
  private processed = 0;
  private valid = 0;
  private errors = 0;

  constructor(total: number, private readonly now: () => number = Date.now) {
    this.total = Math.max(0, Math.floor(total));
    this.startedAt = now();
  }

  update(success: boolean, valid: boolean): void {
    this.processed++;
    if (success) {
      if (valid) this.valid++;
    } else {
      this.errors++;
    }
  }

  snapshot(): ProgressSnapshot {
    const processed = this.processed;
    return {
      total: this.total,
      processed,
      valid: this.valid,
      errors: this.errors,
      percentage: this.total > 0 ? (processed / this.total) * 100 : 0,
    };
  }

  isComplete(): boolean {
    return this.processed >= this.total;
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  format(elapsedMs: number = this.elapsedMs()): string {
    const s = this.snapshot();
    return `🔄 Progress: ${s.processed}/${s.total} (${s.percentage.toFixed(1)}%) | ✅ Valid: ${s.valid} | ❌ Errors: ${s.errors} | ⏱️  ${formatElapsed(elapsedMs)}`;
  }
}

/** Whole seconds, e.g. 0s, 42s, 3m5s, 1h2m0s. */
export function formatElapsed(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  if (h > 0) return `${h}h${m}m${s}s`;
  if (m > 0) return `${m}m${s}s`;
  return `${s}s`;
}

export interface ProgressReporter {
  stop(): void;
}

export function startProgressReporter(
  tracker: ProgressTracker,
  opts: { intervalMs?: number; write?: (chunk: string) => void } = {}
): ProgressReporter {
  const intervalMs = opts.intervalMs ?? 1000;
  const write = opts.write ?? ((chunk: string) => { process.stdout.write(chunk); });
  let stopped = false;

  const timer = setInterval(() => {
    write(`\r${tracker.format()}`);
    if (tracker.isComplete()) {
      clearInterval(timer);
    }
  }, intervalMs);

  return {
    stop() {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
      write(`\r${tracker.format()}\n`);
    },
  };
}
