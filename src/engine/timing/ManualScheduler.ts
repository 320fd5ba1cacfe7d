import type { ScheduledTask, Scheduler } from './Scheduler';

interface ManualEntry {
  seq: number;
  dueAt: number;
  callback: () => void;
  active: boolean;
}

/**
 * Virtual clock. Nothing runs until the owner advances time, which makes
 * spin cycles reproducible in tests and headless simulations.
 *
 * Tasks due at the same instant fire in the order they were scheduled.
 */
export class ManualScheduler implements Scheduler {
  private time = 0;
  private seq = 0;
  private entries: ManualEntry[] = [];

  now(): number {
    return this.time;
  }

  get pendingCount(): number {
    return this.entries.length;
  }

  schedule(delayMs: number, callback: () => void): ScheduledTask {
    const entry: ManualEntry = {
      seq: this.seq++,
      dueAt: this.time + Math.max(0, delayMs),
      callback,
      active: true
    };
    this.entries.push(entry);

    const entries = this.entries;
    return {
      dueAt: entry.dueAt,
      get active() {
        return entry.active;
      },
      cancel() {
        if (!entry.active) return;
        entry.active = false;
        const index = entries.indexOf(entry);
        if (index >= 0) entries.splice(index, 1);
      }
    };
  }

  /**
   * Moves the clock forward by `ms`, firing every task that falls due on the
   * way (including tasks scheduled by those callbacks). Returns the number of
   * callbacks run.
   */
  advanceBy(ms: number): number {
    const target = this.time + Math.max(0, ms);
    let fired = 0;
    let next = this.peek();
    while (next && next.dueAt <= target) {
      this.fire(next);
      fired++;
      next = this.peek();
    }
    this.time = target;
    return fired;
  }

  /** Jumps to the next due task and runs it. False when nothing is pending. */
  runNext(): boolean {
    const next = this.peek();
    if (!next) return false;
    this.fire(next);
    return true;
  }

  /** Drains the queue. Throws if it does not settle within `maxTasks`. */
  runAll(maxTasks = 10_000): number {
    let fired = 0;
    while (this.runNext()) {
      fired++;
      if (fired > maxTasks) {
        throw new Error(`ManualScheduler did not settle after ${maxTasks} tasks`);
      }
    }
    return fired;
  }

  private fire(entry: ManualEntry): void {
    this.time = Math.max(this.time, entry.dueAt);
    entry.active = false;
    this.entries.splice(this.entries.indexOf(entry), 1);
    entry.callback();
  }

  private peek(): ManualEntry | undefined {
    let best: ManualEntry | undefined;
    for (const entry of this.entries) {
      if (!best || entry.dueAt < best.dueAt || (entry.dueAt === best.dueAt && entry.seq < best.seq)) {
        best = entry;
      }
    }
    return best;
  }
}
