export interface ScheduledTask {
  /** Scheduler time (ms) at which the callback is due. */
  readonly dueAt: number;
  readonly active: boolean;
  cancel(): void;
}

/**
 * Every delayed transition in the runtime goes through a Scheduler. All
 * callbacks run on the same event loop as input handlers, one at a time.
 */
export interface Scheduler {
  /** Current scheduler time in milliseconds. */
  now(): number;
  schedule(delayMs: number, callback: () => void): ScheduledTask;
}
