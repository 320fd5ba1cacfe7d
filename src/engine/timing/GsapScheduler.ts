import { gsap } from 'gsap';
import type { ScheduledTask, Scheduler } from './Scheduler';

/**
 * Scheduler running on gsap's global ticker, the same clock the reel tweens
 * use. Delays are given in ms; gsap works in seconds.
 */
export class GsapScheduler implements Scheduler {
  now(): number {
    return gsap.ticker.time * 1000;
  }

  schedule(delayMs: number, callback: () => void): ScheduledTask {
    const delay = Math.max(0, delayMs);
    const dueAt = this.now() + delay;
    let active = true;

    const call = gsap.delayedCall(delay / 1000, () => {
      if (!active) return;
      active = false;
      callback();
    });

    return {
      dueAt,
      get active() {
        return active;
      },
      cancel() {
        if (!active) return;
        active = false;
        call.kill();
      }
    };
  }
}
