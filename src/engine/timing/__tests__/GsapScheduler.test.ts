import { describe, it, expect, vi } from 'vitest';
import { GsapScheduler } from '../GsapScheduler';

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('GsapScheduler', () => {
  it('should run a delayed callback on the gsap ticker', async () => {
    const scheduler = new GsapScheduler();
    const done = new Promise<number>((resolve) => {
      scheduler.schedule(20, () => resolve(scheduler.now()));
    });
    const startedAt = scheduler.now();

    const firedAt = await done;
    expect(firedAt).toBeGreaterThanOrEqual(startedAt);
  });

  it('should report the due time in ms', () => {
    const scheduler = new GsapScheduler();
    const before = scheduler.now();
    const task = scheduler.schedule(250, () => undefined);

    expect(task.dueAt).toBeGreaterThanOrEqual(before + 250);
    task.cancel();
  });

  it('should not run a cancelled callback', async () => {
    const scheduler = new GsapScheduler();
    const callback = vi.fn();
    const task = scheduler.schedule(10, callback);

    task.cancel();
    expect(task.active).toBe(false);

    await wait(80);
    expect(callback).not.toHaveBeenCalled();
  });

  it('should mark a task inactive once it has fired', async () => {
    const scheduler = new GsapScheduler();
    const callback = vi.fn();
    const task = scheduler.schedule(0, callback);

    await wait(80);
    expect(callback).toHaveBeenCalledOnce();
    expect(task.active).toBe(false);
  });
});
