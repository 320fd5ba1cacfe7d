import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { GameEvent } from '@engine/events/events';
import { ManualScheduler } from '@engine/timing/ManualScheduler';
import { DEFAULT_SPEED_PROFILES } from '@game/config/controlPanelConfig';
import { SpinEngine, type SpinCycleSummary } from '@game/spin/SpinEngine';
import { SpinPhase } from '@game/spin/SpinPhase';
import { SpeedMode } from '@game/types/SpeedMode';
import { AutoplayController, type AutoplayEndReason } from '../AutoplayController';

describe('AutoplayController', () => {
  let scheduler: ManualScheduler;
  let engine: SpinEngine;
  let autoplay: AutoplayController;
  let cycles: SpinCycleSummary[];
  let ended: Array<{ reason: AutoplayEndReason; cyclesRun: number }>;

  beforeEach(() => {
    scheduler = new ManualScheduler();
    engine = new SpinEngine({ reelCount: 5, speedProfiles: DEFAULT_SPEED_PROFILES, scheduler });
    autoplay = new AutoplayController(engine, scheduler);
    cycles = [];
    ended = [];
    engine.events.on(GameEvent.CYCLE_COMPLETED, (summary) => cycles.push(summary));
    autoplay.events.on(GameEvent.AUTOPLAY_ENDED, (payload) => ended.push(payload));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should run exactly the requested number of cycles', () => {
    const remaining: number[] = [];
    autoplay.events.on(GameEvent.AUTOPLAY_CYCLE_COMPLETED, (payload) => remaining.push(payload.remaining));

    expect(autoplay.start(5, SpeedMode.Normal)).toBe(true);
    expect(engine.phase).toBe(SpinPhase.REQUESTED);
    scheduler.runAll();

    expect(cycles).toHaveLength(5);
    expect(remaining).toEqual([4, 3, 2, 1, 0]);
    expect(ended).toEqual([{ reason: 'completed', cyclesRun: 5 }]);
    expect(autoplay.active).toBe(false);
    expect(engine.phase).toBe(SpinPhase.IDLE);
    expect(scheduler.now()).toBe(4 * 3250 + 3000);
  });

  it('should wait the autoplay gap between cycles', () => {
    autoplay.start(2);

    scheduler.advanceBy(3000);
    expect(cycles).toHaveLength(1);
    expect(engine.phase).toBe(SpinPhase.IDLE);
    expect(autoplay.remaining).toBe(1);

    scheduler.advanceBy(249);
    expect(engine.phase).toBe(SpinPhase.IDLE);
    scheduler.advanceBy(1);
    expect(engine.phase).toBe(SpinPhase.SPINNING);
  });

  it('should reject start while a session or a cycle is active', () => {
    expect(autoplay.start(3)).toBe(true);
    expect(autoplay.start(3)).toBe(false);
    scheduler.runAll();

    engine.spin();
    expect(autoplay.start(3)).toBe(false);
    expect(autoplay.active).toBe(false);
  });

  it('should reject counts that are not positive integers', () => {
    expect(autoplay.start(0)).toBe(false);
    expect(autoplay.start(-2)).toBe(false);
    expect(autoplay.start(2.5)).toBe(false);
    expect(autoplay.selectCount(0)).toBe(false);
    expect(autoplay.active).toBe(false);
  });

  it('should let the in-flight cycle finish after a stop request', () => {
    autoplay.start(10);
    scheduler.advanceBy(1000);

    expect(autoplay.stop()).toBe(true);
    expect(autoplay.stop()).toBe(false);
    expect(autoplay.snapshot()).toEqual({ active: true, remaining: 10, stopRequested: true, cyclesRun: 0 });
    expect(engine.phase).toBe(SpinPhase.SPINNING);

    scheduler.runAll();
    expect(cycles).toHaveLength(1);
    expect(cycles[0].forced).toBe(false);
    expect(ended).toEqual([{ reason: 'stopped', cyclesRun: 1 }]);
  });

  it('should end at once when stopped between cycles', () => {
    autoplay.start(10);
    scheduler.advanceBy(3000);
    expect(scheduler.pendingCount).toBe(1);

    expect(autoplay.stop()).toBe(true);
    expect(ended).toEqual([{ reason: 'stopped', cyclesRun: 1 }]);
    expect(autoplay.active).toBe(false);
    expect(scheduler.pendingCount).toBe(0);

    scheduler.runAll();
    expect(cycles).toHaveLength(1);
  });

  it('should restart the count between cycles instead of adding to it', () => {
    const restarted: number[] = [];
    autoplay.events.on(GameEvent.AUTOPLAY_COUNT_RESTARTED, ({ remaining }) => restarted.push(remaining));
    autoplay.start(5);
    scheduler.advanceBy(3000);
    expect(autoplay.remaining).toBe(4);

    expect(autoplay.selectCount(3)).toBe(true);
    expect(restarted).toEqual([3]);
    scheduler.runAll();

    expect(cycles).toHaveLength(4);
    expect(ended).toEqual([{ reason: 'completed', cyclesRun: 4 }]);
  });

  it('should count the in-flight cycle when the count is restarted mid-cycle', () => {
    autoplay.start(5);
    scheduler.advanceBy(1000);

    autoplay.selectCount(2);
    scheduler.runAll();

    expect(cycles).toHaveLength(2);
  });

  it('should start a session from a count button when idle', () => {
    expect(autoplay.selectCount(2)).toBe(true);
    expect(autoplay.active).toBe(true);
    scheduler.runAll();

    expect(cycles).toHaveLength(2);
  });

  it('should run every cycle at the requested speed', () => {
    const started = vi.fn();
    autoplay.events.on(GameEvent.AUTOPLAY_STARTED, started);

    autoplay.start(2, SpeedMode.Turbo);
    scheduler.runAll();

    expect(started).toHaveBeenCalledWith({ count: 2, speedMode: SpeedMode.Turbo });
    expect(cycles.map((cycle) => cycle.speedMode)).toEqual([SpeedMode.Turbo, SpeedMode.Turbo]);
    expect(scheduler.now()).toBe(1400 + 120 + 1400);
  });

  it('should switch speed for the following cycles only', () => {
    autoplay.start(2, SpeedMode.Normal);
    scheduler.advanceBy(100);
    autoplay.setSpeedMode(SpeedMode.Quick);
    scheduler.runAll();

    expect(cycles.map((cycle) => cycle.speedMode)).toEqual([SpeedMode.Normal, SpeedMode.Quick]);
  });

  it('should keep going after a manual forced stop', () => {
    autoplay.start(2);
    scheduler.advanceBy(1000);
    engine.stop();
    scheduler.runAll();

    expect(cycles.map((cycle) => cycle.forced)).toEqual([true, false]);
    expect(ended).toEqual([{ reason: 'completed', cyclesRun: 2 }]);
  });

  it('should ignore cycles it did not start', () => {
    engine.spin();
    scheduler.runAll();

    expect(cycles).toHaveLength(1);
    expect(autoplay.snapshot()).toEqual({ active: false, remaining: 0, stopRequested: false, cyclesRun: 0 });
  });

  it('should end when the engine refuses the next spin', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    autoplay.start(3);
    scheduler.advanceBy(3000);
    engine.spin();

    scheduler.advanceBy(250);
    expect(ended).toEqual([{ reason: 'stopped', cyclesRun: 1 }]);
    expect(warn).toHaveBeenCalledWith('[Autoplay] engine refused spin in SPINNING, ending autoplay');
  });

  it('should stop listening to the engine once disposed', () => {
    autoplay.start(3);
    autoplay.dispose();
    scheduler.runAll();

    expect(cycles).toHaveLength(1);
    expect(autoplay.active).toBe(false);
  });
});
