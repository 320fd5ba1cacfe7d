import { ConfigurationError } from '@engine/errors/ConfigurationError';
import { EventBus } from '@engine/events/EventBus';
import { GameEvent } from '@engine/events/events';
import { StateMachine } from '@engine/state/StateMachine';
import type { ScheduledTask, Scheduler } from '@engine/timing/Scheduler';
import { Logger, type LogLevel } from '@engine/utils/Logger';
import { validateSpeedProfile } from '@game/config/controlPanelConfig';
import { SPEED_MODES, SpeedMode, type SpeedProfile } from '@game/types/SpeedMode';
import { SPIN_TRANSITIONS, SpinPhase, isReelMotionPhase } from './SpinPhase';

export interface SpinEngineOptions {
  reelCount: number;
  speedProfiles: Record<SpeedMode, SpeedProfile>;
  scheduler: Scheduler;
  speedMode?: SpeedMode;
  /** Overrides the process-wide log threshold for this engine. */
  logLevel?: LogLevel;
}

export interface PhaseChange {
  prev: SpinPhase;
  next: SpinPhase;
  cycleId: number;
}

export interface ReelStop {
  cycleId: number;
  reel: number;
  /** ms since the reels started moving. */
  at: number;
  /** True when a forced stop was pending as the reel came to rest. */
  forced: boolean;
}

export interface SpinCycleSummary {
  cycleId: number;
  speedMode: SpeedMode;
  forced: boolean;
  /** Per reel, ms from reel start to rest. */
  reelStops: number[];
  durationMs: number;
}

export type SpinEngineEvents = {
  [GameEvent.PHASE_CHANGED]: PhaseChange;
  [GameEvent.REEL_STOPPED]: ReelStop;
  [GameEvent.CYCLE_COMPLETED]: SpinCycleSummary;
};

interface SpinSession {
  readonly cycleId: number;
  readonly speedMode: SpeedMode;
  readonly profile: Readonly<SpeedProfile>;
  readonly requestedAt: number;
  startedAt: number;
  forceStopRequested: boolean;
  /** Pending natural or shortened stop per reel; emptied as reels land. */
  readonly reelStopTimers: Map<number, ScheduledTask>;
  readonly reelStops: number[];
  /** REQUESTED → SPINNING or SETTLING → IDLE, whichever is pending. */
  phaseTask: ScheduledTask | null;
}

type SpeedProfiles = Readonly<Record<SpeedMode, Readonly<SpeedProfile>>>;

function freezeProfiles(profiles: Record<SpeedMode, SpeedProfile>): SpeedProfiles {
  return Object.freeze({
    [SpeedMode.Normal]: Object.freeze({ ...profiles[SpeedMode.Normal] }),
    [SpeedMode.Quick]: Object.freeze({ ...profiles[SpeedMode.Quick] }),
    [SpeedMode.Turbo]: Object.freeze({ ...profiles[SpeedMode.Turbo] })
  });
}

/**
 * Offsets (from reel start) of each reel's natural stop. The first reel lands
 * at 60% of the spin duration, the last one at 100%.
 */
export function reelStopOffsets(reelCount: number, profile: SpeedProfile): number[] {
  const span = Math.max(1, reelCount - 1);
  return Array.from({ length: reelCount }, (_, reel) =>
    Math.round(profile.spinDurationMs * (0.6 + (0.4 * reel) / span))
  );
}

/**
 * Drives a single spin cycle:
 * IDLE → REQUESTED → SPINNING → (STOPPING) → SETTLING → IDLE.
 *
 * Only one cycle may exist at a time. Every scheduled callback carries the
 * cycle id it was created for and is dropped if that cycle is gone.
 */
export class SpinEngine extends StateMachine<SpinPhase> {
  readonly events = new EventBus<SpinEngineEvents>();

  private readonly logger: Logger;
  private readonly reelCount: number;
  private readonly speedProfiles: SpeedProfiles;
  private readonly scheduler: Scheduler;
  private speedMode: SpeedMode;
  private session: SpinSession | null = null;
  private nextCycleId = 1;
  private lastCycleId = 0;
  private disposed = false;

  constructor(options: SpinEngineOptions) {
    super(SpinPhase.IDLE, SPIN_TRANSITIONS);
    this.logger = new Logger('SpinEngine', options.logLevel);

    // Copied before validation: later edits to the caller's objects are not seen.
    const speedProfiles = freezeProfiles(options.speedProfiles);
    const issues: string[] = [];
    if (!Number.isInteger(options.reelCount) || options.reelCount < 1) {
      issues.push(`reel count must be a positive integer, got ${options.reelCount}`);
    }
    for (const mode of SPEED_MODES) {
      issues.push(...validateSpeedProfile(speedProfiles[mode], `speedProfiles.${mode}`));
    }
    if (issues.length > 0) {
      throw new ConfigurationError('SpinEngine', issues);
    }

    this.reelCount = options.reelCount;
    this.speedProfiles = speedProfiles;
    this.scheduler = options.scheduler;
    this.speedMode = options.speedMode ?? SpeedMode.Normal;
  }

  get phase(): SpinPhase {
    return this.state;
  }

  get currentSpeedMode(): SpeedMode {
    return this.speedMode;
  }

  /** Timing the next cycle will use. */
  get speedProfile(): Readonly<SpeedProfile> {
    return this.speedProfiles[this.speedMode];
  }

  get activeCycleId(): number | null {
    return this.session ? this.session.cycleId : null;
  }

  get forceStopRequested(): boolean {
    return this.session ? this.session.forceStopRequested : false;
  }

  get reels(): number {
    return this.reelCount;
  }

  /** Takes effect from the next `spin()`; a running cycle keeps its timing. */
  setSpeedMode(mode: SpeedMode): void {
    if (mode === this.speedMode) return;
    this.speedMode = mode;
    this.logger.debug(`speed mode set to ${mode}`);
  }

  /**
   * Starts a cycle. Returns its id, or null when a cycle is already active.
   */
  spin(): number | null {
    if (this.disposed || this.session || this.state !== SpinPhase.IDLE) {
      this.logger.debug(`spin ignored in ${this.state}`);
      return null;
    }

    const session: SpinSession = {
      cycleId: this.nextCycleId++,
      speedMode: this.speedMode,
      profile: this.speedProfiles[this.speedMode],
      requestedAt: this.scheduler.now(),
      startedAt: this.scheduler.now(),
      forceStopRequested: false,
      reelStopTimers: new Map(),
      reelStops: [],
      phaseTask: null
    };
    this.session = session;
    this.setState(SpinPhase.REQUESTED);

    const { cycleId } = session;
    session.phaseTask = this.scheduler.schedule(0, () => this.startReels(cycleId));
    return cycleId;
  }

  /**
   * Asks the reels to land early. Pending stops are pulled in, but every reel
   * still decelerates for at least `minSettleMs` and the landing order is
   * kept. Ignored outside SPINNING, and repeated requests are ignored.
   */
  stop(): boolean {
    const session = this.session;
    if (!session || !isReelMotionPhase(this.state) || session.forceStopRequested) {
      this.logger.debug(`stop ignored in ${this.state}`);
      return false;
    }

    session.forceStopRequested = true;
    this.shortenPendingStops(session);
    this.setState(SpinPhase.STOPPING);
    return true;
  }

  /** Cancels every pending timer and drops all listeners. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.session) {
      this.cancelTimers(this.session);
      this.session = null;
    }
    this.events.clear();
  }

  protected onStateChanged(prev: SpinPhase, next: SpinPhase): void {
    const cycleId = this.session ? this.session.cycleId : this.lastCycleId;
    this.logger.debug(`cycle ${cycleId}: ${prev} → ${next}`);
    this.events.emit(GameEvent.PHASE_CHANGED, { prev, next, cycleId });
  }

  protected onTransitionRejected(prev: SpinPhase, next: SpinPhase): void {
    this.logger.debug(`illegal transition ${prev} → ${next} ignored`);
  }

  private startReels(cycleId: number): void {
    const session = this.sessionFor(cycleId);
    if (!session) return;

    session.phaseTask = null;
    session.startedAt = this.scheduler.now();

    // Timers go in before the phase change so a listener reacting to
    // SPINNING with stop() finds every reel pending.
    reelStopOffsets(this.reelCount, session.profile).forEach((offset, reel) => {
      session.reelStopTimers.set(reel, this.scheduler.schedule(offset, () => this.onReelStopped(cycleId, reel)));
    });

    this.setState(SpinPhase.SPINNING);
  }

  private shortenPendingStops(session: SpinSession): void {
    const now = this.scheduler.now();
    const { minSettleMs, settleStaggerMs } = session.profile;
    const { cycleId } = session;
    let previousDue = Number.NEGATIVE_INFINITY;

    for (let reel = 0; reel < this.reelCount; reel++) {
      const task = session.reelStopTimers.get(reel);
      if (!task) continue;

      const floor = now + minSettleMs + reel * settleStaggerMs;
      const due = Math.min(task.dueAt, Math.max(previousDue, floor));
      if (due < task.dueAt) {
        task.cancel();
        session.reelStopTimers.set(reel, this.scheduler.schedule(due - now, () => this.onReelStopped(cycleId, reel)));
      }
      previousDue = due;
    }
  }

  private onReelStopped(cycleId: number, reel: number): void {
    const session = this.sessionFor(cycleId);
    if (!session || !session.reelStopTimers.delete(reel)) return;

    const at = this.scheduler.now() - session.startedAt;
    session.reelStops[reel] = at;
    this.events.emit(GameEvent.REEL_STOPPED, {
      cycleId,
      reel,
      at,
      forced: session.forceStopRequested
    });

    if (session.reelStopTimers.size === 0) {
      this.setState(SpinPhase.SETTLING);
      session.phaseTask = this.scheduler.schedule(session.profile.presentationMs, () => this.complete(cycleId));
    }
  }

  private complete(cycleId: number): void {
    const session = this.sessionFor(cycleId);
    if (!session) return;

    const summary: SpinCycleSummary = {
      cycleId,
      speedMode: session.speedMode,
      forced: session.forceStopRequested,
      reelStops: [...session.reelStops],
      durationMs: this.scheduler.now() - session.requestedAt
    };

    this.session = null;
    this.lastCycleId = cycleId;
    this.setState(SpinPhase.IDLE);
    this.events.emit(GameEvent.CYCLE_COMPLETED, summary);
  }

  private sessionFor(cycleId: number): SpinSession | null {
    if (this.session && this.session.cycleId === cycleId) return this.session;
    this.logger.debug(`stale callback for cycle ${cycleId} dropped`);
    return null;
  }

  private cancelTimers(session: SpinSession): void {
    session.phaseTask?.cancel();
    session.phaseTask = null;
    for (const task of session.reelStopTimers.values()) {
      task.cancel();
    }
    session.reelStopTimers.clear();
  }
}
