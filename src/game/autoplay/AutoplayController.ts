import { EventBus } from '@engine/events/EventBus';
import { GameEvent } from '@engine/events/events';
import type { ScheduledTask, Scheduler } from '@engine/timing/Scheduler';
import { Logger, type LogLevel } from '@engine/utils/Logger';
import type { SpinEngine } from '@game/spin/SpinEngine';
import { SpinPhase } from '@game/spin/SpinPhase';
import type { SpeedMode } from '@game/types/SpeedMode';

export type AutoplayEndReason = 'completed' | 'stopped';

export interface AutoplayState {
  active: boolean;
  remaining: number;
  stopRequested: boolean;
  cyclesRun: number;
}

export type AutoplayEvents = {
  [GameEvent.AUTOPLAY_STARTED]: { count: number; speedMode: SpeedMode };
  [GameEvent.AUTOPLAY_COUNT_RESTARTED]: { remaining: number };
  [GameEvent.AUTOPLAY_CYCLE_COMPLETED]: { cycleId: number; remaining: number };
  [GameEvent.AUTOPLAY_ENDED]: { reason: AutoplayEndReason; cyclesRun: number };
};

interface AutoplaySession {
  readonly id: number;
  /** Cycles still to complete, counting the one in flight. */
  remainingCount: number;
  stopRequested: boolean;
  cyclesRun: number;
  awaitingCycleId: number | null;
  nextSpinTask: ScheduledTask | null;
}

function isPositiveCount(count: number): boolean {
  return Number.isInteger(count) && count > 0;
}

/**
 * Chains spin cycles on top of a SpinEngine. A session waits for the cycle it
 * started to settle, counts it, then schedules the next spin after the
 * profile's autoplay gap. Stopping is a request honoured at the next cycle
 * boundary.
 */
export class AutoplayController {
  readonly events = new EventBus<AutoplayEvents>();

  private readonly logger: Logger;
  private readonly unsubscribe: () => void;
  private session: AutoplaySession | null = null;
  private nextSessionId = 1;

  constructor(
    private readonly engine: SpinEngine,
    private readonly scheduler: Scheduler,
    logLevel?: LogLevel
  ) {
    this.logger = new Logger('Autoplay', logLevel);
    this.unsubscribe = engine.events.on(GameEvent.PHASE_CHANGED, ({ prev, next, cycleId }) => {
      if (prev === SpinPhase.SETTLING && next === SpinPhase.IDLE) {
        this.onCycleSettled(cycleId);
      }
    });
  }

  get active(): boolean {
    return this.session !== null;
  }

  get remaining(): number {
    return this.session ? this.session.remainingCount : 0;
  }

  get stopRequested(): boolean {
    return this.session ? this.session.stopRequested : false;
  }

  snapshot(): AutoplayState {
    const session = this.session;
    return {
      active: session !== null,
      remaining: session ? session.remainingCount : 0,
      stopRequested: session ? session.stopRequested : false,
      cyclesRun: session ? session.cyclesRun : 0
    };
  }

  start(count: number, speedMode?: SpeedMode): boolean {
    if (this.session) {
      this.logger.debug('start ignored: autoplay already running');
      return false;
    }
    if (this.engine.activeCycleId !== null || this.engine.phase !== SpinPhase.IDLE) {
      this.logger.debug(`start ignored: engine is ${this.engine.phase}`);
      return false;
    }
    if (!isPositiveCount(count)) {
      this.logger.debug(`start ignored: invalid count ${count}`);
      return false;
    }

    if (speedMode !== undefined) {
      this.engine.setSpeedMode(speedMode);
    }

    const session: AutoplaySession = {
      id: this.nextSessionId++,
      remainingCount: count,
      stopRequested: false,
      cyclesRun: 0,
      awaitingCycleId: null,
      nextSpinTask: null
    };
    this.session = session;
    this.logger.info(`started: ${count} spins at ${this.engine.currentSpeedMode}`);
    this.events.emit(GameEvent.AUTOPLAY_STARTED, { count, speedMode: this.engine.currentSpeedMode });

    this.spinNext(session);
    return true;
  }

  /**
   * Requests the session to end. The cycle in flight always completes; when
   * the session is between cycles it ends right away.
   */
  stop(): boolean {
    const session = this.session;
    if (!session || session.stopRequested) return false;

    session.stopRequested = true;
    if (session.awaitingCycleId === null) {
      this.end(session, 'stopped');
    } else {
      this.logger.debug(`stop requested, finishing cycle ${session.awaitingCycleId}`);
    }
    return true;
  }

  setSpeedMode(mode: SpeedMode): void {
    this.engine.setSpeedMode(mode);
  }

  /**
   * Count button. Restarts the remaining count of a running session (the
   * count is replaced, not added to); starts autoplay otherwise.
   */
  selectCount(count: number): boolean {
    if (!isPositiveCount(count)) {
      this.logger.debug(`count ${count} ignored`);
      return false;
    }
    const session = this.session;
    if (!session) {
      return this.start(count);
    }
    session.remainingCount = count;
    this.logger.debug(`count restarted at ${count}`);
    this.events.emit(GameEvent.AUTOPLAY_COUNT_RESTARTED, { remaining: count });
    return true;
  }

  dispose(): void {
    this.unsubscribe();
    if (this.session) {
      this.session.nextSpinTask?.cancel();
      this.session = null;
    }
    this.events.clear();
  }

  private spinNext(session: AutoplaySession): void {
    session.nextSpinTask = null;
    const cycleId = this.engine.spin();
    if (cycleId === null) {
      this.logger.warn(`engine refused spin in ${this.engine.phase}, ending autoplay`);
      this.end(session, 'stopped');
      return;
    }
    session.awaitingCycleId = cycleId;
  }

  private onCycleSettled(cycleId: number): void {
    const session = this.session;
    if (!session || session.awaitingCycleId !== cycleId) return;

    session.awaitingCycleId = null;
    session.remainingCount = Math.max(0, session.remainingCount - 1);
    session.cyclesRun++;
    this.events.emit(GameEvent.AUTOPLAY_CYCLE_COMPLETED, { cycleId, remaining: session.remainingCount });

    if (session.remainingCount === 0) {
      this.end(session, 'completed');
      return;
    }
    if (session.stopRequested) {
      this.end(session, 'stopped');
      return;
    }

    const delay = this.engine.speedProfile.autoplayDelayMs;
    session.nextSpinTask = this.scheduler.schedule(delay, () => {
      if (this.session !== session) return;
      this.spinNext(session);
    });
  }

  private end(session: AutoplaySession, reason: AutoplayEndReason): void {
    if (this.session !== session) return;
    session.nextSpinTask?.cancel();
    session.nextSpinTask = null;
    this.session = null;
    this.logger.info(`session ${session.id} ended (${reason}) after ${session.cyclesRun} spins`);
    this.events.emit(GameEvent.AUTOPLAY_ENDED, { reason, cyclesRun: session.cyclesRun });
  }
}
