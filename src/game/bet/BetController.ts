import { ConfigurationError } from '@engine/errors/ConfigurationError';
import { Logger, type LogLevel } from '@engine/utils/Logger';
import type { BetConfig } from '@game/config/controlPanelConfig';
import {
  clamp,
  getNextBetLevel,
  getPreviousBetLevel,
  normalizeBetLevels,
  snapToBetLevel
} from '@game/utils/betUtils';

export interface BetState {
  current: number;
  min: number;
  max: number;
  levels: number[];
}

export interface BetVisibility {
  decEnabled: boolean;
  incEnabled: boolean;
  maxEnabled: boolean;
}

/**
 * Owns the bet state behind the bet popup. Mutations never throw; anything
 * out of range is settled once, at construction.
 */
export class BetController {
  private readonly logger: Logger;
  private readonly min: number;
  private readonly max: number;
  private readonly levels: readonly number[];
  private current: number;

  constructor(config: BetConfig, logLevel?: LogLevel) {
    this.logger = new Logger('BetController', logLevel);
    const min = Math.round(config.min);
    const max = Math.round(config.max);
    const issues: string[] = [];
    if (!Number.isFinite(min) || !Number.isFinite(max)) {
      issues.push('bet bounds must be finite numbers');
    } else if (min > max) {
      issues.push(`bet min (${min}) is greater than bet max (${max})`);
    }

    const levels = normalizeBetLevels(config.levels).filter((level) => level >= min && level <= max);
    if (config.levels.length > 0 && levels.length === 0 && issues.length === 0) {
      issues.push(`none of the bet levels [${config.levels.join(', ')}] lie within ${min}..${max}`);
    }
    if (issues.length > 0) {
      throw new ConfigurationError('BetController', issues);
    }

    this.levels = levels;
    this.min = levels.length > 0 ? levels[0] : min;
    this.max = levels.length > 0 ? levels[levels.length - 1] : max;

    const initial = Number.isFinite(config.initial) ? Math.round(config.initial) : this.min;
    const clamped = clamp(initial, this.min, this.max);
    this.current = levels.length > 0 ? snapToBetLevel(levels, clamped) : clamped;
    if (this.current !== config.initial) {
      this.logger.debug(`initial bet ${config.initial} adjusted to ${this.current}`);
    }
  }

  get currentBet(): number {
    return this.current;
  }

  /** Returns true when the bet changed. */
  increase(): boolean {
    if (this.current >= this.max) return false;
    const next = this.levels.length > 0 ? getNextBetLevel(this.levels, this.current) : this.current + 1;
    if (next === undefined) return false;
    return this.apply(next);
  }

  decrease(): boolean {
    if (this.current <= this.min) return false;
    const prev = this.levels.length > 0 ? getPreviousBetLevel(this.levels, this.current) : this.current - 1;
    if (prev === undefined) return false;
    return this.apply(prev);
  }

  setMax(): boolean {
    return this.apply(this.max);
  }

  visibilityState(): BetVisibility {
    return {
      decEnabled: this.current > this.min,
      incEnabled: this.current < this.max,
      maxEnabled: this.current < this.max
    };
  }

  snapshot(): BetState {
    return {
      current: this.current,
      min: this.min,
      max: this.max,
      levels: [...this.levels]
    };
  }

  private apply(next: number): boolean {
    if (next === this.current) return false;
    this.current = next;
    return true;
  }
}
