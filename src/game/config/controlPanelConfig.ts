import { ConfigurationError } from '@engine/errors/ConfigurationError';
import { isLogLevel, type LogLevel } from '@engine/utils/Logger';
import { SPEED_MODES, SpeedMode, isSpeedMode, type SpeedProfile } from '@game/types/SpeedMode';

export interface BetConfig {
  min: number;
  max: number;
  /** Discrete bet levels; empty means "every integer between min and max". */
  levels: number[];
  initial: number;
}

export interface ControlPanelConfig {
  reels: { count: number };
  bet: BetConfig;
  speedProfiles: Record<SpeedMode, SpeedProfile>;
  autoplay: {
    /** Denominations offered by the count buttons of the auto popup. */
    countOptions: number[];
    /** Used by START AUTO when no count button was pressed. */
    defaultCount: number;
  };
  assets: {
    /** Prefix for uploaded UI art, e.g. `res/assets/ui/`. */
    basePath: string;
  };
  logLevel: LogLevel;
}

export const DEFAULT_SPEED_PROFILES: Readonly<Record<SpeedMode, Readonly<SpeedProfile>>> = Object.freeze({
  [SpeedMode.Normal]: Object.freeze({
    spinDurationMs: 2800,
    minSettleMs: 100,
    settleStaggerMs: 50,
    presentationMs: 200,
    autoplayDelayMs: 250
  }),
  [SpeedMode.Quick]: Object.freeze({
    spinDurationMs: 1800,
    minSettleMs: 100,
    settleStaggerMs: 50,
    presentationMs: 200,
    autoplayDelayMs: 250
  }),
  [SpeedMode.Turbo]: Object.freeze({
    spinDurationMs: 1200,
    minSettleMs: 100,
    settleStaggerMs: 50,
    presentationMs: 200,
    autoplayDelayMs: 120
  })
});

export const DEFAULT_CONTROL_PANEL_CONFIG: ControlPanelConfig = {
  reels: { count: 5 },
  bet: { min: 1, max: 10, levels: [1, 2, 5, 10], initial: 1 },
  speedProfiles: DEFAULT_SPEED_PROFILES,
  autoplay: {
    countOptions: [20, 50, 100, 200, 500, 1000],
    defaultCount: 20
  },
  assets: { basePath: 'res/assets/ui/' },
  logLevel: 'info'
};

const SPEED_PROFILE_FIELDS: readonly (keyof SpeedProfile)[] = [
  'spinDurationMs',
  'minSettleMs',
  'settleStaggerMs',
  'presentationMs',
  'autoplayDelayMs'
];

/**
 * Semantic checks shared by the loader and SpinEngine. Returns one message
 * per problem; an empty list means the profile is usable.
 */
export function validateSpeedProfile(profile: SpeedProfile, path: string): string[] {
  const issues: string[] = [];
  for (const field of SPEED_PROFILE_FIELDS) {
    const value = profile[field];
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`${path}.${field} must be a non-negative number`);
    }
  }
  if (Number.isFinite(profile.spinDurationMs) && profile.spinDurationMs <= 0) {
    issues.push(`${path}.spinDurationMs must be greater than 0`);
  }
  return issues;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ConfigReader {
  readonly issues: string[] = [];

  section(source: Record<string, unknown>, key: string, path: string): Record<string, unknown> {
    const value = source[key];
    if (value === undefined) return {};
    if (isRecord(value)) return value;
    this.issues.push(`${path}.${key} must be an object`);
    return {};
  }

  number(source: Record<string, unknown>, key: string, fallback: number, path: string): number {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    this.issues.push(`${path}.${key} must be a finite number`);
    return fallback;
  }

  numbers(source: Record<string, unknown>, key: string, fallback: number[], path: string): number[] {
    const value = source[key];
    if (value === undefined) return [...fallback];
    if (Array.isArray(value)) {
      const numbers: number[] = [];
      value.forEach((item, index) => {
        if (typeof item === 'number' && Number.isFinite(item)) {
          numbers.push(item);
        } else {
          this.issues.push(`${path}.${key}[${index}] must be a finite number`);
        }
      });
      return numbers;
    }
    this.issues.push(`${path}.${key} must be an array of numbers`);
    return [...fallback];
  }

  string(source: Record<string, unknown>, key: string, fallback: string, path: string): string {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value === 'string') return value;
    this.issues.push(`${path}.${key} must be a string`);
    return fallback;
  }
}

/**
 * Builds a full config from a partial JSON object (typically parsed from the
 * game's config file), falling back to defaults field by field. Every problem
 * is collected before a single ConfigurationError is thrown.
 */
export function loadControlPanelConfig(
  input: unknown = {},
  defaults: ControlPanelConfig = DEFAULT_CONTROL_PANEL_CONFIG
): ControlPanelConfig {
  if (!isRecord(input)) {
    throw new ConfigurationError('config', ['config root must be an object']);
  }

  const read = new ConfigReader();

  const reels = read.section(input, 'reels', 'config');
  const reelCount = read.number(reels, 'count', defaults.reels.count, 'config.reels');
  if (!Number.isInteger(reelCount) || reelCount < 1) {
    read.issues.push('config.reels.count must be a positive integer');
  }

  const bet = read.section(input, 'bet', 'config');
  const betConfig: BetConfig = {
    min: read.number(bet, 'min', defaults.bet.min, 'config.bet'),
    max: read.number(bet, 'max', defaults.bet.max, 'config.bet'),
    levels: read.numbers(bet, 'levels', defaults.bet.levels, 'config.bet'),
    initial: read.number(bet, 'initial', defaults.bet.initial, 'config.bet')
  };
  if (betConfig.min > betConfig.max) {
    read.issues.push(`config.bet.min (${betConfig.min}) is greater than config.bet.max (${betConfig.max})`);
  }

  const profilesSource = read.section(input, 'speedProfiles', 'config');
  for (const key of Object.keys(profilesSource)) {
    if (!isSpeedMode(key)) {
      read.issues.push(`config.speedProfiles.${key} is not a speed mode (${SPEED_MODES.join(', ')})`);
    }
  }
  const speedProfiles = { ...defaults.speedProfiles };
  for (const mode of SPEED_MODES) {
    const path = `config.speedProfiles.${mode}`;
    const source = read.section(profilesSource, mode, 'config.speedProfiles');
    const base = defaults.speedProfiles[mode];
    const profile: SpeedProfile = {
      spinDurationMs: read.number(source, 'spinDurationMs', base.spinDurationMs, path),
      minSettleMs: read.number(source, 'minSettleMs', base.minSettleMs, path),
      settleStaggerMs: read.number(source, 'settleStaggerMs', base.settleStaggerMs, path),
      presentationMs: read.number(source, 'presentationMs', base.presentationMs, path),
      autoplayDelayMs: read.number(source, 'autoplayDelayMs', base.autoplayDelayMs, path)
    };
    read.issues.push(...validateSpeedProfile(profile, path));
    speedProfiles[mode] = profile;
  }

  const autoplay = read.section(input, 'autoplay', 'config');
  const countOptions = read.numbers(autoplay, 'countOptions', defaults.autoplay.countOptions, 'config.autoplay');
  countOptions.forEach((count, index) => {
    if (!Number.isInteger(count) || count < 1) {
      read.issues.push(`config.autoplay.countOptions[${index}] must be a positive integer`);
    }
  });
  const defaultCount = read.number(autoplay, 'defaultCount', defaults.autoplay.defaultCount, 'config.autoplay');
  if (!Number.isInteger(defaultCount) || defaultCount < 1) {
    read.issues.push('config.autoplay.defaultCount must be a positive integer');
  }

  const assets = read.section(input, 'assets', 'config');
  const basePath = read.string(assets, 'basePath', defaults.assets.basePath, 'config.assets');

  let logLevel = defaults.logLevel;
  if (input.logLevel !== undefined) {
    if (isLogLevel(input.logLevel)) {
      logLevel = input.logLevel;
    } else {
      read.issues.push('config.logLevel must be one of debug, info, warn, error, silent');
    }
  }

  if (read.issues.length > 0) {
    throw new ConfigurationError('config', read.issues);
  }

  return {
    reels: { count: reelCount },
    bet: betConfig,
    speedProfiles,
    autoplay: { countOptions, defaultCount },
    assets: { basePath },
    logLevel
  };
}
