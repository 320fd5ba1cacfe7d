import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@engine/errors/ConfigurationError';
import {
  DEFAULT_CONTROL_PANEL_CONFIG,
  loadControlPanelConfig,
  validateSpeedProfile
} from '../controlPanelConfig';
import { SpeedMode } from '@game/types/SpeedMode';

function issuesOf(input: unknown): readonly string[] {
  try {
    loadControlPanelConfig(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadControlPanelConfig', () => {
  it('should return the defaults for an empty object', () => {
    expect(loadControlPanelConfig({})).toEqual(DEFAULT_CONTROL_PANEL_CONFIG);
    expect(loadControlPanelConfig()).toEqual(DEFAULT_CONTROL_PANEL_CONFIG);
  });

  it('should merge a partial object over the defaults field by field', () => {
    const config = loadControlPanelConfig({
      bet: { max: 20, levels: [1, 5, 20] },
      speedProfiles: { turbo: { spinDurationMs: 900 } },
      assets: { basePath: 'cdn/ui/' },
      logLevel: 'debug'
    });

    expect(config.bet).toEqual({ min: 1, max: 20, levels: [1, 5, 20], initial: 1 });
    expect(config.speedProfiles[SpeedMode.Turbo]).toEqual({
      spinDurationMs: 900,
      minSettleMs: 100,
      settleStaggerMs: 50,
      presentationMs: 200,
      autoplayDelayMs: 120
    });
    expect(config.speedProfiles[SpeedMode.Normal]).toEqual(
      DEFAULT_CONTROL_PANEL_CONFIG.speedProfiles[SpeedMode.Normal]
    );
    expect(config.assets.basePath).toBe('cdn/ui/');
    expect(config.logLevel).toBe('debug');
  });

  it('should not share arrays with the defaults', () => {
    const config = loadControlPanelConfig({});
    config.bet.levels.push(99);
    config.autoplay.countOptions.push(7);

    expect(DEFAULT_CONTROL_PANEL_CONFIG.bet.levels).toEqual([1, 2, 5, 10]);
    expect(DEFAULT_CONTROL_PANEL_CONFIG.autoplay.countOptions).toEqual([20, 50, 100, 200, 500, 1000]);
  });

  it('should reject a root that is not an object', () => {
    expect(() => loadControlPanelConfig(null)).toThrow(ConfigurationError);
    expect(issuesOf([1, 2])).toEqual(['config root must be an object']);
  });

  it('should report every invalid field at once', () => {
    const issues = issuesOf({
      reels: { count: 0 },
      bet: { min: 5, max: 2 },
      speedProfiles: { quick: { minSettleMs: 'fast' } },
      autoplay: { countOptions: [10, 2.5], defaultCount: 0 },
      logLevel: 'loud'
    });

    expect(issues).toEqual([
      'config.reels.count must be a positive integer',
      'config.bet.min (5) is greater than config.bet.max (2)',
      'config.speedProfiles.quick.minSettleMs must be a finite number',
      'config.autoplay.countOptions[1] must be a positive integer',
      'config.autoplay.defaultCount must be a positive integer',
      'config.logLevel must be one of debug, info, warn, error, silent'
    ]);
  });

  it('should reject sections of the wrong shape', () => {
    expect(issuesOf({ bet: 3 })).toEqual(['config.bet must be an object']);
    expect(issuesOf({ bet: { levels: 'all' } })).toEqual(['config.bet.levels must be an array of numbers']);
    expect(issuesOf({ assets: { basePath: 4 } })).toEqual(['config.assets.basePath must be a string']);
  });

  it('should reject speed profiles for unknown modes', () => {
    expect(issuesOf({ speedProfiles: { Turbo: { spinDurationMs: 900 }, turbo: {} } })).toEqual([
      'config.speedProfiles.Turbo is not a speed mode (normal, quick, turbo)'
    ]);
  });

  it('should reject a zero spin duration', () => {
    expect(issuesOf({ speedProfiles: { normal: { spinDurationMs: 0 } } })).toEqual([
      'config.speedProfiles.normal.spinDurationMs must be greater than 0'
    ]);
  });

  it('should prefix the error message with its scope', () => {
    expect(() => loadControlPanelConfig({ reels: { count: 2.5 } })).toThrow(
      '[config] invalid configuration: config.reels.count must be a positive integer'
    );
  });
});

describe('validateSpeedProfile', () => {
  it('should accept the default profiles', () => {
    for (const profile of Object.values(DEFAULT_CONTROL_PANEL_CONFIG.speedProfiles)) {
      expect(validateSpeedProfile(profile, 'p')).toEqual([]);
    }
  });

  it('should flag negative and non-finite fields', () => {
    const issues = validateSpeedProfile(
      {
        spinDurationMs: Number.NaN,
        minSettleMs: -1,
        settleStaggerMs: 0,
        presentationMs: 0,
        autoplayDelayMs: Number.POSITIVE_INFINITY
      },
      'turbo'
    );

    expect(issues).toEqual([
      'turbo.spinDurationMs must be a non-negative number',
      'turbo.minSettleMs must be a non-negative number',
      'turbo.autoplayDelayMs must be a non-negative number'
    ]);
  });
});
