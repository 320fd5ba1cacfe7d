export enum SpeedMode {
  Normal = 'normal',
  Quick = 'quick',
  Turbo = 'turbo'
}

export const SPEED_MODES: readonly SpeedMode[] = [SpeedMode.Normal, SpeedMode.Quick, SpeedMode.Turbo];

export function isSpeedMode(value: unknown): value is SpeedMode {
  return typeof value === 'string' && SPEED_MODES.some((mode) => mode === value);
}

/**
 * Reel timing for one speed mode. Controls how long a cycle takes, never
 * what it lands on.
 */
export interface SpeedProfile {
  /** Time from reel start to the natural stop of the last reel. */
  spinDurationMs: number;
  /** Shortest time a reel keeps decelerating after a forced stop. */
  minSettleMs: number;
  /** Extra settle time per reel index on a forced stop. */
  settleStaggerMs: number;
  /** SETTLING → IDLE: result presentation time. */
  presentationMs: number;
  /** Pause between autoplay cycles. */
  autoplayDelayMs: number;
}
