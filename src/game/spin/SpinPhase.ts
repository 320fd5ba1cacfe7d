import type { TransitionTable } from '@engine/state/StateMachine';
import { LogicalControl } from '@game/types/Controls';

export enum SpinPhase {
  IDLE = 'IDLE',
  REQUESTED = 'REQUESTED',
  SPINNING = 'SPINNING',
  STOPPING = 'STOPPING',
  SETTLING = 'SETTLING'
}

export const SPIN_TRANSITIONS: TransitionTable<SpinPhase> = {
  [SpinPhase.IDLE]: [SpinPhase.REQUESTED],
  [SpinPhase.REQUESTED]: [SpinPhase.SPINNING],
  [SpinPhase.SPINNING]: [SpinPhase.STOPPING, SpinPhase.SETTLING],
  [SpinPhase.STOPPING]: [SpinPhase.SETTLING],
  [SpinPhase.SETTLING]: [SpinPhase.IDLE]
};

/** Reels are in motion and a forced stop still means something. */
export function isReelMotionPhase(phase: SpinPhase): boolean {
  return phase === SpinPhase.SPINNING || phase === SpinPhase.STOPPING;
}

/** Which of the two stacked buttons (Spin or Stop) the panel shows. */
export function spinToggleControl(phase: SpinPhase): LogicalControl.Spin | LogicalControl.Stop {
  return isReelMotionPhase(phase) ? LogicalControl.Stop : LogicalControl.Spin;
}
