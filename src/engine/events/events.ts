export enum GameEvent {
  PHASE_CHANGED = 'phaseChanged',
  REEL_STOPPED = 'reelStopped',
  CYCLE_COMPLETED = 'cycleCompleted',
  AUTOPLAY_STARTED = 'autoplayStarted',
  AUTOPLAY_COUNT_RESTARTED = 'autoplayCountRestarted',
  AUTOPLAY_CYCLE_COMPLETED = 'autoplayCycleCompleted',
  AUTOPLAY_ENDED = 'autoplayEnded',
  RENDER = 'render'
}
