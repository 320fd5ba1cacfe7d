export { ConfigurationError } from '@engine/errors/ConfigurationError';
export { EventBus, type EventMap } from '@engine/events/EventBus';
export { GameEvent } from '@engine/events/events';
export { StateMachine, type TransitionTable } from '@engine/state/StateMachine';
export { GsapScheduler } from '@engine/timing/GsapScheduler';
export { ManualScheduler } from '@engine/timing/ManualScheduler';
export type { ScheduledTask, Scheduler } from '@engine/timing/Scheduler';
export { Logger, isLogLevel, type LogLevel } from '@engine/utils/Logger';

export {
  AssetManifest,
  DEFAULT_BUTTON_SKIN,
  DEFAULT_PANEL_SKIN,
  getAssetUrl,
  stemOf,
  type AssetManifestOptions,
  type DefaultSkin,
  type ResourceHandle,
  type SkinCoverageGap,
  type UploadedSkin
} from '@game/assets/AssetManifest';
export {
  AutoplayController,
  type AutoplayEndReason,
  type AutoplayEvents,
  type AutoplayState
} from '@game/autoplay/AutoplayController';
export { BetController, type BetState, type BetVisibility } from '@game/bet/BetController';
export {
  DEFAULT_CONTROL_PANEL_CONFIG,
  DEFAULT_SPEED_PROFILES,
  loadControlPanelConfig,
  validateSpeedProfile,
  type BetConfig,
  type ControlPanelConfig
} from '@game/config/controlPanelConfig';
export { PANEL_SKIN_RULES, SKIN_RULES, candidateStems, type SkinChains } from '@game/config/skinRules';
export {
  ControlPanelPresenter,
  autoCountKey,
  type ControlPanelPresenterOptions,
  type ControlPanelView,
  type ControlView,
  type PresenterEvents
} from '@game/presenter/ControlPanelPresenter';
export {
  SpinEngine,
  reelStopOffsets,
  type PhaseChange,
  type ReelStop,
  type SpinCycleSummary,
  type SpinEngineEvents,
  type SpinEngineOptions
} from '@game/spin/SpinEngine';
export { SPIN_TRANSITIONS, SpinPhase, isReelMotionPhase, spinToggleControl } from '@game/spin/SpinPhase';
export {
  InteractionState,
  LogicalControl,
  PanelId,
  skinRequest,
  type ButtonSkinRequest
} from '@game/types/Controls';
export { SPEED_MODES, SpeedMode, isSpeedMode, type SpeedProfile } from '@game/types/SpeedMode';
