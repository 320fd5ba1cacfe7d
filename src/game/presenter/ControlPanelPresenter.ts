import { EventBus } from '@engine/events/EventBus';
import { GameEvent } from '@engine/events/events';
import { GsapScheduler } from '@engine/timing/GsapScheduler';
import type { Scheduler } from '@engine/timing/Scheduler';
import { Logger } from '@engine/utils/Logger';
import { AssetManifest, type ResourceHandle } from '@game/assets/AssetManifest';
import { AutoplayController, type AutoplayState } from '@game/autoplay/AutoplayController';
import { BetController, type BetState } from '@game/bet/BetController';
import { DEFAULT_CONTROL_PANEL_CONFIG, type ControlPanelConfig } from '@game/config/controlPanelConfig';
import { SpinEngine } from '@game/spin/SpinEngine';
import { SpinPhase, spinToggleControl } from '@game/spin/SpinPhase';
import { InteractionState, LogicalControl, PanelId, skinRequest } from '@game/types/Controls';
import { SpeedMode } from '@game/types/SpeedMode';

export interface ControlPanelPresenterOptions {
  config?: ControlPanelConfig;
  /** File names of the uploaded control art. */
  uploads?: Iterable<string>;
  scheduler?: Scheduler;
}

export interface ControlView {
  /** Control value, or `autoCount:<n>` for the count buttons. */
  key: string;
  control: LogicalControl;
  visible: boolean;
  state: InteractionState;
  skin: ResourceHandle;
  count?: number;
}

export interface ControlPanelView {
  phase: SpinPhase;
  speedMode: SpeedMode;
  busy: boolean;
  bet: BetState;
  betLabel: string;
  autoplay: AutoplayState;
  selectedAutoCount: number;
  autoLabel: string;
  betPanelOpen: boolean;
  autoPanelOpen: boolean;
  panels: Record<PanelId, ResourceHandle>;
  controls: ControlView[];
}

export type PresenterEvents = {
  [GameEvent.RENDER]: ControlPanelView;
};

const AUTO_COUNT_KEY_PREFIX = `${LogicalControl.AutoCount}:`;

export function autoCountKey(count: number): string {
  return `${AUTO_COUNT_KEY_PREFIX}${count}`;
}

function controlForKey(key: string): LogicalControl | undefined {
  if (key.startsWith(AUTO_COUNT_KEY_PREFIX)) return LogicalControl.AutoCount;
  return Object.values(LogicalControl).find((control) => control === key);
}

/**
 * Turns control-panel input into calls on the bet, spin and autoplay
 * controllers, and re-resolves every control's skin after each change.
 *
 * Popup state lives here only. Opening or closing a popup never touches a
 * bet change or an autoplay session.
 */
export class ControlPanelPresenter {
  readonly events = new EventBus<PresenterEvents>();
  readonly bet: BetController;
  readonly engine: SpinEngine;
  readonly autoplay: AutoplayController;

  private readonly logger: Logger;
  private readonly countOptions: readonly number[];
  private readonly defaultAutoCount: number;
  private readonly unsubscribers: Array<() => void> = [];
  private manifest: AssetManifest;
  private betPanelOpen = false;
  private autoPanelOpen = false;
  private selectedAutoCount: number | null = null;
  private applying = false;
  private dirty = false;

  constructor(options: ControlPanelPresenterOptions = {}) {
    const config = options.config ?? DEFAULT_CONTROL_PANEL_CONFIG;
    const { logLevel } = config;
    this.logger = new Logger('ControlPanel', logLevel);

    const scheduler = options.scheduler ?? new GsapScheduler();
    this.bet = new BetController(config.bet, logLevel);
    this.engine = new SpinEngine({
      reelCount: config.reels.count,
      speedProfiles: config.speedProfiles,
      scheduler,
      logLevel
    });
    this.autoplay = new AutoplayController(this.engine, scheduler, logLevel);
    this.manifest = AssetManifest.fromUploads(options.uploads ?? [], { basePath: config.assets.basePath });
    this.countOptions = [...config.autoplay.countOptions];
    this.defaultAutoCount = config.autoplay.defaultCount;

    const onModelChanged = (): void => this.modelChanged();
    this.unsubscribers.push(
      this.engine.events.on(GameEvent.PHASE_CHANGED, onModelChanged),
      this.autoplay.events.on(GameEvent.AUTOPLAY_STARTED, onModelChanged),
      this.autoplay.events.on(GameEvent.AUTOPLAY_COUNT_RESTARTED, onModelChanged),
      this.autoplay.events.on(GameEvent.AUTOPLAY_CYCLE_COMPLETED, onModelChanged),
      this.autoplay.events.on(GameEvent.AUTOPLAY_ENDED, onModelChanged)
    );

    this.reportMissingArt();
  }

  get isBusy(): boolean {
    return this.engine.phase !== SpinPhase.IDLE || this.autoplay.active;
  }

  // --- Main bar ---

  onSpinButtonClick(): boolean {
    return this.apply(() => {
      const closed = this.closePopups();
      if (this.autoplay.active) return closed;
      return this.engine.spin() !== null || closed;
    });
  }

  onStopButtonClick(): boolean {
    return this.apply(() => this.engine.stop());
  }

  // --- Bet popup ---

  onOpenBetPanelClick(): boolean {
    return this.apply(() => {
      if (this.isBusy) return false;
      this.autoPanelOpen = false;
      this.betPanelOpen = true;
      return true;
    });
  }

  onCloseBetPanelClick(): boolean {
    return this.apply(() => {
      if (!this.betPanelOpen) return false;
      this.betPanelOpen = false;
      return true;
    });
  }

  onIncreaseBetClick(): boolean {
    return this.apply(() => !this.isBusy && this.bet.increase());
  }

  onDecreaseBetClick(): boolean {
    return this.apply(() => !this.isBusy && this.bet.decrease());
  }

  onSetMaxBetClick(): boolean {
    return this.apply(() => !this.isBusy && this.bet.setMax());
  }

  // --- Auto popup ---

  onOpenAutoPanelClick(): boolean {
    return this.apply(() => {
      if (this.isBusy) return false;
      this.betPanelOpen = false;
      this.autoPanelOpen = true;
      return true;
    });
  }

  onCloseAutoPanelClick(): boolean {
    return this.apply(() => {
      if (!this.autoPanelOpen) return false;
      this.autoPanelOpen = false;
      return true;
    });
  }

  onAutoCountSelect(count: number): boolean {
    return this.apply(() => {
      if (!Number.isInteger(count) || count < 1) {
        this.logger.debug(`auto count ${count} ignored`);
        return false;
      }
      this.selectedAutoCount = count;
      if (this.autoplay.active) {
        this.autoplay.selectCount(count);
      }
      return true;
    });
  }

  onAutoStartClick(): boolean {
    return this.apply(() => {
      if (this.isBusy) return false;
      const wasOpen = this.autoPanelOpen;
      this.autoPanelOpen = false;
      return this.autoplay.start(this.effectiveAutoCount(), this.engine.currentSpeedMode) || wasOpen;
    });
  }

  onStopAutoButtonClick(): boolean {
    return this.apply(() => this.autoplay.stop());
  }

  onQuickSpinButtonClick(): boolean {
    return this.apply(() => this.toggleSpeedMode(SpeedMode.Quick));
  }

  onTurboSpinButtonClick(): boolean {
    return this.apply(() => this.toggleSpeedMode(SpeedMode.Turbo));
  }

  // --- Assets ---

  onAssetsUploaded(fileNames: Iterable<string>): boolean {
    return this.apply(() => {
      const files = [...fileNames];
      if (files.length === 0) return false;
      this.manifest = this.manifest.replace(files);
      this.logger.info(`${files.length} asset(s) uploaded, ${this.manifest.size} stems known`);
      return true;
    });
  }

  // --- Queries ---

  /** Skin for one control in a given state, e.g. Pressed on pointer-down. */
  skinFor(key: string, state: InteractionState): ResourceHandle | null {
    const control = controlForKey(key);
    if (!control) return null;
    return this.manifest.resolve(skinRequest(control, state));
  }

  getView(): ControlPanelView {
    const speedMode = this.engine.currentSpeedMode;
    const autoplay = this.autoplay.snapshot();
    const selectedAutoCount = this.effectiveAutoCount();
    const bet = this.bet.snapshot();
    const shownCount = autoplay.active ? autoplay.remaining : selectedAutoCount;

    return {
      phase: this.engine.phase,
      speedMode,
      busy: this.isBusy,
      bet,
      betLabel: `BET LEVEL x${bet.current}`,
      autoplay,
      selectedAutoCount,
      autoLabel: `Auto count: ${shownCount} | Speed: ${speedMode.toUpperCase()}`,
      betPanelOpen: this.betPanelOpen,
      autoPanelOpen: this.autoPanelOpen,
      panels: {
        [PanelId.BetPanel]: this.manifest.resolvePanel(PanelId.BetPanel),
        [PanelId.AutoPanel]: this.manifest.resolvePanel(PanelId.AutoPanel)
      },
      controls: this.buildControls()
    };
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.autoplay.dispose();
    this.engine.dispose();
    this.events.clear();
  }

  private buildControls(): ControlView[] {
    const busy = this.isBusy;
    const phase = this.engine.phase;
    const stopShown = spinToggleControl(phase) === LogicalControl.Stop;
    const bet = this.bet.visibilityState();
    const speedMode = this.engine.currentSpeedMode;
    const selectedCount = this.effectiveAutoCount();
    const anyPopupOpen = this.betPanelOpen || this.autoPanelOpen;

    const view = (
      control: LogicalControl,
      visible: boolean,
      state: InteractionState,
      key: string = control
    ): ControlView => ({
      key,
      control,
      visible,
      state,
      skin: this.manifest.resolve(skinRequest(control, state))
    });
    const enabledUnless = (disabled: boolean): InteractionState =>
      disabled ? InteractionState.Disabled : InteractionState.Normal;
    const selectedIf = (selected: boolean): InteractionState =>
      selected ? InteractionState.Selected : InteractionState.Normal;

    const controls: ControlView[] = [
      view(LogicalControl.Spin, !stopShown, enabledUnless(busy || anyPopupOpen)),
      view(LogicalControl.Stop, stopShown, enabledUnless(phase === SpinPhase.STOPPING)),
      view(LogicalControl.BetPanelOpen, true, enabledUnless(busy || this.autoPanelOpen)),
      view(LogicalControl.MaxBet, true, enabledUnless(busy || !bet.maxEnabled)),
      view(LogicalControl.AutoPanelOpen, true, enabledUnless(busy || this.betPanelOpen)),
      view(LogicalControl.AutoStop, this.autoplay.active, enabledUnless(this.autoplay.stopRequested)),

      view(LogicalControl.BetPanelClose, this.betPanelOpen, InteractionState.Normal),
      view(LogicalControl.BetDecrease, this.betPanelOpen, enabledUnless(busy || !bet.decEnabled)),
      view(LogicalControl.BetIncrease, this.betPanelOpen, enabledUnless(busy || !bet.incEnabled)),
      view(LogicalControl.BetPanelMax, this.betPanelOpen, enabledUnless(busy || !bet.maxEnabled)),

      view(LogicalControl.AutoPanelClose, this.autoPanelOpen, InteractionState.Normal)
    ];

    for (const count of this.countOptions) {
      controls.push({
        ...view(LogicalControl.AutoCount, this.autoPanelOpen, selectedIf(count === selectedCount), autoCountKey(count)),
        count
      });
    }

    controls.push(
      view(LogicalControl.QuickSpin, this.autoPanelOpen, selectedIf(speedMode === SpeedMode.Quick)),
      view(LogicalControl.TurboSpin, this.autoPanelOpen, selectedIf(speedMode === SpeedMode.Turbo)),
      view(LogicalControl.AutoStart, this.autoPanelOpen, enabledUnless(busy))
    );
    return controls;
  }

  private effectiveAutoCount(): number {
    return this.selectedAutoCount ?? this.defaultAutoCount;
  }

  private toggleSpeedMode(mode: SpeedMode): boolean {
    const next = this.engine.currentSpeedMode === mode ? SpeedMode.Normal : mode;
    this.autoplay.setSpeedMode(next);
    return true;
  }

  private closePopups(): boolean {
    const changed = this.betPanelOpen || this.autoPanelOpen;
    this.betPanelOpen = false;
    this.autoPanelOpen = false;
    return changed;
  }

  /**
   * Runs a handler and renders once afterwards if it changed anything,
   * including changes reported by the controllers while it ran.
   */
  private apply(action: () => boolean): boolean {
    this.applying = true;
    this.dirty = false;
    let changed = false;
    try {
      changed = action();
    } finally {
      this.applying = false;
    }
    if (changed || this.dirty) {
      this.dirty = false;
      this.render();
    }
    return changed;
  }

  private modelChanged(): void {
    if (this.applying) {
      this.dirty = true;
      return;
    }
    this.render();
  }

  private render(): void {
    this.events.emit(GameEvent.RENDER, this.getView());
  }

  private reportMissingArt(): void {
    const bare = new Set<LogicalControl>();
    for (const gap of this.manifest.coverage()) {
      if (gap.state === InteractionState.Normal) bare.add(gap.control);
    }
    if (bare.size > 0) {
      this.logger.warn(`no art for ${bare.size} control(s), using default skin: ${[...bare].join(', ')}`);
    }
  }
}
