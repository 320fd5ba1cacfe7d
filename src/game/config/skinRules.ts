import { InteractionState, LogicalControl, PanelId } from '@game/types/Controls';

export interface SkinChains {
  readonly normal: readonly string[];
  readonly pressed: readonly string[];
  readonly disabled: readonly string[];
}

/**
 * Candidate art stems per control, tried in order. When none is uploaded the
 * resolver falls back to the default colored button. Selected (an active
 * toggle or the chosen autoplay count) shares the pressed chain.
 *
 * Both max-bet buttons fall back to the auto-count art (`btn_auto_amt*`)
 * after `btn_bet_max`.
 */
export const SKIN_RULES: Readonly<Record<LogicalControl, SkinChains>> = {
  [LogicalControl.Spin]: {
    normal: ['btn_spin'],
    pressed: ['btn_spin_on', 'btn_spin'],
    disabled: ['btn_spin_off', 'btn_spin']
  },
  [LogicalControl.Stop]: {
    normal: ['btn_stop', 'btn_stop_on'],
    pressed: ['btn_stop_on', 'btn_stop'],
    disabled: ['btn_stop_off', 'btn_stop']
  },
  [LogicalControl.BetPanelOpen]: {
    normal: ['btn_bet'],
    pressed: ['btn_bet_on', 'btn_bet'],
    disabled: ['btn_bet_off', 'btn_bet']
  },
  [LogicalControl.MaxBet]: {
    normal: ['btn_bet_max', 'btn_auto_amt'],
    pressed: ['btn_bet_max', 'btn_auto_amt_on', 'btn_auto_amt'],
    disabled: ['btn_bet_max', 'btn_auto_amt']
  },
  [LogicalControl.BetPanelClose]: {
    normal: ['btn_menu_close'],
    pressed: ['btn_close_on_menu', 'btn_menu_close_on', 'btn_menu_close'],
    disabled: ['btn_menu_close_off', 'btn_menu_close']
  },
  [LogicalControl.BetDecrease]: {
    normal: ['btn_bet_minus'],
    pressed: ['btn_bet_minus_on', 'btn_bet_minus'],
    disabled: ['btn_bet_minus_off', 'btn_bet_minus']
  },
  [LogicalControl.BetIncrease]: {
    normal: ['btn_bet_plus'],
    pressed: ['btn_bet_plus_on', 'btn_bet_plus'],
    disabled: ['btn_bet_plus_off', 'btn_bet_plus']
  },
  [LogicalControl.BetPanelMax]: {
    normal: ['btn_bet_max', 'btn_auto_amt'],
    pressed: ['btn_bet_max', 'btn_auto_amt_on', 'btn_auto_amt'],
    disabled: ['btn_bet_max', 'btn_auto_amt']
  },
  [LogicalControl.AutoPanelOpen]: {
    normal: ['btn_auto'],
    pressed: ['btn_auto_on', 'btn_auto'],
    disabled: ['btn_auto_off', 'btn_auto']
  },
  [LogicalControl.AutoStop]: {
    normal: ['btn_auto_active', 'btn_stop_on'],
    pressed: ['btn_auto_active', 'btn_stop_on'],
    disabled: ['btn_auto_active', 'btn_stop_off']
  },
  [LogicalControl.AutoPanelClose]: {
    normal: ['btn_menu_close'],
    pressed: ['btn_menu_close_on', 'btn_menu_close'],
    disabled: ['btn_menu_close_off', 'btn_menu_close']
  },
  [LogicalControl.AutoCount]: {
    normal: ['btn_auto_amt'],
    pressed: ['btn_auto_amt_on', 'btn_auto_amt'],
    disabled: ['btn_auto_amt', 'btn_auto_amt_off']
  },
  [LogicalControl.QuickSpin]: {
    normal: ['btn_quick_off', 'btn_speed_quick'],
    pressed: ['btn_quick_on', 'btn_speed_quick_on', 'btn_speed_quick'],
    disabled: ['btn_quick_off', 'btn_speed_quick']
  },
  [LogicalControl.TurboSpin]: {
    normal: ['btn_turbo_off', 'btn_speed_turbo'],
    pressed: ['btn_turbo', 'btn_speed_turbo_on', 'btn_speed_turbo'],
    disabled: ['btn_turbo_off', 'btn_speed_turbo']
  },
  [LogicalControl.AutoStart]: {
    normal: ['btn_auto_spin'],
    pressed: ['btn_auto_spin_on', 'btn_auto_spin'],
    disabled: ['btn_auto_spin_off', 'btn_auto_spin']
  }
};

export const PANEL_SKIN_RULES: Readonly<Record<PanelId, readonly string[]>> = {
  [PanelId.BetPanel]: ['bet_popup_panel', 'popup_panel_bg', 'bet_panel', 'panel_bet'],
  [PanelId.AutoPanel]: ['auto_popup_panel', 'popup_panel_bg', 'bet_popup_panel', 'auto_panel']
};

export function candidateStems(control: LogicalControl, state: InteractionState): readonly string[] {
  const chains = SKIN_RULES[control];
  switch (state) {
    case InteractionState.Normal:
      return chains.normal;
    case InteractionState.Pressed:
    case InteractionState.Selected:
      return chains.pressed;
    case InteractionState.Disabled:
      return chains.disabled;
  }
}
