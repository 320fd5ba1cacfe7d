import { describe, it, expect } from 'vitest';
import { InteractionState, LogicalControl } from '@game/types/Controls';
import { SKIN_RULES, candidateStems } from '../skinRules';

describe('skin rules', () => {
  it('should define non-empty chains for every control', () => {
    for (const control of Object.values(LogicalControl)) {
      const chains = SKIN_RULES[control];
      expect(chains.normal.length).toBeGreaterThan(0);
      expect(chains.pressed.length).toBeGreaterThan(0);
      expect(chains.disabled.length).toBeGreaterThan(0);
    }
  });

  it('should use lower-case stems only', () => {
    for (const control of Object.values(LogicalControl)) {
      for (const state of Object.values(InteractionState)) {
        for (const stem of candidateStems(control, state)) {
          expect(stem).toBe(stem.toLowerCase());
        }
      }
    }
  });

  it('should share the pressed chain with the selected state', () => {
    expect(candidateStems(LogicalControl.AutoCount, InteractionState.Selected)).toEqual([
      'btn_auto_amt_on',
      'btn_auto_amt'
    ]);
    expect(candidateStems(LogicalControl.TurboSpin, InteractionState.Selected)).toEqual([
      'btn_turbo',
      'btn_speed_turbo_on',
      'btn_speed_turbo'
    ]);
  });

  it('should keep the close-button pressed variants in order', () => {
    expect(candidateStems(LogicalControl.BetPanelClose, InteractionState.Pressed)).toEqual([
      'btn_close_on_menu',
      'btn_menu_close_on',
      'btn_menu_close'
    ]);
    expect(candidateStems(LogicalControl.AutoPanelClose, InteractionState.Pressed)).toEqual([
      'btn_menu_close_on',
      'btn_menu_close'
    ]);
  });
});
