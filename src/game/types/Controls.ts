export enum LogicalControl {
  Spin = 'spin',
  Stop = 'stop',
  BetPanelOpen = 'betPanelOpen',
  MaxBet = 'maxBet',
  BetPanelClose = 'betPanelClose',
  BetDecrease = 'betDecrease',
  BetIncrease = 'betIncrease',
  BetPanelMax = 'betPanelMax',
  AutoPanelOpen = 'autoPanelOpen',
  AutoStop = 'autoStop',
  AutoPanelClose = 'autoPanelClose',
  AutoCount = 'autoCount',
  QuickSpin = 'quickSpin',
  TurboSpin = 'turboSpin',
  AutoStart = 'autoStart'
}

export enum InteractionState {
  Normal = 'normal',
  Pressed = 'pressed',
  Disabled = 'disabled',
  Selected = 'selected'
}

export interface ButtonSkinRequest {
  readonly logicalControl: LogicalControl;
  readonly interactionState: InteractionState;
}

export function skinRequest(
  logicalControl: LogicalControl,
  interactionState: InteractionState = InteractionState.Normal
): ButtonSkinRequest {
  return Object.freeze({ logicalControl, interactionState });
}

export enum PanelId {
  BetPanel = 'betInfoPanel',
  AutoPanel = 'autoPanelInfo'
}
