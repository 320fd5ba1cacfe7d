export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export abstract class StateMachine<S extends string> {
  private _state: S;

  protected constructor(
    initial: S,
    private readonly transitions: TransitionTable<S>
  ) {
    this._state = initial;
  }

  get state(): S {
    return this._state;
  }

  canTransition(next: S): boolean {
    return this.transitions[this._state].includes(next);
  }

  /**
   * Moves to `next` when the table allows it. Returns false (and leaves the
   * state untouched) otherwise.
   */
  protected setState(next: S): boolean {
    if (this._state === next) return false;
    if (!this.canTransition(next)) {
      this.onTransitionRejected(this._state, next);
      return false;
    }
    const prev = this._state;
    this._state = next;
    this.onStateChanged(prev, next);
    return true;
  }

  protected onTransitionRejected(_prev: S, _next: S): void {}

  protected abstract onStateChanged(prev: S, next: S): void;
}
