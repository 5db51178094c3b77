import {Action} from "./constants"
import {type TransitionModel, type EncoderState, type Vector, topEncoder} from "./model"

/// The actions taken so far, as a persistent list seeded with
/// `Action.None`, so that `last` is always defined.
export class History {
  /// @internal
  constructor(
    /// The most recent action.
    readonly last: number,
    readonly prev: History | null,
    /// The number of actions taken, not counting the seed.
    readonly length: number,
    readonly encoding: EncoderState
  ) {}

  static start(model: TransitionModel) {
    return new History(Action.None, null, 0, (model.historyEncoder || topEncoder).start(model.empty))
  }

  /// Add an action, given its embedding.
  push(action: number, vector: Vector) {
    return new History(action, this, this.length + 1, this.encoding.push(vector))
  }

  get top() { return this.encoding.output }

  /// The actions taken, oldest first.
  get actions(): number[] {
    let result: number[] = []
    for (let h: History | null = this; h && h.prev; h = h.prev) result.push(h.last)
    return result.reverse()
  }
}
