import {Action} from "../src/constants"
import {actionKind, actionSlot, actionValue, openAction} from "../src/action"
import {Vocabulary} from "../src/vocab"
import type {EncoderState, TransitionModel, Scorer, GenerativeScorer, Vector} from "../src/model"

export const words = ["The", "cat", "sleeps"]

export const vocab = new Vocabulary(words, ["S", "NP", "VP"])

export const S = openAction(0), NP = openAction(1), VP = openAction(2)

/// The derivation of `(S (NP The cat) (VP sleeps))`.
export const gold = [S, NP, Action.Shift, Action.Shift, Action.Reduce, VP, Action.Shift, Action.Reduce, Action.Reduce]

class CountState implements EncoderState {
  constructor(readonly count: number) {}
  get output() { return [this.count] }
  push(): EncoderState { return new CountState(this.count + 1) }
}

/// A one-dimensional model whose history encoding is the number of
/// actions taken, so that scorers can see which step they are at.
export const countingModel: TransitionModel = {
  empty: [0],
  embedWord: id => [id],
  embedLabel: id => [10 + id],
  embedAction: index => [index],
  compose: (label, children) => [label[0] + children.length],
  historyEncoder: {start: () => new CountState(0)}
}

/// A scorer that strongly prefers the next action of `actions`,
/// reading the step from a `countingModel` history encoding.
export function followScorer(actions: readonly number[], strength = 10): Scorer {
  let next = (repr: Vector) => repr[0] < actions.length ? actions[repr[0]] : -1
  return {
    scoreActions(repr) {
      let action = next(repr)
      return [0, 1, 2].map(slot => action >= 0 && actionSlot(action) == slot ? strength : 0)
    },
    scoreLabels(repr) {
      let action = next(repr)
      return vocab.labels.map((_, label) =>
        action >= 0 && actionKind(action) == Action.Open && actionValue(action) == label ? strength : 0)
    }
  }
}

/// A scorer that gives every action the same score.
export const flatScorer: GenerativeScorer = {
  scoreActions: () => [0, 0, 0],
  scoreLabels: () => vocab.labels.map(() => 0),
  scoreWords: () => vocab.words.map(() => 0)
}
