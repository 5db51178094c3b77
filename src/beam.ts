import {Action, Slot} from "./constants"
import {IllegalActionError} from "./error"
import {openAction} from "./action"
import {logSoftmax, selectBest} from "./math"
import {type Derivation, toDerivation} from "./decoder"
import type {TransitionParser, ParserState} from "./parse"
import type {Scorer} from "./model"

const verbose = typeof process != "undefined" && process.env && /\bbeam\b/.test(process.env.LOG || "")

let stateIDs: WeakMap<ParserState, string> | null = null
let nextStateID = 0x2654

function stateID(state: ParserState) {
  let id = (stateIDs || (stateIDs = new WeakMap)).get(state)
  if (!id) stateIDs.set(state, id = String.fromCodePoint(nextStateID++))
  return id + state
}

// The indices of the `k` greatest finite values, greatest first, with
// lower indices winning ties.
function topIndices(values: readonly number[], k: number) {
  let indices: number[] = []
  for (let i = 0; i < values.length; i++) if (values[i] > -Infinity) indices.push(i)
  return selectBest(indices, k, (a, b) => values[b] - values[a])
}

/// Options for a [`BeamSearchDecoder`](#BeamSearchDecoder).
export interface BeamConfig {
  /// The number of partial derivations kept per step. Defaults to 10.
  beamSize?: number
}

/// Beam search over derivations. Keeps the `beamSize` best partial
/// derivations at each step, and returns every derivation that
/// finished inside the beam.
export class BeamSearchDecoder {
  readonly beamSize: number

  constructor(
    readonly parser: TransitionParser,
    readonly scorer: Scorer,
    readonly config: BeamConfig = {}
  ) {
    this.beamSize = config.beamSize ?? 10
    if (this.beamSize < 1) throw new RangeError(`Beam size must be at least 1, got ${this.beamSize}`)
  }

  /// Parse a sentence, returning the finished derivations, most
  /// probable first.
  decode(words: readonly string[]): Derivation[] {
    let k = this.beamSize
    let open = [this.parser.start(words)], finished: ParserState[] = []
    while (open.length) {
      let children: ParserState[] = []
      for (let state of open) this.expand(state, k, children)
      open = []
      for (let state of selectBest(children, k, (a, b) => b.score - a.score)) {
        if (state.finished) {
          if (verbose) console.log(`Finish ${stateID(state)}`)
          finished.push(state)
        } else {
          open.push(state)
        }
      }
    }
    return finished.sort((a, b) => b.score - a.score).map(state => toDerivation(state))
  }

  private expand(state: ParserState, k: number, children: ParserState[]) {
    let repr = state.representation()
    let slots = logSoftmax(this.scorer.scoreActions(repr), state.legalSlots())
    let best = topIndices(slots, k)
    if (!best.length) throw new IllegalActionError(Action.None, `No legal action in state ${state}`)
    let base = verbose ? stateID(state) + " -> " : ""
    for (let slot of best) {
      if (slot == Slot.Open) {
        let labels = logSoftmax(this.scorer.scoreLabels(repr))
        for (let label of topIndices(labels, k - best.length + 1)) {
          let child = state.split()
          child.apply(openAction(label))
          child.score += slots[slot]
          child.score += labels[label]
          if (verbose) console.log(base + stateID(child))
          children.push(child)
        }
      } else {
        let child = state.split()
        child.apply(slot == Slot.Reduce ? Action.Reduce : Action.Shift)
        child.score += slots[slot]
        if (verbose) console.log(base + stateID(child))
        children.push(child)
      }
    }
  }
}
