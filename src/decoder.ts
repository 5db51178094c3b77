import {Action, Slot} from "./constants"
import {IllegalActionError} from "./error"
import {openAction, genAction, formatAction} from "./action"
import {logSoftmax, argmax, temper, sampleIndex} from "./math"
import type {TransitionParser, ParserState} from "./parse"
import type {Scorer, GenerativeScorer, Vector} from "./model"
import type {ParseTree} from "./tree"

const verbose = typeof process != "undefined" && process.env && /\bdecode\b/.test(process.env.LOG || "")

/// A finished derivation produced by a decoder.
export interface Derivation {
  /// The tree built.
  tree: ParseTree
  /// The actions that built it.
  actions: number[]
  /// The log-probability the model assigns to the actions (for
  /// generative decoders, to the tree and sentence jointly).
  logProb: number
  /// The log-probability of the actions under the distribution the
  /// decoder actually drew them from. Differs from `logProb` for
  /// samplers with a temperature other than 1, and is 0 for
  /// deterministic decoders.
  proposalLogProb: number
}

/// Options for the sampling decoders,
/// [`SamplingDecoder`](#SamplingDecoder) and
/// [`GenerativeSampler`](#GenerativeSampler).
export interface SamplingConfig {
  /// The sampling temperature: distributions are raised to this power
  /// and renormalized before sampling. Defaults to 1.
  alpha?: number
  /// The source of uniform random numbers in [0, 1) used for
  /// sampling. Defaults to `Math.random`.
  random?: () => number
}

/// A choice made by a decoder policy: an index into a distribution,
/// and its log-probability under the distribution the policy drew
/// it from.
export interface Choice {
  index: number
  logProb: number
}

// The action taken in a step and its log-probabilities, without the
// slot's own.
interface Consumption {
  action: number
  logProb: number
  proposal: number
}

/// @internal
export function toDerivation(state: ParserState, proposalLogProb = 0): Derivation {
  return {tree: state.toTree(), actions: state.actions, logProb: state.score, proposalLogProb}
}

/// The shared shape of the step-by-step decoders. Each step scores
/// the state's representation, normalizes the slot scores over the
/// legal slots, lets the policy (`choose`) pick a slot, and then a
/// label or word when the slot needs one.
export abstract class Decoder<S extends Scorer = Scorer> {
  constructor(
    readonly parser: TransitionParser,
    readonly scorer: S
  ) {}

  /// Pick an index from a distribution, given as log-probabilities.
  /// Should return -1 when every entry is `-Infinity`.
  protected abstract choose(logProbs: readonly number[]): Choice

  /// Pick the action for the consume slot. Discriminative decoders
  /// shift.
  protected consume(_state: ParserState, _representation: Vector): Consumption {
    return {action: Action.Shift, logProb: 0, proposal: 0}
  }

  /// Run the policy until the state is finished.
  protected derive(state: ParserState): Derivation {
    let proposal = 0
    while (!state.finished) {
      let repr = state.representation()
      let slots = logSoftmax(this.scorer.scoreActions(repr), state.legalSlots())
      let slot = this.choose(slots)
      if (slot.index < 0) throw new IllegalActionError(Action.None, `No legal action in state ${state}`)
      let action: number, extra = 0
      proposal += slot.logProb
      if (slot.index == Slot.Open) {
        let labels = logSoftmax(this.scorer.scoreLabels(repr))
        let label = this.choose(labels)
        action = openAction(label.index)
        extra = labels[label.index]
        proposal += label.logProb
      } else if (slot.index == Slot.Reduce) {
        action = Action.Reduce
      } else {
        let consumed = this.consume(state, repr)
        action = consumed.action
        extra = consumed.logProb
        proposal += consumed.proposal
      }
      if (verbose) console.log(`${state} -> ${formatAction(action, this.parser.vocab)}`)
      state.apply(action)
      state.score += slots[slot.index]
      state.score += extra
    }
    if (verbose) console.log(`Finished ${state}`)
    return toDerivation(state, proposal)
  }
}

/// Always takes the most probable slot and label.
export class GreedyDecoder extends Decoder {
  protected choose(logProbs: readonly number[]): Choice {
    return {index: argmax(logProbs), logProb: 0}
  }

  /// Parse a sentence.
  decode(words: readonly string[]): Derivation {
    return this.derive(this.parser.start(words))
  }
}

function sampleChoice(logProbs: readonly number[], alpha: number, random: () => number): Choice {
  let tempered = temper(logProbs, alpha)
  let index = sampleIndex(tempered, random)
  return {index, logProb: index < 0 ? -Infinity : tempered[index]}
}

/// Draws derivations from the model's distribution over trees
/// (ancestral sampling), optionally sharpened or flattened by a
/// temperature.
export class SamplingDecoder extends Decoder {
  constructor(parser: TransitionParser, scorer: Scorer, readonly config: SamplingConfig = {}) {
    super(parser, scorer)
  }

  protected choose(logProbs: readonly number[]): Choice {
    return sampleChoice(logProbs, this.config.alpha ?? 1, this.config.random || Math.random)
  }

  /// Sample one derivation for a sentence.
  decode(words: readonly string[]): Derivation {
    return this.derive(this.parser.start(words))
  }

  /// Sample `n` independent derivations for a sentence.
  sample(words: readonly string[], n: number): Derivation[] {
    let sentence = this.parser.prepare(words), result: Derivation[] = []
    for (let i = 0; i < n; i++) result.push(this.derive(this.parser.start(sentence)))
    return result
  }
}

/// Samples sentences and their trees jointly from a generative model.
export class GenerativeSampler extends Decoder<GenerativeScorer> {
  constructor(parser: TransitionParser, scorer: GenerativeScorer, readonly config: SamplingConfig = {}) {
    super(parser, scorer)
  }

  protected choose(logProbs: readonly number[]): Choice {
    return sampleChoice(logProbs, this.config.alpha ?? 1, this.config.random || Math.random)
  }

  protected consume(state: ParserState, representation: Vector): Consumption {
    let words = logSoftmax(this.scorer.scoreWords(representation))
    let word = this.choose(words)
    if (word.index < 0) throw new IllegalActionError(Action.None, `No word can be generated in state ${state}`)
    return {action: genAction(word.index), logProb: words[word.index], proposal: word.logProb}
  }

  /// Sample a sentence with its tree. Its `logProb` is the joint
  /// log-probability of both.
  sample(): Derivation {
    return this.derive(this.parser.startGenerative())
  }
}
