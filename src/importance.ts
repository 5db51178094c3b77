import {Action} from "./constants"
import {MalformedOracleError, SampleCountMismatchError} from "./error"
import {actionKind, actionValue, actionSlot, genAction, formatAction, oracle} from "./action"
import {replaceLeaves} from "./brackets"
import {logSoftmax, logSumExp} from "./math"
import type {SamplingDecoder} from "./decoder"
import type {TransitionParser} from "./parse"
import type {GenerativeScorer} from "./model"
import type {ParseTree} from "./tree"
import type {Vocabulary} from "./vocab"
import type {Sample} from "./samples"

const verbose = typeof process != "undefined" && process.env && /\bdecode\b/.test(process.env.LOG || "")

/// A tree proposed for a sentence, as a discriminative action
/// sequence with its log-probability under the proposal distribution.
export interface ProposalSample {
  actions: readonly number[]
  logProb: number
}

/// A source of proposal trees for importance sampling.
export interface ProposalSource {
  /// Return `count` proposals for the sentence with the given index,
  /// or raise `SampleCountMismatchError` when fewer are available.
  propose(words: readonly string[], index: number, count: number): ProposalSample[]
}

/// Draws proposals from a discriminative sampling decoder.
export class DecoderProposal implements ProposalSource {
  constructor(readonly decoder: SamplingDecoder) {}

  propose(words: readonly string[], _index: number, count: number): ProposalSample[] {
    return this.decoder.sample(words, count).map(d => ({actions: d.actions, logProb: d.proposalLogProb}))
  }
}

/// Takes proposals from previously sampled trees, as read by
/// `readSamples`. The leaves of the stored trees are replaced, by
/// position, with the sentence's words.
export class FileProposal implements ProposalSource {
  constructor(
    readonly samples: ReadonlyMap<number, readonly Sample[]>,
    readonly vocab: Vocabulary,
    /// Whether the stored trees have preterminals that should be
    /// dropped.
    readonly tagged = false
  ) {}

  propose(words: readonly string[], index: number, count: number): ProposalSample[] {
    let found = this.samples.get(index) || []
    if (found.length < count) throw new SampleCountMismatchError(index, count, found.length)
    return found.slice(0, count).map((sample, i) => {
      let actions: number[]
      try {
        actions = oracle(replaceLeaves(sample.tree, words), this.vocab, this.tagged)
      } catch (e) {
        if (!(e instanceof RangeError || e instanceof MalformedOracleError)) throw e
        throw new MalformedOracleError(index, `Sample ${i}: ${e.message}`)
      }
      return {actions, logProb: sample.logProb}
    })
  }
}

/// Configuration for an [`ImportanceSampler`](#ImportanceSampler).
export interface ImportanceConfig {
  /// The number of proposal samples used per sentence. Defaults to
  /// 100.
  samples?: number
}

/// A proposal tree, scored by the generative model.
export interface ScoredSample {
  tree: ParseTree
  actions: readonly number[]
  /// The joint log-probability of the tree and sentence.
  logProb: number
  /// The proposal log-probability of the tree.
  proposalLogProb: number
}

/// Estimates sentence probabilities under a generative model, and
/// picks the best tree among proposals, by importance sampling from a
/// discriminative proposal distribution.
export class ImportanceSampler {
  readonly samples: number

  constructor(
    readonly parser: TransitionParser,
    readonly scorer: GenerativeScorer,
    readonly proposal: ProposalSource,
    config: ImportanceConfig = {}
  ) {
    this.samples = config.samples ?? 100
    if (this.samples < 1) throw new RangeError(`The number of samples must be at least 1, got ${this.samples}`)
  }

  /// Compute the joint log-probability of a sentence and a tree, given
  /// as an action sequence. SHIFT actions are taken to generate the
  /// next word of the sentence.
  score(words: readonly string[], actions: readonly number[], index: number | null = null): number {
    let {vocab} = this.parser, state = this.parser.startGenerative(words), logProb = 0
    for (let i = 0; i < actions.length; i++) {
      let action = actions[i]
      if (actionKind(action) == Action.Shift && action >= 0) {
        if (!state.canConsume) throw new MalformedOracleError(index, `Illegal action SHIFT at step ${i}`)
        action = genAction(vocab.wordID(words[state.input.pos]))
      }
      if (!state.canApply(action))
        throw new MalformedOracleError(index, `Illegal action ${formatAction(action, vocab)} at step ${i}`)
      let repr = state.representation()
      let slots = logSoftmax(this.scorer.scoreActions(repr), state.legalSlots())
      let lp = slots[actionSlot(action)]
      if (actionKind(action) == Action.Open) lp += logSoftmax(this.scorer.scoreLabels(repr))[actionValue(action)]
      else if (actionKind(action) == Action.Gen) lp += logSoftmax(this.scorer.scoreWords(repr))[actionValue(action)]
      state.apply(action)
      logProb += lp
    }
    if (!state.finished) throw new MalformedOracleError(index, `Action sequence ends before the parse is finished`)
    return logProb
  }

  /// Draw proposal trees for a sentence and score them. With `unique`,
  /// trees that linearize the same are only included once.
  scoredSamples(words: readonly string[], index = 0, {unique = false}: {unique?: boolean} = {}): ScoredSample[] {
    let result: ScoredSample[] = [], seen = new Set<string>()
    for (let sample of this.proposal.propose(words, index, this.samples)) {
      let tree = this.parser.replay(words, sample.actions, index).toTree()
      if (unique) {
        let key = tree.linearize()
        if (seen.has(key)) continue
        seen.add(key)
      }
      let logProb = this.score(words, sample.actions, index)
      if (verbose) console.log(`${tree} ${logProb.toFixed(3)} (proposal ${sample.logProb.toFixed(3)})`)
      result.push({tree, actions: sample.actions, logProb, proposalLogProb: sample.logProb})
    }
    return result
  }

  /// Find the proposal tree with the highest joint probability.
  mapTree(words: readonly string[], index = 0): ScoredSample {
    let best: ScoredSample | null = null
    for (let sample of this.scoredSamples(words, index, {unique: true}))
      if (!best || sample.logProb > best.logProb) best = sample
    if (!best) throw new RangeError("No proposal samples")
    return best
  }

  /// Estimate the log-probability of a sentence:
  /// `log(1/N sum(p(x, y) / q(y | x)))` over the proposal samples.
  logProb(words: readonly string[], index = 0): number {
    let samples = this.scoredSamples(words, index)
    return logSumExp(samples.map(s => s.logProb - s.proposalLogProb)) - Math.log(samples.length)
  }

  /// The estimated perplexity of a sentence, per word.
  perplexity(words: readonly string[], index = 0): number {
    return Math.exp(-this.logProb(words, index) / words.length)
  }

  /// The estimated per-word perplexity of a set of sentences, where
  /// sentence `i` has index `i`.
  corpusPerplexity(sentences: readonly (readonly string[])[]): number {
    let total = 0, count = 0
    sentences.forEach((words, i) => {
      total += this.logProb(words, i)
      count += words.length
    })
    return Math.exp(-total / count)
  }
}
