/// A dense vector, as produced by embeddings and encoders.
export type Vector = readonly number[]

/// A persistent sequence encoder state. Pushing an input returns a new
/// state and leaves the old one usable, so parser states can be forked
/// without copying encoder state.
export interface EncoderState {
  /// The encoding of the sequence pushed so far.
  readonly output: Vector
  push(input: Vector): EncoderState
}

/// A sequence encoder, such as a recurrent network.
export interface SequenceEncoder {
  /// Start a new sequence. `empty` is the encoder's input for an empty
  /// sequence, which a simple encoder may return as its output.
  start(empty: Vector): EncoderState
}

class TopState implements EncoderState {
  constructor(readonly output: Vector) {}
  push(input: Vector): EncoderState { return new TopState(input) }
}

/// The encoder used when a model doesn't provide one: the encoding of
/// a sequence is its last element.
export const topEncoder: SequenceEncoder = {
  start(empty) { return new TopState(empty) }
}

/// The part of a model the transition system needs to build
/// representations: embeddings, a composition function for reduced
/// constituents, and (optionally) encoders for the three structures.
export interface TransitionModel {
  /// The vector standing in for an empty structure, such as a fully
  /// consumed buffer.
  readonly empty: Vector
  embedWord(id: number): Vector
  embedLabel(id: number): Vector
  /// Embed an action, by its flat index (see `flatIndex`).
  embedAction(index: number): Vector
  /// Compose a reduced constituent from its label vector and the
  /// vectors of its children, in order.
  compose(label: Vector, children: readonly Vector[]): Vector
  /// Contextualize the embeddings of a sentence before parsing it, for
  /// example with a bidirectional encoder. Must return one vector per
  /// input. Defaults to the identity.
  encodeSentence?(embeddings: readonly Vector[]): Vector[]
  stackEncoder?: SequenceEncoder
  terminalEncoder?: SequenceEncoder
  historyEncoder?: SequenceEncoder
}

/// Scores the actions available in a parser state, given its
/// representation. Scores are unnormalized logits.
export interface Scorer {
  /// Logits for the three action slots: consume (SHIFT or GEN),
  /// REDUCE, and OPEN.
  scoreActions(representation: Vector): readonly number[]
  /// Logits for every nonterminal label.
  scoreLabels(representation: Vector): readonly number[]
}

/// A scorer that can also generate words.
export interface GenerativeScorer extends Scorer {
  /// Logits for every word in the vocabulary.
  scoreWords(representation: Vector): readonly number[]
}
