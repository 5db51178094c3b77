import {Limit} from "./constants"
import {EmptyStructureError} from "./error"
import {type TransitionModel, type EncoderState, type Vector, topEncoder} from "./model"
import type {Vocabulary} from "./vocab"

/// A sentence prepared for parsing: its words, their vocabulary ids
/// and embeddings, and the contextual encodings of the words, which
/// are computed once, up front.
export class Sentence {
  /// @internal
  constructor(
    readonly words: readonly string[],
    readonly ids: readonly number[],
    readonly embeddings: readonly Vector[],
    readonly encodings: readonly Vector[]
  ) {}

  get length() { return this.words.length }

  static prepare(words: readonly string[], vocab: Vocabulary, model: TransitionModel) {
    let ids = words.map(w => vocab.wordID(w))
    let embeddings = ids.map(id => model.embedWord(id))
    let encodings = model.encodeSentence ? model.encodeSentence(embeddings) : embeddings
    if (encodings.length != embeddings.length)
      throw new RangeError(`Sentence encoder returned ${encodings.length} vectors for ${embeddings.length} words`)
    return new Sentence(words, ids, embeddings, encodings)
  }
}

/// The input side of a parser state: either the buffer of words still
/// to be shifted, or the terminal of words generated so far.
export interface WordInput {
  /// The number of words consumed.
  readonly pos: number
  /// When true, no further word may be consumed or generated.
  readonly exhausted: boolean
  /// When true, the root constituent may be closed.
  readonly complete: boolean
  /// The encoding of this input, as seen by the scorer.
  readonly top: Vector
}

/// The buffer of words that have not been shifted yet. Immutable:
/// popping returns a new buffer.
export class InputBuffer implements WordInput {
  /// @internal
  constructor(
    readonly sentence: Sentence,
    readonly pos: number,
    private empty: Vector
  ) {}

  static start(sentence: Sentence, model: TransitionModel) {
    return new InputBuffer(sentence, 0, model.empty)
  }

  get exhausted() { return this.pos == this.sentence.length }

  get complete() { return this.pos == this.sentence.length }

  get top() { return this.exhausted ? this.empty : this.sentence.encodings[this.pos] }

  /// Take the next word off the buffer. Returns its embedding and the
  /// remaining buffer.
  pop(): {vector: Vector, buffer: InputBuffer} {
    if (this.exhausted) throw new EmptyStructureError("Can't pop from an empty buffer")
    return {
      vector: this.sentence.embeddings[this.pos],
      buffer: new InputBuffer(this.sentence, this.pos + 1, this.empty)
    }
  }

  toString() { return this.sentence.words.slice(this.pos).join(" ") }
}

/// The words generated so far, as a persistent list. When `sentence`
/// is set, exactly its words are to be generated (the terminal is
/// replaying a known sentence). Otherwise generation may stop after
/// the first word and must stop at `maxWords`.
export class Terminal implements WordInput {
  /// @internal
  constructor(
    /// The last word's id, or -1 for the empty terminal.
    readonly word: number,
    /// The last word's text.
    readonly text: string,
    readonly prev: Terminal | null,
    readonly pos: number,
    readonly encoding: EncoderState,
    /// The sentence being generated, when known.
    readonly sentence: readonly string[] | null,
    readonly maxWords: number
  ) {}

  static start(model: TransitionModel, sentence: readonly string[] | null = null,
               maxWords: number = Limit.MaxWords) {
    let encoding = (model.terminalEncoder || topEncoder).start(model.empty)
    return new Terminal(-1, "", null, 0, encoding, sentence, maxWords)
  }

  get exhausted() { return this.pos >= (this.sentence ? this.sentence.length : this.maxWords) }

  get complete() { return this.sentence ? this.pos == this.sentence.length : this.pos > 0 }

  get top() { return this.encoding.output }

  /// Add a word. When the terminal has a known sentence, the text
  /// recorded for the word is the sentence's own, which may differ
  /// from `text` when the word maps to an unknown-word id.
  push(id: number, text: string, vector: Vector) {
    if (this.sentence) text = this.sentence[this.pos]
    return new Terminal(id, text, this, this.pos + 1, this.encoding.push(vector), this.sentence, this.maxWords)
  }

  /// The texts of the generated words, in order.
  get words(): string[] {
    let result: string[] = []
    for (let t: Terminal | null = this; t && t.prev; t = t.prev) result.push(t.text)
    return result.reverse()
  }

  toString() { return this.words.join(" ") }
}
