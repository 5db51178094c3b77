import {Action, Limit, NodeID} from "./constants"
import {IllegalActionError, MalformedOracleError} from "./error"
import {actionKind, actionValue, flatIndex, formatAction} from "./action"
import {Stack} from "./stack"
import {Sentence, InputBuffer, Terminal} from "./buffer"
import {History} from "./history"
import {ParseTree} from "./tree"
import type {TransitionModel, Vector} from "./model"
import type {Vocabulary} from "./vocab"

/// The parts of a parser state that go into its representation.
export type Component = "stack" | "buffer" | "history"

/// Configuration options for a [`TransitionParser`](#TransitionParser).
export interface ParserConfig {
  /// The maximum number of nonterminals that may be open at the same
  /// time. Defaults to 100.
  maxOpen?: number
  /// The maximum number of words generated when sampling sentences
  /// from a generative model. Defaults to 100.
  maxWords?: number
  /// The order in which the stack, input and history encodings are
  /// concatenated to form a state's representation. Defaults to
  /// `["stack", "buffer", "history"]`.
  order?: readonly Component[]
}

const defaultOrder: readonly Component[] = ["stack", "buffer", "history"]

/// Ties a vocabulary and a model together into a transition system,
/// and creates the parser states that decoders work on.
export class TransitionParser {
  /// @internal
  readonly maxOpen: number
  /// @internal
  readonly maxWords: number
  /// @internal
  readonly order: readonly Component[]

  constructor(
    readonly vocab: Vocabulary,
    readonly model: TransitionModel,
    readonly config: ParserConfig = {}
  ) {
    this.maxOpen = config.maxOpen ?? Limit.MaxOpen
    this.maxWords = config.maxWords ?? Limit.MaxWords
    if (this.maxOpen < 1) throw new RangeError(`maxOpen must be at least 1, got ${this.maxOpen}`)
    if (this.maxWords < 1) throw new RangeError(`maxWords must be at least 1, got ${this.maxWords}`)
    let order = config.order || defaultOrder
    if (!order.length || new Set(order).size != order.length)
      throw new RangeError(`Invalid representation order ${order.join(", ")}`)
    this.order = order
  }

  /// Create a copy of this parser with some of its configuration
  /// replaced.
  configure(config: ParserConfig) {
    return new TransitionParser(this.vocab, this.model, {...this.config, ...config})
  }

  /// Look up and encode the words of a sentence.
  prepare(words: readonly string[]) {
    return Sentence.prepare(words, this.vocab, this.model)
  }

  /// Create the initial discriminative state for a sentence.
  start(words: readonly string[] | Sentence): ParserState {
    let sentence = words instanceof Sentence ? words : this.prepare(words)
    if (!sentence.length) throw new RangeError("Can't parse an empty sentence")
    return new ParserState(this, Stack.start(this.model), InputBuffer.start(sentence, this.model),
                           History.start(this.model), 0)
  }

  /// Create the initial generative state. When `words` is given, the
  /// state generates exactly that sentence; otherwise it may generate
  /// any sentence of up to `maxWords` words.
  startGenerative(words: readonly string[] | null = null): ParserState {
    if (words && !words.length) throw new RangeError("Can't generate an empty sentence")
    return new ParserState(this, Stack.start(this.model), Terminal.start(this.model, words, this.maxWords),
                           History.start(this.model), 0)
  }

  /// Run a discriminative action sequence over a sentence, returning
  /// the finished state. Raises a `MalformedOracleError` when the
  /// sequence doesn't form a complete derivation.
  replay(words: readonly string[], actions: readonly number[], index: number | null = null): ParserState {
    return this.run(this.start(words), actions, index)
  }

  /// Run a generative action sequence, constrained to generate the
  /// given sentence.
  replayGenerative(words: readonly string[], actions: readonly number[], index: number | null = null): ParserState {
    return this.run(this.startGenerative(words), actions, index)
  }

  private run(state: ParserState, actions: readonly number[], index: number | null) {
    for (let i = 0; i < actions.length; i++) {
      let action = actions[i]
      if (!state.canApply(action))
        throw new MalformedOracleError(index, `Illegal action ${formatAction(action, this.vocab)} at step ${i}`)
      state.apply(action)
    }
    if (!state.finished)
      throw new MalformedOracleError(index, `Action sequence ends before the parse is finished (${state})`)
    return state
  }
}

/// A parser state: stack, input (a buffer for discriminative parsing,
/// a terminal for generative parsing), action history, and the
/// log-probability of the actions taken so far.
///
/// `apply` updates the state in place. Use `split` to fork a state
/// that should be continued in more than one way.
export class ParserState {
  /// @internal
  constructor(
    readonly parser: TransitionParser,
    /// @internal
    readonly stack: Stack,
    /// The input side of the state.
    public input: InputBuffer | Terminal,
    /// @internal
    public history: History,
    /// The log-probability of the actions taken so far, as accumulated
    /// by the decoder.
    public score: number
  ) {}

  /// Whether this state generates its words.
  get generative() { return this.input instanceof Terminal }

  /// Whether the parse is complete.
  get finished() { return this.stack.finished }

  /// The words consumed or generated so far.
  get words(): readonly string[] {
    return this.input instanceof Terminal ? this.input.words : this.input.sentence.words.slice(0, this.input.pos)
  }

  /// The actions applied so far.
  get actions() { return this.history.actions }

  /// Whether a word may be shifted (or generated) next.
  get canConsume() {
    return !this.finished && !this.input.exhausted && this.stack.openCount >= 1
  }

  /// Whether a nonterminal may be opened next.
  get canOpen() {
    return !this.finished && !this.input.exhausted && this.stack.openCount < this.parser.maxOpen
  }

  /// Whether the innermost open nonterminal may be closed next.
  get canReduce() {
    let open = this.stack.openCount
    return !this.finished && actionKind(this.history.last) != Action.Open && open >= 1 && (open >= 2 || this.input.complete)
  }

  /// The legal action slots, indexed by `Slot`.
  legalSlots(): boolean[] {
    return [this.canConsume, this.canReduce, this.canOpen]
  }

  /// Check whether an action can be applied to this state. SHIFT is
  /// never legal in a generative state, GEN never in a discriminative
  /// one. When a generative state replays a known sentence, only GEN
  /// of the next word's id is legal.
  canApply(action: number) {
    if (action < 0) return false
    let value = actionValue(action)
    switch (actionKind(action)) {
      case Action.Shift: return value == 0 && !this.generative && this.canConsume
      case Action.Reduce: return value == 0 && this.canReduce
      case Action.Open: return value < this.parser.vocab.labels.length && this.canOpen
      default: {
        if (!this.generative || value >= this.parser.vocab.words.length || !this.canConsume) return false
        let input = this.input
        return !(input instanceof Terminal && input.sentence) || value == this.parser.vocab.wordID(input.sentence[input.pos])
      }
    }
  }

  /// Apply an action. Raises `IllegalActionError` when the action
  /// isn't legal in this state.
  apply(action: number) {
    if (!this.canApply(action))
      throw new IllegalActionError(action, `Illegal action ${formatAction(action, this.parser.vocab)} in state ${this}`)
    let {model, vocab} = this.parser, input = this.input
    switch (actionKind(action)) {
      case Action.Shift:
        if (input instanceof InputBuffer) {
          let {vector, buffer} = input.pop()
          this.stack.shift(vector)
          this.input = buffer
        }
        break
      case Action.Reduce:
        this.stack.reduce()
        break
      case Action.Open:
        this.stack.open(actionValue(action))
        break
      default:
        if (input instanceof Terminal) {
          let id = actionValue(action), vector = model.embedWord(id)
          this.stack.shift(vector)
          this.input = input.push(id, vocab.word(id), vector)
        }
    }
    this.history = this.history.push(action, model.embedAction(flatIndex(action, vocab.labels.length)))
  }

  /// The representation of this state that scorers score: the stack,
  /// input and history encodings, concatenated in the configured
  /// order.
  representation(): Vector {
    let result: number[] = []
    for (let part of this.parser.order)
      result.push(...(part == "stack" ? this.stack.top : part == "buffer" ? this.input.top : this.history.top))
    return result
  }

  /// Create an independent copy of this state.
  split() {
    return new ParserState(this.parser, this.stack.split(), this.input, this.history, this.score)
  }

  /// Build the tree for a finished state.
  toTree(): ParseTree {
    if (!this.finished) throw new RangeError(`Can't build a tree from an unfinished parse (${this})`)
    return new ParseTree(this.stack.toTree(this.parser.vocab.nodeSet), this.words)
  }

  toString() {
    let labels = this.parser.vocab.labels, parts = []
    for (let i = 0; i < this.stack.depth; i++) {
      let type = this.stack.typeAt(i)
      parts.push(type < NodeID.FirstLabel ? "w" : (this.stack.isOpen(i) ? "(" : "") + labels[type - NodeID.FirstLabel])
    }
    return `[${parts.join(" ")}]@${this.input.pos}${this.score ? "!" + this.score.toFixed(3) : ""}`
  }
}
