// Transition actions are represented as numbers. The low two bits
// hold the kind of action, the remaining bits the label id (for
// opens) or word id (for generated words).
export const enum Action {
  KindMask = 3,
  ValueShift = 2,
  // Kinds. `Shift` and `Reduce` carry no value, so they double as the
  // complete action.
  Shift = 0,
  Reduce = 1,
  Open = 2,
  Gen = 3,
  // Seeds every history, so that the last action is always defined.
  None = -1
}

// Scorers see three action slots. Slot 0 consumes a word: it is
// SHIFT for discriminative parsing and GEN for generative parsing.
export const enum Slot {
  Consume = 0,
  Reduce = 1,
  Open = 2,
  Count = 3
}

// Node type ids in the trees produced by the parser. Nonterminal
// labels are allocated from `FirstLabel` on, in vocabulary order.
export const enum NodeID {
  Err = 0,
  Top = 1,
  Word = 2,
  FirstLabel = 3
}

// Stack frames store their node type shifted left by one, with the
// low bit set for frames that are still open nonterminals.
export const enum Frame {
  Open = 1,
  TypeShift = 1,
  // Every frame takes up this many entries in `Stack.frames`
  Size = 3
}

export const enum Limit {
  // The maximum number of simultaneously open nonterminals
  MaxOpen = 100,
  // The maximum sentence length for unconditional generation
  MaxWords = 100
}
