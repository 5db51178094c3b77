/// Raised when an action is applied to a parser state in which it
/// isn't legal. Decoders only offer legal actions, so running into
/// this means a decoder or scorer is wired up wrongly.
export class IllegalActionError extends Error {
  name = "IllegalActionError"

  constructor(
    /// The offending action, or `Action.None` when no action at all
    /// was legal.
    readonly action: number,
    message: string
  ) { super(message) }
}

/// Raised when popping from a stack or buffer that has nothing left
/// beyond its sentinel.
export class EmptyStructureError extends RangeError {
  name = "EmptyStructureError"
}

/// Raised when an oracle action sequence doesn't form a legal,
/// terminating derivation for its sentence.
export class MalformedOracleError extends SyntaxError {
  name = "MalformedOracleError"

  constructor(
    /// The index of the sentence the sequence belongs to, when known.
    readonly sentence: number | null,
    message: string
  ) { super(sentence == null ? message : `${message} (sentence ${sentence})`) }
}

/// Raised by the importance sampler when fewer proposal samples are
/// available for a sentence than it was configured to use.
export class SampleCountMismatchError extends RangeError {
  name = "SampleCountMismatchError"

  constructor(readonly sentence: number,
              readonly expected: number,
              readonly found: number) {
    super(`Expected ${expected} proposal samples for sentence ${sentence}, found ${found}`)
  }
}
