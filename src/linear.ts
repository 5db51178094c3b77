import {Slot} from "./constants"
import {seededRandom} from "./math"
import type {TransitionModel, GenerativeScorer, Vector} from "./model"

/// The serialized form of a [`LinearModel`](#LinearModel). Matrices
/// are stored as arrays of rows.
export type LinearModelJSON = {
  dim: number
  words: number[][]
  labels: number[][]
  /// One embedding per action, by flat action index.
  actions: number[][]
  actionWeights: number[][]
  actionBias: number[]
  labelWeights: number[][]
  labelBias: number[]
  wordWeights: number[][]
  wordBias: number[]
}

function matVec(weights: readonly (readonly number[])[], bias: readonly number[], input: Vector): number[] {
  let out: number[] = []
  for (let r = 0; r < weights.length; r++) {
    let row = weights[r], score = bias[r]
    if (row.length != input.length)
      throw new RangeError(`Representation has ${input.length} dimensions, expected ${row.length}`)
    for (let i = 0; i < row.length; i++) score += row[i] * input[i]
    out.push(score)
  }
  return out
}

function lookup(table: readonly Vector[], id: number, what: string): Vector {
  if (id < 0 || id >= table.length) throw new RangeError(`No ${what} embedding for id ${id}`)
  return table[id]
}

/// A small log-linear model. Words, labels and actions are embedded by
/// table lookup, constituents are composed by averaging, the three
/// structures are encoded by their top element, and scores are affine
/// functions of a state's representation.
export class LinearModel implements TransitionModel, GenerativeScorer {
  readonly empty: Vector

  constructor(readonly params: LinearModelJSON) {
    let zero: number[] = []
    for (let i = 0; i < params.dim; i++) zero.push(0)
    this.empty = zero
  }

  embedWord(id: number) { return lookup(this.params.words, id, "word") }
  embedLabel(id: number) { return lookup(this.params.labels, id, "label") }
  embedAction(index: number) { return lookup(this.params.actions, index, "action") }

  compose(label: Vector, children: readonly Vector[]): Vector {
    let out = label.slice()
    for (let child of children) for (let i = 0; i < out.length; i++) out[i] += child[i]
    return out.map(v => v / (children.length + 1))
  }

  scoreActions(representation: Vector) {
    return matVec(this.params.actionWeights, this.params.actionBias, representation)
  }

  scoreLabels(representation: Vector) {
    return matVec(this.params.labelWeights, this.params.labelBias, representation)
  }

  scoreWords(representation: Vector) {
    return matVec(this.params.wordWeights, this.params.wordBias, representation)
  }

  toJSON(): LinearModelJSON { return this.params }

  /// Create a model with parameters drawn uniformly from [-1, 1),
  /// deterministically from `seed`. `parts` is the number of encodings
  /// that go into a state's representation.
  static random({words, labels, dim = 8, parts = 3}: {
    words: number,
    labels: number,
    dim?: number,
    parts?: number
  }, seed = 1) {
    let random = seededRandom(seed)
    let matrix = (rows: number, cols: number) => {
      let m: number[][] = []
      for (let r = 0; r < rows; r++) {
        let row: number[] = []
        for (let c = 0; c < cols; c++) row.push(random() * 2 - 1)
        m.push(row)
      }
      return m
    }
    let repr = dim * parts
    return new LinearModel({
      dim,
      words: matrix(words, dim),
      labels: matrix(labels, dim),
      actions: matrix(2 + labels + words, dim),
      actionWeights: matrix(Slot.Count, repr),
      actionBias: matrix(1, Slot.Count)[0],
      labelWeights: matrix(labels, repr),
      labelBias: matrix(1, labels)[0],
      wordWeights: matrix(words, repr),
      wordBias: matrix(1, words)[0]
    })
  }

  /// Load a model from its JSON form, checking its shape.
  static fromJSON(value: unknown): LinearModel {
    if (typeof value != "object" || value == null) throw new RangeError("Model must be an object")
    let obj: object = value
    let field = (name: string): unknown => {
      let desc = Object.getOwnPropertyDescriptor(obj, name)
      if (!desc) throw new RangeError(`Model is missing field ${name}`)
      return desc.value
    }
    let dim = field("dim")
    if (typeof dim != "number" || !Number.isInteger(dim) || dim < 1) throw new RangeError("Invalid model dimension")
    let vector = (v: unknown, name: string, length: number | null): number[] => {
      if (!Array.isArray(v) || (length != null && v.length != length))
        throw new RangeError(`Field ${name} must be an array${length == null ? "" : " of length " + length}`)
      let out: number[] = []
      for (let x of v) {
        if (typeof x != "number") throw new RangeError(`Field ${name} must hold numbers`)
        out.push(x)
      }
      return out
    }
    let matrix = (name: string, cols: number | null): number[][] => {
      let v = field(name)
      if (!Array.isArray(v)) throw new RangeError(`Field ${name} must be an array`)
      return v.map((row, i) => vector(row, `${name}[${i}]`, cols))
    }
    let words = matrix("words", dim), labels = matrix("labels", dim)
    let actionWeights = matrix("actionWeights", null)
    if (actionWeights.length != Slot.Count) throw new RangeError(`Field actionWeights must have ${Slot.Count} rows`)
    let repr = actionWeights[0].length
    let labelWeights = matrix("labelWeights", repr), wordWeights = matrix("wordWeights", repr)
    if (labelWeights.length != labels.length) throw new RangeError("Field labelWeights must have one row per label")
    if (wordWeights.length != words.length) throw new RangeError("Field wordWeights must have one row per word")
    let actions = matrix("actions", dim)
    if (actions.length != 2 + labels.length + words.length)
      throw new RangeError("Field actions must have one row per action")
    return new LinearModel({
      dim, words, labels, actions,
      actionWeights, actionBias: vector(field("actionBias"), "actionBias", Slot.Count),
      labelWeights, labelBias: vector(field("labelBias"), "labelBias", labels.length),
      wordWeights, wordBias: vector(field("wordBias"), "wordBias", words.length)
    })
  }
}
