import {Action, Slot} from "./constants"
import {MalformedOracleError} from "./error"
import {type BracketTree, isTagged} from "./brackets"
import type {Vocabulary} from "./vocab"

/// The action that opens a nonterminal with the given label id.
export function openAction(label: number) { return (label << Action.ValueShift) | Action.Open }

/// The action that generates the word with the given id.
export function genAction(word: number) { return (word << Action.ValueShift) | Action.Gen }

export function actionKind(action: number) { return action & Action.KindMask }

/// The label or word id carried by an action.
export function actionValue(action: number) { return action >> Action.ValueShift }

/// The scorer slot an action falls in.
export function actionSlot(action: number): Slot {
  let kind = actionKind(action)
  return kind == Action.Reduce ? Slot.Reduce : kind == Action.Open ? Slot.Open : Slot.Consume
}

/// The index of an action in a flat enumeration of all actions, used
/// to look up action embeddings: SHIFT, REDUCE, then one entry per
/// label, then one per word.
export function flatIndex(action: number, labelCount: number) {
  switch (actionKind(action)) {
    case Action.Shift: return 0
    case Action.Reduce: return 1
    case Action.Open: return 2 + actionValue(action)
    default: return 2 + labelCount + actionValue(action)
  }
}

/// Render an action in oracle token form (`SHIFT`, `REDUCE`,
/// `NT(S)`, `GEN(cat)`). Ids outside the vocabulary are written as
/// `#id`.
export function formatAction(action: number, vocab: Vocabulary): string {
  if (action < 0) return "NONE"
  let value = actionValue(action)
  switch (actionKind(action)) {
    case Action.Shift: return "SHIFT"
    case Action.Reduce: return "REDUCE"
    case Action.Open: return `NT(${value < vocab.labels.length ? vocab.label(value) : "#" + value})`
    default: return `GEN(${value < vocab.words.length ? vocab.word(value) : "#" + value})`
  }
}

/// Parse an oracle token. Generated words go through the
/// vocabulary's unknown-word mapping; unknown labels are an error.
export function parseAction(token: string, vocab: Vocabulary): number {
  if (token == "SHIFT") return Action.Shift
  if (token == "REDUCE") return Action.Reduce
  let m = /^(NT|GEN)\((.+)\)$/.exec(token)
  if (m) {
    if (m[1] == "GEN") return genAction(vocab.wordID(m[2]))
    let label = vocab.labelID(m[2])
    if (label < 0) throw new MalformedOracleError(null, `Unknown label ${m[2]}`)
    return openAction(label)
  }
  throw new MalformedOracleError(null, `Invalid action ${JSON.stringify(token)}`)
}

/// Parse a whitespace-separated sequence of oracle tokens.
export function parseOracle(text: string, vocab: Vocabulary): number[] {
  return text.split(/\s+/).filter(t => t).map(t => parseAction(t, vocab))
}

export function formatOracle(actions: readonly number[], vocab: Vocabulary): string {
  return actions.map(a => formatAction(a, vocab)).join(" ")
}

function derive(tree: BracketTree, vocab: Vocabulary, tagged: boolean, word: (text: string) => number) {
  let actions: number[] = []
  let scan = (node: BracketTree) => {
    if (tagged && node != tree && node.children.length == 1 && typeof node.children[0] == "string") {
      actions.push(word(node.children[0]))
      return
    }
    let label = vocab.labelID(node.label)
    if (label < 0) throw new MalformedOracleError(null, `Unknown label ${node.label}`)
    actions.push(openAction(label))
    for (let child of node.children) {
      if (typeof child == "string") actions.push(word(child))
      else scan(child)
    }
    actions.push(Action.Reduce)
  }
  scan(tree)
  return actions
}

/// Compute the discriminative action sequence that builds the given
/// tree. In a tagged tree, preterminals are not opened; their words
/// are shifted directly.
export function oracle(tree: BracketTree, vocab: Vocabulary, tagged = isTagged(tree)): number[] {
  return derive(tree, vocab, tagged, () => Action.Shift)
}

/// Compute the generative action sequence for a tree, in which every
/// SHIFT is replaced by generating the word at that position.
export function generativeOracle(tree: BracketTree, vocab: Vocabulary, tagged = isTagged(tree)): number[] {
  return derive(tree, vocab, tagged, w => genAction(vocab.wordID(w)))
}
