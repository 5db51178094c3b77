import {NodeSet, NodeType} from "@lezer/common"
import {NodeID} from "./constants"
import {type BracketTree, leaves, labels} from "./brackets"

/// The word every vocabulary contains, standing in for words that
/// neither occur in it nor have a known signature.
export const UNK = "<unk>"

/// Maps words and nonterminal labels to the integer ids that scorers
/// and embeddings work with, and back.
export class Vocabulary {
  /// The words, indexed by id. Always starts with `UNK`.
  readonly words: readonly string[]
  private wordIDs = new Map<string, number>()
  private labelIDs = new Map<string, number>()
  private cachedNodeSet: NodeSet | null = null

  constructor(words: readonly string[],
              /// The nonterminal labels, indexed by id.
              readonly labels: readonly string[]) {
    this.words = words.includes(UNK) ? words : [UNK, ...words]
    this.words.forEach((word, i) => { if (!this.wordIDs.has(word)) this.wordIDs.set(word, i) })
    labels.forEach((label, i) => {
      if (this.labelIDs.has(label)) throw new RangeError(`Duplicate label ${label}`)
      this.labelIDs.set(label, i)
    })
  }

  /// Build a vocabulary from the words and labels that appear in a
  /// set of trees. Words seen fewer than `minCount` times are left
  /// out, but their unknown-word signatures are added instead.
  /// Preterminal tags are not collected as labels when `tagged` is
  /// true.
  static fromTrees(trees: readonly BracketTree[], {minCount = 1, tagged = false}: {
    minCount?: number,
    tagged?: boolean
  } = {}) {
    let counts = new Map<string, number>(), labelSet = new Set<string>()
    for (let tree of trees) {
      for (let word of leaves(tree)) counts.set(word, (counts.get(word) || 0) + 1)
      for (let label of labels(tree, tagged)) labelSet.add(label)
    }
    let words: string[] = [], seen = new Set<string>()
    let add = (word: string) => { if (!seen.has(word)) { seen.add(word); words.push(word) } }
    let known = (word: string) => (counts.get(word) || 0) >= minCount
    for (let [word, count] of counts) add(count >= minCount ? word : unkSignature(word, known))
    return new Vocabulary(words, [...labelSet])
  }

  /// The id of a word. Unknown words are mapped to their signature
  /// when that is in the vocabulary, and to `UNK` otherwise.
  wordID(word: string): number {
    let id = this.wordIDs.get(word)
    if (id != null) return id
    let signature = this.wordIDs.get(unkSignature(word, w => this.wordIDs.has(w)))
    return signature == null ? 0 : signature
  }

  /// The word with the given id.
  word(id: number): string {
    if (id < 0 || id >= this.words.length) throw new RangeError(`Invalid word id ${id}`)
    return this.words[id]
  }

  /// The id of a label, or -1 when it isn't in the vocabulary.
  labelID(label: string): number {
    let id = this.labelIDs.get(label)
    return id == null ? -1 : id
  }

  /// The label with the given id.
  label(id: number): string {
    if (id < 0 || id >= this.labels.length) throw new RangeError(`Invalid label id ${id}`)
    return this.labels[id]
  }

  /// The node types used by the trees built over this vocabulary: an
  /// error type, the `Sentence` top node, `Word` leaves, and one type
  /// per label.
  get nodeSet(): NodeSet {
    if (!this.cachedNodeSet) {
      let types = [
        NodeType.define({id: NodeID.Err, name: "⚠", error: true}),
        NodeType.define({id: NodeID.Top, name: "Sentence", top: true}),
        NodeType.define({id: NodeID.Word, name: "Word"})
      ]
      this.labels.forEach((name, i) => types.push(NodeType.define({id: NodeID.FirstLabel + i, name})))
      this.cachedNodeSet = new NodeSet(types)
    }
    return this.cachedNodeSet
  }
}

const suffixes = ["ed", "ing", "ion", "er", "est", "ly", "ity", "y", "al"]

/// Compute the unknown-word signature of a word, based on its
/// capitalization, digits, dashes, and suffix (for example
/// `UNK-INITC-KNOWNLC` or `UNK-LC-ing`). `known` is used to check
/// whether the lowercased form of a capitalized word is known.
export function unkSignature(word: string, known: (word: string) => boolean = () => false): string {
  word = word.trimEnd()
  let caps = 0, hasDigit = false, hasDash = false, hasLower = false
  for (let ch of word) {
    if (/\d/.test(ch)) hasDigit = true
    else if (ch == "-") hasDash = true
    else if (/\p{Ll}/u.test(ch)) hasLower = true
    else if (/\p{Lu}/u.test(ch)) caps++
  }
  let signature = "UNK", lower = word.toLowerCase(), first = word.charAt(0)
  if (/\p{Lu}/u.test(first)) {
    if (caps == 1) {
      signature += "-INITC"
      if (known(lower)) signature += "-KNOWNLC"
    } else {
      signature += "-CAPS"
    }
  } else if (!/\p{L}/u.test(first) && caps > 0) {
    signature += "-CAPS"
  } else if (hasLower) {
    signature += "-LC"
  }
  if (hasDigit) signature += "-NUM"
  if (hasDash) signature += "-DASH"
  if (lower.endsWith("s") && lower.length >= 3) {
    let before = lower.charAt(lower.length - 2)
    if (before != "s" && before != "i" && before != "u") signature += "-s"
  } else if (lower.length >= 5 && !hasDash && !(hasDigit && caps > 0)) {
    let suffix = suffixes.find(s => lower.endsWith(s))
    if (suffix) signature += "-" + suffix
  }
  return signature
}
