/// A tree read from bracketed text. Leaves are plain strings.
export interface BracketTree {
  label: string
  children: (BracketTree | string)[]
}

const enum Ch { Open = 40, Close = 41 }

function isSpace(ch: number) {
  return ch == 32 || ch == 9 || ch == 10 || ch == 13 || ch == 12 || ch == 11 || ch == 0xa0
}

class BracketReader {
  pos = 0

  constructor(readonly text: string) {}

  get next() { return this.pos < this.text.length ? this.text.charCodeAt(this.pos) : -1 }

  skipSpace() {
    while (this.pos < this.text.length && isSpace(this.text.charCodeAt(this.pos))) this.pos++
  }

  raise(message: string): never {
    throw new SyntaxError(`${message} at position ${this.pos}`)
  }

  atom() {
    let start = this.pos
    for (;;) {
      let next = this.next
      if (next < 0 || next == Ch.Open || next == Ch.Close || isSpace(next)) break
      this.pos++
    }
    return this.text.slice(start, this.pos)
  }

  tree(): BracketTree {
    if (this.next != Ch.Open) this.raise("Expected '('")
    let start = this.pos++
    this.skipSpace()
    let label = this.next == Ch.Open ? "" : this.atom()
    let children: (BracketTree | string)[] = []
    for (;;) {
      this.skipSpace()
      let next: number = this.next
      if (next == Ch.Close) { this.pos++; break }
      if (next < 0) { this.pos = start; this.raise("Unclosed bracket") }
      children.push(next == Ch.Open ? this.tree() : this.atom())
    }
    if (!children.length) { this.pos = start; this.raise(`Empty constituent${label ? " " + label : ""}`) }
    if (!label) {
      let [only] = children
      if (children.length > 1 || typeof only == "string") { this.pos = start; this.raise("Unlabeled constituent") }
      return only
    }
    return {label, children}
  }
}

/// Read a sequence of bracketed trees, such as the contents of a
/// treebank file. An outer bracket without a label, as in
/// `( (S ...) )`, is unwrapped.
export function readTrees(text: string): BracketTree[] {
  let reader = new BracketReader(text), result: BracketTree[] = []
  for (;;) {
    reader.skipSpace()
    if (reader.next < 0) return result
    result.push(reader.tree())
  }
}

/// Read a single bracketed tree.
export function readTree(text: string): BracketTree {
  let reader = new BracketReader(text)
  reader.skipSpace()
  let tree = reader.tree()
  reader.skipSpace()
  if (reader.next >= 0) reader.raise("Unexpected text after tree")
  return tree
}

/// The words at the leaves of a tree, left to right.
export function leaves(tree: BracketTree): string[] {
  let result: string[] = []
  let scan = (node: BracketTree) => {
    for (let child of node.children) {
      if (typeof child == "string") result.push(child)
      else scan(child)
    }
  }
  scan(tree)
  return result
}

function isPreterminal(node: BracketTree) {
  return node.children.length == 1 && typeof node.children[0] == "string"
}

/// Check whether every leaf in the tree is the only child of its
/// parent, in which case those parents are part-of-speech tags.
export function isTagged(tree: BracketTree): boolean {
  for (let child of tree.children) {
    if (typeof child == "string") return isPreterminal(tree)
    if (!isTagged(child)) return false
  }
  return true
}

/// The nonterminal labels in a tree, in pre-order, with repeats.
/// When `tagged` is true, preterminals below the root are skipped.
export function labels(tree: BracketTree, tagged = false): string[] {
  let result: string[] = []
  let scan = (node: BracketTree) => {
    if (tagged && node != tree && isPreterminal(node)) return
    result.push(node.label)
    for (let child of node.children) if (typeof child != "string") scan(child)
  }
  scan(tree)
  return result
}

/// Remove the preterminals from a tagged tree, attaching their words
/// directly to the grandparent.
export function stripTags(tree: BracketTree): BracketTree {
  return {
    label: tree.label,
    children: tree.children.map(child => {
      if (typeof child == "string") return child
      let [word] = child.children
      return isPreterminal(child) && typeof word == "string" ? word : stripTags(child)
    })
  }
}

/// Replace the leaves of a tree, left to right, by the given words.
export function replaceLeaves(tree: BracketTree, words: readonly string[]): BracketTree {
  let count = leaves(tree).length
  if (count != words.length)
    throw new RangeError(`Tree has ${count} leaves, but ${words.length} words were given`)
  let i = 0
  let rebuild = (node: BracketTree): BracketTree => ({
    label: node.label,
    children: node.children.map(child => typeof child == "string" ? words[i++] : rebuild(child))
  })
  return rebuild(tree)
}

/// Write a tree in single-line bracketed form.
export function writeTree(tree: BracketTree | string): string {
  if (typeof tree == "string") return tree
  return `(${tree.label} ${tree.children.map(writeTree).join(" ")})`
}
