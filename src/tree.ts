import type {Tree, SyntaxNode} from "@lezer/common"
import {NodeID} from "./constants"
import type {BracketTree} from "./brackets"

/// A finished parse: a tree whose `Sentence` top node wraps the root
/// constituent, together with the words its `Word` leaves refer to.
/// Leaves span a single token position, so a leaf's `from` is the
/// index of its word.
export class ParseTree {
  constructor(readonly tree: Tree, readonly words: readonly string[]) {}

  /// The root constituent.
  get root(): SyntaxNode | null { return this.tree.topNode.firstChild }

  /// Write the tree in bracketed form, as in `(S (NP The cat) (VP
  /// sleeps))`. When `tag` is given, every word is wrapped in a
  /// preterminal with that label.
  linearize(tag: string | null = null): string {
    let parts: string[] = []
    this.tree.iterate({
      enter: node => {
        if (node.type.id == NodeID.Top) return
        if (node.type.id == NodeID.Word) {
          let word = this.words[node.from]
          parts.push(tag ? `(${tag} ${word})` : word)
          return false
        }
        parts.push("(" + node.name)
      },
      leave: node => {
        if (node.type.id != NodeID.Top && node.type.id != NodeID.Word) parts[parts.length - 1] += ")"
      }
    })
    return parts.join(" ")
  }

  /// Convert to a plain bracketed tree structure.
  toBracketTree(): BracketTree | null {
    let stack: BracketTree[] = [{label: "", children: []}]
    this.tree.iterate({
      enter: node => {
        let parent = stack[stack.length - 1]
        if (node.type.id == NodeID.Top) return
        if (node.type.id == NodeID.Word) {
          parent.children.push(this.words[node.from])
          return false
        }
        let tree: BracketTree = {label: node.name, children: []}
        parent.children.push(tree)
        stack.push(tree)
      },
      leave: node => {
        if (node.type.id != NodeID.Top && node.type.id != NodeID.Word) stack.pop()
      }
    })
    let [root] = stack[0].children
    return root && typeof root != "string" ? root : null
  }

  toString() { return this.linearize() }
}
