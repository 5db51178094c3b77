import {Tree, type NodeSet} from "@lezer/common"
import {Frame, NodeID} from "./constants"
import {EmptyStructureError} from "./error"
import {type TransitionModel, type EncoderState, type Vector, topEncoder} from "./model"

/// A parse stack. Holds the words and constituents built so far, as
/// well as the nonterminals that are still open, along with their
/// vectors and the stack encoder's state after each of them.
export class Stack {
  /// @internal
  constructor(
    readonly model: TransitionModel,
    // Holds (type << 1 | open), start position, buffer offset
    // triplets for every element on the stack. The buffer offset
    // points at the start of the element's nodes in the output
    // buffer.
    /// @internal
    readonly frames: number[],
    // One vector per frame: the word embedding, the label embedding
    // of an open nonterminal, or a composed constituent.
    /// @internal
    readonly vectors: Vector[],
    // The encoder state after each frame was pushed.
    /// @internal
    readonly encodings: EncoderState[],
    // The encoder state of the empty stack.
    /// @internal
    readonly base: EncoderState,
    /// The number of open nonterminals on the stack.
    public openCount: number,
    /// The number of words shifted (or generated) so far.
    public pos: number,
    // The output buffer. Holds (type, start, end, size) quads for the
    // words and closed constituents, in post-order, where `size` is
    // the amount of buffer array entries covered by the node.
    /// @internal
    public buffer: number[],
    // The absolute offset at which this stack's buffer starts. Content
    // before it is shared with the stack this one was split from.
    /// @internal
    public bufferBase: number,
    // The stack this was split off from, if any. Always points to a
    // stack that has buffer content below `bufferBase`, never to one
    // with an equal `bufferBase`.
    /// @internal
    public parent: Stack | null
  ) {}

  /// Create an empty stack.
  static start(model: TransitionModel) {
    let base = (model.stackEncoder || topEncoder).start(model.empty)
    return new Stack(model, [], [], [], base, 0, 0, [], 0, null)
  }

  /// The number of elements on the stack.
  get depth() { return this.frames.length / Frame.Size }

  /// The encoding of the stack's content.
  get top(): Vector {
    let last = this.encodings.length
    return (last ? this.encodings[last - 1] : this.base).output
  }

  /// Whether the stack holds a single, closed constituent.
  get finished() {
    return this.frames.length == Frame.Size && (this.frames[0] & Frame.Open) == 0
  }

  /// Whether the element at the given depth (counting from 0 at the
  /// bottom) is an open nonterminal.
  isOpen(depth: number) {
    return (this.frames[depth * Frame.Size] & Frame.Open) > 0
  }

  /// The node type of the element at the given depth.
  typeAt(depth: number) {
    return this.frames[depth * Frame.Size] >> Frame.TypeShift
  }

  /// @internal
  toString() {
    let elts = []
    for (let i = 0; i < this.depth; i++) elts.push((this.isOpen(i) ? "+" : "") + this.typeAt(i))
    return `[${elts.join(",")}]@${this.pos}`
  }

  private pushFrame(type: number, open: boolean, start: number, offset: number, vector: Vector) {
    this.frames.push((type << Frame.TypeShift) | (open ? Frame.Open : 0), start, offset)
    this.vectors.push(vector)
    let last = this.encodings.length
    this.encodings.push((last ? this.encodings[last - 1] : this.base).push(vector))
  }

  /// Open a nonterminal with the given label id.
  open(label: number) {
    this.pushFrame(NodeID.FirstLabel + label, true, this.pos, this.bufferBase + this.buffer.length,
                   this.model.embedLabel(label))
    this.openCount++
  }

  /// Push a word, given its vector, onto the stack.
  shift(vector: Vector) {
    this.pushFrame(NodeID.Word, false, this.pos, this.bufferBase + this.buffer.length, vector)
    this.buffer.push(NodeID.Word, this.pos, this.pos + 1, 4)
    this.pos++
  }

  /// Close the innermost open nonterminal, composing it with the
  /// elements above it into a single constituent. Returns the number
  /// of children of the new constituent.
  reduce() {
    let marker = this.depth - 1
    while (marker >= 0 && !this.isOpen(marker)) marker--
    if (marker < 0) throw new EmptyStructureError("No open nonterminal to reduce")
    let children = this.depth - marker - 1
    if (children == 0) throw new EmptyStructureError("Can't reduce a nonterminal without children")
    let index = marker * Frame.Size
    let type = this.typeAt(marker), start = this.frames[index + 1], offset = this.frames[index + 2]
    let vector = this.model.compose(this.vectors[marker], this.vectors.slice(marker + 1))
    this.buffer.push(type, start, this.pos, this.bufferBase + this.buffer.length + 4 - offset)
    this.frames.length = index
    this.vectors.length = this.encodings.length = marker
    this.pushFrame(type, false, start, offset, vector)
    this.openCount--
    return children
  }

  /// Remove the top element from the stack, returning its vector. This
  /// drops the element's nodes from the output buffer, and so may only
  /// be used on stacks that haven't been split.
  pop(): Vector {
    let depth = this.depth
    if (!depth) throw new EmptyStructureError("Can't pop from an empty stack")
    let index = (depth - 1) * Frame.Size
    let wasOpen = this.isOpen(depth - 1), start = this.frames[index + 1], offset = this.frames[index + 2]
    let vector = this.vectors[depth - 1]
    this.frames.length = index
    this.vectors.length = this.encodings.length = depth - 1
    if (wasOpen) this.openCount--
    if (offset >= this.bufferBase) {
      this.buffer.length = offset - this.bufferBase
    } else {
      this.buffer = []
      this.bufferBase = offset
      while (this.parent && offset <= this.parent.bufferBase) this.parent = this.parent.parent
    }
    if (!wasOpen) this.pos = start
    return vector
  }

  /// Create a copy of this stack that shares its output buffer content
  /// so far. The original stack should only be extended (never popped)
  /// after this.
  split() {
    let parent: Stack | null = this, base = this.bufferBase + this.buffer.length
    while (parent && base == parent.bufferBase) parent = parent.parent
    return new Stack(this.model, this.frames.slice(), this.vectors.slice(), this.encodings.slice(), this.base,
                     this.openCount, this.pos, [], base, parent)
  }

  /// Build a tree from the stack's output buffer. The result has a
  /// `Sentence` top node holding the stack's closed elements.
  toTree(nodeSet: NodeSet): Tree {
    return Tree.build({buffer: this.nodeBuffer(), nodeSet, topID: NodeID.Top, length: this.pos})
  }

  // The post-order node buffer, with the content shared with the
  // stacks this one was split from prepended.
  private nodeBuffer(): number[] {
    let parts: number[][] = [], end = this.bufferBase + this.buffer.length
    for (let stack: Stack | null = this; stack; stack = stack.parent) {
      parts.push(stack.buffer.slice(0, end - stack.bufferBase))
      end = stack.bufferBase
    }
    return parts.reverse().flat()
  }
}
