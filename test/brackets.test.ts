import {describe, it, expect} from "vitest"
import {readTree, readTrees, writeTree, leaves, labels, isTagged, stripTags, replaceLeaves} from "../src/brackets"

describe("bracketed trees", () => {
  it("reads a tree", () => {
    let tree = readTree("(S (NP The cat) (VP sleeps))")
    expect(tree.label).toBe("S")
    expect(tree.children.length).toBe(2)
    expect(tree.children[1]).toEqual({label: "VP", children: ["sleeps"]})
  })

  it("writes trees back in the same form", () => {
    let text = "(S (NP (DT The) (NN cat)) (VP (VBZ sleeps)) (. .))"
    expect(writeTree(readTree(text))).toBe(text)
  })

  it("handles irregular whitespace", () => {
    expect(writeTree(readTree("  (S\n  (NP  The\tcat)\n  (VP sleeps) )\n"))).toBe("(S (NP The cat) (VP sleeps))")
  })

  it("unwraps label-less outer brackets", () => {
    let trees = readTrees("( (S (NP a) (VP b)) )\n( (S (VP c)) )")
    expect(trees.map(t => writeTree(t))).toEqual(["(S (NP a) (VP b))", "(S (VP c))"])
  })

  it("reports unclosed brackets", () => {
    expect(() => readTree("(S (NP a)")).toThrow("Unclosed bracket at position 0")
  })

  it("reports empty constituents", () => {
    expect(() => readTree("(S (NP) a)")).toThrow("Empty constituent NP at position 3")
  })

  it("reports trailing text", () => {
    expect(() => readTree("(S a) b")).toThrow(SyntaxError)
  })

  it("lists leaves and labels", () => {
    let tree = readTree("(S (NP (DT The) (NN cat)) (VP (VBZ sleeps)))")
    expect(leaves(tree)).toEqual(["The", "cat", "sleeps"])
    expect(labels(tree)).toEqual(["S", "NP", "DT", "NN", "VP", "VBZ"])
    expect(labels(tree, true)).toEqual(["S", "NP", "VP"])
  })

  it("detects tagged trees", () => {
    expect(isTagged(readTree("(S (NP (DT The) (NN cat)) (VP (VBZ sleeps)))"))).toBe(true)
    expect(isTagged(readTree("(S (NP The cat) (VP sleeps))"))).toBe(false)
    expect(isTagged(readTree("(S (NP (DT The) cat))"))).toBe(false)
  })

  it("strips tags", () => {
    let tree = stripTags(readTree("(S (NP (DT The) (NN cat)) (VP (VBZ sleeps)))"))
    expect(writeTree(tree)).toBe("(S (NP The cat) (VP sleeps))")
  })

  it("replaces leaves", () => {
    let tree = replaceLeaves(readTree("(S (NP <unk> cat) (VP UNK-LC-s))"), ["A", "dog", "barks"])
    expect(writeTree(tree)).toBe("(S (NP A dog) (VP barks))")
    expect(() => replaceLeaves(tree, ["too", "few"])).toThrow(RangeError)
  })
})
