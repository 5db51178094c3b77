import {describe, it, expect} from "vitest"
import {mkdtempSync, writeFileSync, rmSync} from "node:fs"
import {tmpdir} from "node:os"
import {join} from "node:path"
import {TransitionParser} from "../src/parse"
import {SamplingDecoder} from "../src/decoder"
import {ImportanceSampler, DecoderProposal, FileProposal} from "../src/importance"
import {type Sample, readSamples, loadSamples, formatSample, formatSamples} from "../src/samples"
import {readTree} from "../src/brackets"
import {oracle} from "../src/action"
import {LinearModel} from "../src/linear"
import {seededRandom} from "../src/math"
import {MalformedOracleError, SampleCountMismatchError} from "../src/error"
import {Action} from "../src/constants"
import {words, vocab, gold, flatScorer} from "./helpers"

let model = LinearModel.random({words: vocab.words.length, labels: vocab.labels.length, dim: 4}, 5)
let parser = new TransitionParser(vocab, model, {maxOpen: 3})

const sampleFile = `0 ||| -1.5 ||| (S (NP The cat) (VP sleeps))
0 ||| -0.5 ||| (S The cat sleeps)

0 ||| -1.5 ||| (S (NP The cat) (VP sleeps))
1 ||| -2 ||| (S (VP Dogs bark))
`

// Joint log-probabilities under `flatScorer`, which spreads the
// probability evenly over the legal slots, the three labels, and the
// four words.
const flatJoint = -Math.log(3) - 3 * Math.log(2) - 3 * Math.log(4)
const nestedJoint = -5 * Math.log(3) - 4 * Math.log(2) - 3 * Math.log(4)

describe("ImportanceSampler", () => {
  it("recovers the exact probability when the proposal matches the model", () => {
    let proposal = new DecoderProposal(new SamplingDecoder(parser, flatScorer, {random: seededRandom(7)}))
    let sampler = new ImportanceSampler(parser, flatScorer, proposal, {samples: 6})
    expect(sampler.logProb(words)).toBeCloseTo(-3 * Math.log(4), 10)
    expect(sampler.perplexity(words)).toBeCloseTo(4, 8)
    expect(sampler.corpusPerplexity([words, ["cat", "sleeps"]])).toBeCloseTo(4, 8)
  })

  it("scores action sequences", () => {
    let sampler = new ImportanceSampler(parser, flatScorer, new FileProposal(new Map<number, Sample[]>(), vocab))
    expect(sampler.score(words, oracle(readTree("(S The cat sleeps)"), vocab, false))).toBeCloseTo(flatJoint, 10)
    expect(sampler.score(words, gold)).toBeCloseTo(nestedJoint, 10)
    expect(() => sampler.score(words, gold.slice(0, 4), 3)).toThrow(MalformedOracleError)
    expect(() => sampler.score(words, [Action.Shift])).toThrow("Illegal action SHIFT at step 0")
  })

  it("picks the most probable tree among file samples", () => {
    let sampler = new ImportanceSampler(parser, flatScorer, new FileProposal(readSamples(sampleFile), vocab), {samples: 3})
    let best = sampler.mapTree(words)
    expect(best.tree.linearize()).toBe("(S The cat sleeps)")
    expect(best.logProb).toBeCloseTo(flatJoint, 10)
    expect(sampler.scoredSamples(words, 0).length).toBe(3)
    expect(sampler.scoredSamples(words, 0, {unique: true}).map(s => s.tree.linearize()))
      .toEqual(["(S (NP The cat) (VP sleeps))", "(S The cat sleeps)"])
  })

  it("estimates sentence probabilities from file samples", () => {
    let sampler = new ImportanceSampler(parser, flatScorer, new FileProposal(readSamples(sampleFile), vocab), {samples: 3})
    let expected = Math.log((2 * Math.exp(nestedJoint + 1.5) + Math.exp(flatJoint + 0.5)) / 3)
    expect(sampler.logProb(words)).toBeCloseTo(expected, 10)
  })

  it("puts the sentence's own words into file samples", () => {
    let sampler = new ImportanceSampler(parser, flatScorer, new FileProposal(readSamples(sampleFile), vocab), {samples: 1})
    let [sample] = sampler.scoredSamples(["Cats", "purr"], 1)
    expect(sample.tree.linearize()).toBe("(S (VP Cats purr))")
  })

  it("complains when there are too few samples", () => {
    let sampler = new ImportanceSampler(parser, flatScorer, new FileProposal(readSamples(sampleFile), vocab), {samples: 4})
    expect(() => sampler.logProb(words)).toThrow(SampleCountMismatchError)
    let err: unknown = null
    try { sampler.mapTree(["a"], 2) } catch (e) { err = e }
    expect(err instanceof SampleCountMismatchError && [err.sentence, err.expected, err.found]).toEqual([2, 4, 0])
  })
})

describe("FileProposal", () => {
  it("reports samples with unknown labels for their sentence", () => {
    let proposal = new FileProposal(readSamples("5 ||| -1 ||| (S (ADJP The cat) sleeps)"), vocab)
    let err: unknown = null
    try { proposal.propose(words, 5, 1) } catch (e) { err = e }
    expect(err).toBeInstanceOf(MalformedOracleError)
    expect(err instanceof MalformedOracleError && err.sentence).toBe(5)
  })

  it("reports samples whose leaves don't match the sentence", () => {
    let proposal = new FileProposal(readSamples("2 ||| -1 ||| (S (NP The cat) (VP sleeps now))"), vocab)
    let err: unknown = null
    try { proposal.propose(words, 2, 1) } catch (e) { err = e }
    expect(err).toBeInstanceOf(MalformedOracleError)
    expect(err instanceof MalformedOracleError && err.sentence).toBe(2)
    expect(err instanceof Error && err.message).toBe("Sample 0: Tree has 4 leaves, but 3 words were given (sentence 2)")
  })
})

describe("sample files", () => {
  it("group samples by sentence", () => {
    let samples = readSamples(sampleFile)
    expect([...samples.keys()]).toEqual([0, 1])
    expect(samples.get(0)?.map(s => s.logProb)).toEqual([-1.5, -0.5, -1.5])
    expect(samples.get(1)?.map(formatSample)).toEqual(["1 ||| -2 ||| (S (VP Dogs bark))"])
  })

  it("write samples one per line", () => {
    let tree = readTree("(S (NP The cat) (VP sleeps))")
    expect(formatSamples([{sentence: 0, logProb: -1.25, tree}, {sentence: 1, logProb: -3, tree}]))
      .toBe("0 ||| -1.25 ||| (S (NP The cat) (VP sleeps))\n1 ||| -3 ||| (S (NP The cat) (VP sleeps))")
  })

  it("report malformed lines", () => {
    expect(() => readSamples("0 ||| -1 ||| (S a)\n0 ||| (S a)")).toThrow("Expected three fields on line 2")
    expect(() => readSamples("x ||| -1 ||| (S a)")).toThrow("Invalid sentence index \"x\" on line 1")
    expect(() => readSamples("0 ||| -1 ||| (S a")).toThrow(/on line 1$/)
  })

  it("load from disk", () => {
    let dir = mkdtempSync(join(tmpdir(), "samples-"))
    try {
      let file = join(dir, "samples.txt")
      writeFileSync(file, sampleFile)
      expect(loadSamples(file).get(0)?.length).toBe(3)
    } finally {
      rmSync(dir, {recursive: true, force: true})
    }
  })
})
