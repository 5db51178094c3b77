import {describe, it, expect} from "vitest"
import {TransitionParser} from "../src/parse"
import {GreedyDecoder, SamplingDecoder, GenerativeSampler} from "../src/decoder"
import {BeamSearchDecoder} from "../src/beam"
import {ImportanceSampler, DecoderProposal} from "../src/importance"
import {LinearModel} from "../src/linear"
import {Action} from "../src/constants"
import {actionKind} from "../src/action"
import {seededRandom} from "../src/math"
import {words, vocab, gold, countingModel, followScorer, flatScorer} from "./helpers"

let following = new TransitionParser(vocab, countingModel, {order: ["history"]})

describe("decoders following an oracle scorer", () => {
  it("greedy decoding reproduces the oracle", () => {
    let result = new GreedyDecoder(following, followScorer(gold)).decode(words)
    expect(result.actions).toEqual(gold)
    expect(result.tree.linearize()).toBe("(S (NP The cat) (VP sleeps))")
    expect(result.logProb).toBeLessThan(0)
    expect(result.logProb).toBeGreaterThan(-0.01)
  })

  it("beam search ranks the oracle first", () => {
    let results = new BeamSearchDecoder(following, followScorer(gold), {beamSize: 3}).decode(words)
    expect(results.length).toBeGreaterThan(1)
    expect(results[0].actions).toEqual(gold)
    for (let i = 1; i < results.length; i++) expect(results[i].logProb).toBeLessThanOrEqual(results[i - 1].logProb)
  })

  it("sampling with a sharp distribution reproduces the oracle", () => {
    let decoder = new SamplingDecoder(following, followScorer(gold, 30), {random: seededRandom(5)})
    for (let sample of decoder.sample(words, 5)) {
      expect(sample.tree.linearize()).toBe("(S (NP The cat) (VP sleeps))")
      expect(sample.proposalLogProb).toBe(sample.logProb)
    }
  })

  it("tempered sampling records the proposal probability", () => {
    let decoder = new SamplingDecoder(following, followScorer(gold, 30), {random: seededRandom(5), alpha: 0.5})
    let sample = decoder.decode(words)
    expect(sample.actions).toEqual(gold)
    expect(sample.proposalLogProb).not.toBe(sample.logProb)
  })
})

describe("decoders on a linear model", () => {
  let model = LinearModel.random({words: vocab.words.length, labels: vocab.labels.length, dim: 4}, 11)
  let parser = new TransitionParser(vocab, model, {maxOpen: 4})

  it("beam search with width 1 is greedy decoding", () => {
    for (let sentence of [words, ["cat", "The"], ["sleeps", "The", "cat", "sleeps"]]) {
      let greedy = new GreedyDecoder(parser, model).decode(sentence)
      let beam = new BeamSearchDecoder(parser, model, {beamSize: 1}).decode(sentence)
      expect(beam.length).toBe(1)
      expect(beam[0].actions).toEqual(greedy.actions)
      expect(beam[0].logProb).toBe(greedy.logProb)
    }
  })

  it("wider beams return finished derivations, most probable first", () => {
    let beam = new BeamSearchDecoder(parser, model, {beamSize: 5}).decode(words)
    expect(beam.length).toBeGreaterThan(0)
    for (let i = 0; i < beam.length; i++) {
      expect(beam[i].tree.words).toEqual(words)
      expect(parser.replay(words, beam[i].actions).toTree().linearize()).toBe(beam[i].tree.linearize())
      if (i) expect(beam[i].logProb).toBeLessThanOrEqual(beam[i - 1].logProb)
    }
  })

  it("samples sentences with their trees", () => {
    let generative = parser.configure({maxWords: 5})
    let sampler = new GenerativeSampler(generative, model, {random: seededRandom(3)})
    let scorer = new ImportanceSampler(generative, model, new DecoderProposal(new SamplingDecoder(generative, model)))
    for (let i = 0; i < 10; i++) {
      let sample = sampler.sample()
      let sentence = sample.tree.words
      expect(sentence.length).toBeGreaterThan(0)
      expect(sentence.length).toBeLessThanOrEqual(5)
      expect(sample.actions.some(a => actionKind(a) == Action.Shift)).toBe(false)
      expect(generative.replayGenerative(sentence, sample.actions).toTree().linearize()).toBe(sample.tree.linearize())
      let joint = scorer.score(sentence, sample.actions)
      expect(joint).toBeLessThan(0)
      expect(joint).toBeGreaterThan(-Infinity)
    }
  })

  it("samples with a flat scorer stay within the limits", () => {
    let sampler = new GenerativeSampler(parser.configure({maxWords: 3}), flatScorer, {random: seededRandom(9)})
    for (let i = 0; i < 20; i++) {
      let sample = sampler.sample()
      expect(sample.tree.words.length).toBeLessThanOrEqual(3)
    }
  })
})
