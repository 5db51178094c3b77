export {Action, Slot, NodeID} from "./constants"
export {IllegalActionError, EmptyStructureError, MalformedOracleError, SampleCountMismatchError} from "./error"
export {type BracketTree, readTree, readTrees, leaves, labels, isTagged, stripTags, replaceLeaves, writeTree} from "./brackets"
export {Vocabulary, UNK, unkSignature} from "./vocab"
export {openAction, genAction, actionKind, actionValue, actionSlot, flatIndex, formatAction, parseAction,
        parseOracle, formatOracle, oracle, generativeOracle} from "./action"
export {type Vector, type EncoderState, type SequenceEncoder, type TransitionModel, type Scorer,
        type GenerativeScorer, topEncoder} from "./model"
export {Stack} from "./stack"
export {Sentence, type WordInput, InputBuffer, Terminal} from "./buffer"
export {History} from "./history"
export {TransitionParser, ParserState, type ParserConfig, type Component} from "./parse"
export {ParseTree} from "./tree"
export {type Derivation, type SamplingConfig, type Choice, Decoder, GreedyDecoder, SamplingDecoder,
        GenerativeSampler} from "./decoder"
export {type BeamConfig, BeamSearchDecoder} from "./beam"
export {type ProposalSample, type ProposalSource, DecoderProposal, FileProposal, type ImportanceConfig,
        type ScoredSample, ImportanceSampler} from "./importance"
export {type Sample, formatSample, formatSamples, readSamples, loadSamples} from "./samples"
export {LinearModel, type LinearModelJSON} from "./linear"
export {logSoftmax, logSumExp, argmax, temper, sampleIndex, seededRandom, selectBest} from "./math"
