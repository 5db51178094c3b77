import {readFileSync} from "node:fs"
import {type BracketTree, readTree, writeTree} from "./brackets"

/// A sampled tree for a sentence, as stored in a sample file.
export interface Sample {
  /// The index of the sentence the tree was sampled for.
  sentence: number
  /// The log-probability of the tree under the distribution it was
  /// sampled from.
  logProb: number
  tree: BracketTree
}

/// Write a sample as a single line: `index ||| logProb ||| tree`.
export function formatSample(sample: Sample): string {
  return `${sample.sentence} ||| ${sample.logProb} ||| ${writeTree(sample.tree)}`
}

export function formatSamples(samples: readonly Sample[]): string {
  return samples.map(formatSample).join("\n")
}

/// Read the samples in a sample file's content, grouped by sentence
/// index, in file order. Blank lines are skipped.
export function readSamples(text: string): Map<number, Sample[]> {
  let result = new Map<number, Sample[]>()
  let lines = text.split(/\r?\n/)
  for (let i = 0; i < lines.length; i++) {
    let line = lines[i].trim()
    if (!line) continue
    let parts = line.split("|||")
    if (parts.length != 3) throw new SyntaxError(`Expected three fields on line ${i + 1}`)
    let index = parts[0].trim(), sentence = Number(index), logProb = parseNumber(parts[1].trim())
    if (!/^\d+$/.test(index)) throw new SyntaxError(`Invalid sentence index ${JSON.stringify(index)} on line ${i + 1}`)
    if (isNaN(logProb)) throw new SyntaxError(`Invalid log-probability ${JSON.stringify(parts[1].trim())} on line ${i + 1}`)
    let tree: BracketTree
    try {
      tree = readTree(parts[2])
    } catch (e) {
      if (!(e instanceof SyntaxError)) throw e
      throw new SyntaxError(`${e.message} on line ${i + 1}`)
    }
    let group = result.get(sentence)
    if (group) group.push({sentence, logProb, tree})
    else result.set(sentence, [{sentence, logProb, tree}])
  }
  return result
}

function parseNumber(text: string) {
  if (/^-inf(inity)?$/i.test(text)) return -Infinity
  return text ? Number(text) : NaN
}

/// Read a sample file from disk.
export function loadSamples(path: string): Map<number, Sample[]> {
  return readSamples(readFileSync(path, "utf8"))
}
