/// Normalize a vector of logits to log-probabilities. When a `mask`
/// is given, disallowed entries get `-Infinity` and the remaining ones
/// are renormalized among themselves. When nothing is allowed, every
/// entry is `-Infinity`.
export function logSoftmax(logits: readonly number[], mask?: readonly boolean[]): number[] {
  let max = -Infinity
  for (let i = 0; i < logits.length; i++)
    if ((!mask || mask[i]) && logits[i] > max) max = logits[i]
  let result: number[] = []
  if (max == -Infinity) {
    for (let i = 0; i < logits.length; i++) result.push(-Infinity)
    return result
  }
  let sum = 0
  for (let i = 0; i < logits.length; i++) if (!mask || mask[i]) sum += Math.exp(logits[i] - max)
  let norm = max + Math.log(sum)
  for (let i = 0; i < logits.length; i++) result.push(!mask || mask[i] ? logits[i] - norm : -Infinity)
  return result
}

/// Compute `log(sum(exp(values)))` with max-subtraction.
export function logSumExp(values: readonly number[]): number {
  let max = -Infinity
  for (let v of values) if (v > max) max = v
  if (max == -Infinity) return -Infinity
  let sum = 0
  for (let v of values) sum += Math.exp(v - max)
  return max + Math.log(sum)
}

/// The index of the greatest value, preferring the lowest index on
/// ties. Returns -1 when every value is `-Infinity` (or the vector is
/// empty).
export function argmax(values: readonly number[]): number {
  let best = -1, bestValue = -Infinity
  for (let i = 0; i < values.length; i++) if (values[i] > bestValue) {
    best = i
    bestValue = values[i]
  }
  return best
}

/// Apply temperature `alpha` to a distribution given as
/// log-probabilities: `p ← p^alpha`, renormalized.
export function temper(logProbs: readonly number[], alpha: number): number[] {
  if (!(alpha > 0)) throw new RangeError(`Temperature must be positive, got ${alpha}`)
  if (alpha == 1) return logProbs.slice()
  return logSoftmax(logProbs.map(lp => lp * alpha))
}

/// Draw an index from a distribution given as log-probabilities,
/// using `random` as the source of uniform numbers in [0, 1).
export function sampleIndex(logProbs: readonly number[], random: () => number): number {
  let r = random(), acc = 0, last = -1
  for (let i = 0; i < logProbs.length; i++) {
    if (logProbs[i] == -Infinity) continue
    acc += Math.exp(logProbs[i])
    last = i
    if (r < acc) return i
  }
  // Rounding can leave the cumulative sum a hair below one
  return last
}

/// Create a seeded pseudo-random number generator (mulberry32),
/// returning numbers in [0, 1).
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/// Select the `k` best elements of `items`, where `better(a, b) < 0`
/// means `a` is better than `b`. The result is sorted best-first.
/// Elements that compare equal keep their original order.
export function selectBest<T>(items: readonly T[], k: number, better: (a: T, b: T) => number): T[] {
  let result: T[] = []
  if (k <= 0) return result
  for (let item of items) {
    let pos = result.length
    while (pos > 0 && better(item, result[pos - 1]) < 0) pos--
    if (pos < k) {
      result.splice(pos, 0, item)
      if (result.length > k) result.pop()
    }
  }
  return result
}
