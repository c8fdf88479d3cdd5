export function jaro(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1
  if (a.length === 0 || b.length === 0) return 0

  const matchRange = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1)
  const matchedA = new Array<boolean>(a.length).fill(false)
  const matchedB = new Array<boolean>(b.length).fill(false)

  let matches = 0
  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - matchRange)
    const end = Math.min(b.length - 1, i + matchRange)
    for (let j = start; j <= end; j++) {
      if (matchedB[j]) continue
      if (a[i] === b[j]) {
        matchedA[i] = true
        matchedB[j] = true
        matches++
        break
      }
    }
  }
  if (matches === 0) return 0

  let transpositions = 0
  let k = 0
  for (let i = 0; i < a.length; i++) {
    if (!matchedA[i]) continue
    while (!matchedB[k]) k++
    if (a[i] !== b[k]) transpositions++
    k++
  }
  transpositions /= 2

  return (matches / a.length + matches / b.length + (matches - transpositions) / matches) / 3
}

/**
 * Jaro-Winkler similarity in [0, 1]. The common-prefix bonus only applies once
 * the Jaro score is above `boostThreshold`, and counts at most `prefixSize`
 * characters.
 */
export function jaroWinkler(
  a: string,
  b: string,
  { boostThreshold = 0.7, prefixSize = 4 }: { boostThreshold?: number; prefixSize?: number } = {}
): number {
  const score = jaro(a, b)
  if (score <= boostThreshold) return score

  const limit = Math.min(a.length, b.length, prefixSize)
  let prefix = 0
  while (prefix < limit && a[prefix] === b[prefix]) prefix++

  return score + 0.1 * prefix * (1 - score)
}
