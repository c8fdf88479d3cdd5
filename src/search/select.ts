import { NoMatchError } from '../errors.js'
import { silentLog, type VerboseLog } from '../logging.js'
import { jaroWinkler } from './jaro-winkler.js'
import type { Candidate, SearchQuery } from './types.js'

export const DURATION_TOLERANCE_SECONDS = 20

const SIMILARITY = { boostThreshold: 0.7, prefixSize: 4 }

export function filterByDuration(
  candidates: readonly Candidate[],
  expectedDurationSeconds: number | undefined
): Candidate[] {
  if (expectedDurationSeconds === undefined) return [...candidates]
  return candidates.filter(
    (candidate) =>
      Math.abs(candidate.durationSeconds - expectedDurationSeconds) <= DURATION_TOLERANCE_SECONDS
  )
}

export function scoreCandidate(candidate: Candidate, query: SearchQuery): number {
  return Math.max(
    jaroWinkler(query.title, candidate.title, SIMILARITY),
    jaroWinkler(query.titleAndArtist, candidate.title, SIMILARITY)
  )
}

/**
 * Picks the identifier of the best-scoring candidate.
 *
 * Candidates are scanned from last to first and the winner only changes on a
 * strictly greater score, so among equal scores the latest-discovered one wins.
 * Tests depend on that order; keep it.
 */
export function selectBestCandidate(
  candidates: readonly Candidate[],
  query: SearchQuery,
  log: VerboseLog = silentLog
): string {
  const expected = query.expectedDurationSeconds
  const pool = filterByDuration(candidates, expected)
  if (expected !== undefined) {
    for (const candidate of candidates) {
      if (pool.includes(candidate)) continue
      log(
        `'${candidate.title}' duration (${candidate.durationSeconds}s) is different than expected (${expected}s)`
      )
    }
  }
  if (pool.length === 0) throw new NoMatchError()

  let bestScore = 0
  let best = pool[0]
  for (let i = pool.length - 1; i >= 0; i--) {
    const score = scoreCandidate(pool[i], query)
    log(`${query.title} | ${pool[i].title} : ${score.toFixed(3)}`)
    if (score > bestScore) {
      bestScore = score
      best = pool[i]
    }
  }

  log(`best track for ${query.titleAndArtist}: ${best.title} (${best.identifier})`)
  return best.identifier
}
