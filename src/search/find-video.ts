import { HttpStatusError } from '../errors.js'
import { silentLog, type VerboseLog } from '../logging.js'
import { buildSearchUrl } from './query.js'
import { lineScraper } from './scrape.js'
import { selectBestCandidate } from './select.js'
import type { ResultScraper, SearchQuery } from './types.js'

export async function fetchSearchResults({
  url,
  fetchImpl,
}: {
  url: string
  fetchImpl: typeof fetch
}): Promise<string> {
  const response = await fetchImpl(url)
  if (!response.ok) {
    await response.body?.cancel()
    throw new HttpStatusError({ status: response.status, url })
  }
  return response.text()
}

/**
 * Searches for the query and returns the identifier of the best candidate.
 * Throws NoMatchError when the page yields nothing usable.
 */
export async function findVideoId({
  query,
  fetchImpl,
  scraper = lineScraper,
  log = silentLog,
}: {
  query: SearchQuery
  fetchImpl: typeof fetch
  scraper?: ResultScraper
  log?: VerboseLog
}): Promise<string> {
  const url = buildSearchUrl(query.titleAndArtist)
  log(`searching url: ${url}`)

  const markup = await fetchSearchResults({ url, fetchImpl })
  const candidates = scraper.scrape(markup)
  for (const candidate of candidates) {
    log(`possible track: ${candidate.title} (${candidate.identifier}): ${candidate.durationSeconds}s`)
  }

  return selectBestCandidate(candidates, query, log)
}
