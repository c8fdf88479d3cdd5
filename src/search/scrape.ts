import { textBetween } from './text-window.js'
import type { Candidate, ResultScraper } from './types.js'

export const OFFICIAL_UPLOAD_MARKER = 'Provided to YouTube'
export const TITLE_LINK_MARKER = 'yt-lockup-title'

const DIGITS_PATTERN = /^\d+$/

/**
 * Parse a `MM:SS` duration into seconds. Anything that is not exactly two
 * digit groups yields null.
 */
export function parseDurationSeconds(raw: string): number | null {
  const parts = raw.split(':')
  if (parts.length !== 2) return null
  const [minutes, seconds] = parts
  if (!DIGITS_PATTERN.test(minutes) || !DIGITS_PATTERN.test(seconds)) return null
  return Number.parseInt(minutes, 10) * 60 + Number.parseInt(seconds, 10)
}

export function scrapeResultLine(rawLine: string): Candidate | null {
  const line = rawLine.trim()
  if (!line.includes(OFFICIAL_UPLOAD_MARKER)) return null
  if (!line.includes(TITLE_LINK_MARKER)) return null

  const durationSeconds = parseDurationSeconds(textBetween(line, 'Duration: ', '.'))
  if (durationSeconds === null) return null

  return {
    title: textBetween(line, 'title="', '"'),
    identifier: textBetween(line, '/watch?v=', '"'),
    durationSeconds,
  }
}

/**
 * Line-oriented scan of a search results page. Lines without both markers or
 * without a usable duration are skipped; an empty result is not an error here.
 */
export function scrapeSearchResults(markup: string): Candidate[] {
  const candidates: Candidate[] = []
  for (const line of markup.split(/\r?\n/)) {
    const candidate = scrapeResultLine(line)
    if (candidate) candidates.push(candidate)
  }
  return candidates
}

export const lineScraper: ResultScraper = { scrape: scrapeSearchResults }
