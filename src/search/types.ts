/** One scraped search result, in the order it was discovered. */
export type Candidate = {
  /** Display text as scraped; not unescaped or cleaned. */
  title: string
  /** Opaque token the stream resolver turns into formats. */
  identifier: string
  durationSeconds: number
}

export type SearchQuery = {
  title: string
  /** `title` and artist joined by a space; equal to `title` without an artist. */
  titleAndArtist: string
  /** When absent, no duration filtering happens at all. */
  expectedDurationSeconds?: number
}

/** Turns a raw search response body into candidates, preserving discovery order. */
export interface ResultScraper {
  scrape(markup: string): Candidate[]
}
