import { InputError } from '../errors.js'
import type { SearchQuery } from './types.js'

export const SEARCH_ENDPOINT = 'https://www.youtube.com/results'

// Biases results toward label-provided "Topic" uploads.
const OFFICIAL_UPLOAD_PHRASE = '%22Provided+to+YouTube%22'

export function buildSearchQuery({
  title,
  artist,
  durationSeconds,
}: {
  title: string
  artist?: string | null
  durationSeconds?: number | null
}): SearchQuery {
  const trimmedTitle = title.trim()
  if (trimmedTitle.length === 0) throw new InputError('must enter title')
  const trimmedArtist = artist?.trim() ?? ''
  return {
    title: trimmedTitle,
    titleAndArtist: trimmedArtist ? `${trimmedTitle} ${trimmedArtist}` : trimmedTitle,
    ...(typeof durationSeconds === 'number' && durationSeconds > 0
      ? { expectedDurationSeconds: durationSeconds }
      : {}),
  }
}

export function buildSearchUrl(titleAndArtist: string): string {
  const terms = titleAndArtist
    .split(/\s+/)
    .filter((term) => term.length > 0)
    .map((term) => encodeURIComponent(term))
  return `${SEARCH_ENDPOINT}?search_query=${[OFFICIAL_UPLOAD_PHRASE, ...terms].join('+')}`
}
