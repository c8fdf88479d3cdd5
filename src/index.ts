export { loadGetSongConfig, resolveGetSongDir, type GetSongConfig } from './config.js'
export {
  GetSongError,
  HttpStatusError,
  IllegalArchivePathError,
  InputError,
  NoAudioError,
  NoMatchError,
  TranscodeError,
  UnsupportedPlatformError,
} from './errors.js'
export { extractZip } from './ffmpeg/archive.js'
export { createFfmpegResolver, type BinaryLocation, type FfmpegResolver } from './ffmpeg/resolve.js'
export { convertToMp3 } from './ffmpeg/transcode.js'
export {
  buildOutputStem,
  getSong,
  type GetSongContext,
  type GetSongOptions,
  type GetSongResult,
} from './get-song.js'
export { downloadAudio, pickBestAudioFormat } from './media/audio.js'
export {
  createYtdlStreamResolver,
  type StreamFormat,
  type StreamResolver,
} from './media/stream-resolver.js'
export { findVideoId } from './search/find-video.js'
export { jaroWinkler } from './search/jaro-winkler.js'
export { buildSearchQuery, buildSearchUrl } from './search/query.js'
export { lineScraper, scrapeSearchResults } from './search/scrape.js'
export { selectBestCandidate } from './search/select.js'
export { textBetween } from './search/text-window.js'
export type { Candidate, ResultScraper, SearchQuery } from './search/types.js'
