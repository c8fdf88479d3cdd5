import { resolveGetSongDir } from './config.js'
import { GetSongError, UnsupportedPlatformError, wrapError } from './errors.js'
import type { CommandRunner } from './ffmpeg/command.js'
import { createFfmpegResolver, type BinaryLocation, type FfmpegResolver } from './ffmpeg/resolve.js'
import { convertToMp3 } from './ffmpeg/transcode.js'
import { createVerboseLog, type VerboseLog } from './logging.js'
import { downloadAudio } from './media/audio.js'
import { createYtdlStreamResolver, type StreamResolver } from './media/stream-resolver.js'
import { findVideoId } from './search/find-video.js'
import { buildSearchQuery } from './search/query.js'
import type { ResultScraper } from './search/types.js'

export type GetSongOptions = {
  title: string
  artist?: string | null
  /** Expected length of the track; enables the ±20s duration filter. */
  durationSeconds?: number | null
  showProgress?: boolean
  verbose?: boolean
  /** Stop after picking the video. */
  doNotDownload?: boolean
  outputDir?: string
}

export type GetSongContext = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stderr: NodeJS.WritableStream
  platform?: NodeJS.Platform
  ffmpeg?: FfmpegResolver
  streamResolver?: StreamResolver
  scraper?: ResultScraper
  runCommand?: CommandRunner
}

export type GetSongResult = {
  videoId: string
  /** `<stem>.mp3` */
  filename: string
  /** Where the mp3 was written; null when nothing was downloaded. */
  path: string | null
}

export function sanitizeFileNamePart(part: string): string {
  return part.replace(/\//g, '-').replace(/[^A-Za-z0-9_-]/g, '')
}

/**
 * `Artist - Title`, each part sanitized for the file system. Parts that
 * sanitize to nothing are left out; when both do, `fallback` (the video id) is
 * the stem.
 */
export function buildOutputStem({
  title,
  artist,
  fallback,
}: {
  title: string
  artist?: string | null
  fallback: string
}): string {
  const parts = [artist ?? '', title]
    .map((part) => sanitizeFileNamePart(part.trim()))
    .filter((part) => part.length > 0)
  return parts.length > 0 ? parts.join(' - ') : sanitizeFileNamePart(fallback)
}

function createDefaultFfmpegResolver({
  ctx,
  showProgress,
  log,
}: {
  ctx: GetSongContext
  showProgress: boolean
  log: VerboseLog
}): FfmpegResolver {
  const cacheDir = resolveGetSongDir(ctx.env, ctx.platform)
  if (!cacheDir) {
    throw new GetSongError('NO_BINARY', 'cannot locate a home directory for the ffmpeg cache')
  }
  return createFfmpegResolver({
    cacheDir,
    fetchImpl: ctx.fetch,
    platform: ctx.platform,
    runCommand: ctx.runCommand,
    progress: { enabled: showProgress, stream: ctx.stderr },
    log,
  })
}

async function resolveFfmpeg(resolver: FfmpegResolver): Promise<BinaryLocation> {
  try {
    return await resolver.resolve()
  } catch (error) {
    if (error instanceof UnsupportedPlatformError) throw error
    throw wrapError('could not find ffmpeg', error)
  }
}

/**
 * Finds the song, downloads its best audio-only stream and converts it to mp3.
 *
 * UnsupportedPlatformError is passed through untouched; every other failure
 * arrives wrapped with the stage it happened in.
 */
export async function getSong(options: GetSongOptions, ctx: GetSongContext): Promise<GetSongResult> {
  const verbose = options.verbose ?? false
  const showProgress = options.showProgress ?? false
  const log = createVerboseLog({ stderr: ctx.stderr, enabled: verbose })

  const query = buildSearchQuery({
    title: options.title,
    artist: options.artist,
    durationSeconds: options.durationSeconds,
  })

  let videoId: string
  try {
    videoId = await findVideoId({ query, fetchImpl: ctx.fetch, scraper: ctx.scraper, log })
  } catch (error) {
    throw wrapError('could not get youtube ID', error)
  }

  const stem = buildOutputStem({ title: query.title, artist: options.artist, fallback: videoId })
  const filename = `${stem}.mp3`

  if (options.doNotDownload) return { videoId, filename, path: null }

  const ffmpeg = await resolveFfmpeg(
    ctx.ffmpeg ?? createDefaultFfmpegResolver({ ctx, showProgress, log })
  )

  let downloaded: string
  try {
    downloaded = await downloadAudio({
      identifier: videoId,
      stem,
      outputDir: options.outputDir ?? '.',
      resolver: ctx.streamResolver ?? createYtdlStreamResolver(),
      fetchImpl: ctx.fetch,
      progress: { enabled: showProgress, stream: ctx.stderr },
      log,
    })
  } catch (error) {
    throw wrapError('could not download video', error)
  }

  let converted: string
  try {
    converted = await convertToMp3({
      ffmpeg,
      inputPath: downloaded,
      runCommand: ctx.runCommand,
      log,
    })
  } catch (error) {
    throw wrapError('could not convert video', error)
  }

  return { videoId, filename, path: converted }
}
