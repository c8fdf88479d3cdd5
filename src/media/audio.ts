import { join } from 'node:path'
import { NoAudioError, wrapError } from '../errors.js'
import { silentLog, type VerboseLog } from '../logging.js'
import { startByteProgress } from '../tty/progress.js'
import { downloadToFile } from './download.js'
import type { StreamFormat, StreamResolver } from './stream-resolver.js'

/**
 * Highest audio bitrate among formats without video. The first of equal
 * bitrates wins and a bitrate of 0 never qualifies.
 */
export function pickBestAudioFormat<F extends StreamFormat>(formats: readonly F[]): F {
  let best: F | null = null
  let bestBitrate = 0
  for (const format of formats) {
    if (format.hasVideoEncoding) continue
    if (format.audioBitrate > bestBitrate) {
      bestBitrate = format.audioBitrate
      best = format
    }
  }
  if (!best) throw new NoAudioError()
  return best
}

export type DownloadAudioArgs = {
  identifier: string
  /** File name without extension; used as given. */
  stem: string
  outputDir: string
  resolver: StreamResolver
  fetchImpl: typeof fetch
  progress: { enabled: boolean; stream: NodeJS.WritableStream }
  log?: VerboseLog
}

/** Downloads the best audio-only stream and returns the written file's path. */
export async function downloadAudio({
  identifier,
  stem,
  outputDir,
  resolver,
  fetchImpl,
  progress,
  log = silentLog,
}: DownloadAudioArgs): Promise<string> {
  let formats: StreamFormat[]
  try {
    formats = await resolver.getFormats(identifier)
  } catch (error) {
    throw wrapError('unable to fetch video info', error)
  }

  const format = pickBestAudioFormat(formats)

  let url: string
  try {
    url = await resolver.getDownloadUrl(format)
  } catch (error) {
    throw wrapError('unable to get download url', error)
  }

  const filePath = join(outputDir, `${stem}.${format.extension}`)
  log(`downloading ${identifier} (${format.audioBitrate}kbps ${format.extension}) to ${filePath}`)

  try {
    await downloadToFile({
      url,
      filePath,
      fetchImpl,
      startProgress: (total) =>
        startByteProgress({
          label: 'Downloading audio',
          total,
          enabled: progress.enabled,
          stream: progress.stream,
        }),
    })
  } catch (error) {
    throw wrapError('unable to download', error)
  }
  return filePath
}
