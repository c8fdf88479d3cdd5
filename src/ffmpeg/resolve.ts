import type { Dirent } from 'node:fs'
import { mkdir, readdir, rm } from 'node:fs/promises'
import path from 'node:path'
import { GetSongError, UnsupportedPlatformError, wrapError } from '../errors.js'
import { silentLog, type VerboseLog } from '../logging.js'
import { downloadToFile } from '../media/download.js'
import { startByteProgress } from '../tty/progress.js'
import { extractZip } from './archive.js'
import { type CommandRunner, runCommand as defaultRunCommand } from './command.js'

/** A runnable ffmpeg: an absolute path, or the bare command name when on PATH. */
export type BinaryLocation = string

export const FFMPEG_COMMAND = 'ffmpeg'
export const FFMPEG_VERSION_MARKER = 'ffmpeg version'
export const ARCHIVE_NAME = 'ffmpeg.zip'

const EXECUTABLE_EXTENSIONS = new Set(['', '.exe'])

export const FFMPEG_DOWNLOAD_URLS: Partial<Record<NodeJS.Platform, string>> = {
  win32: 'https://www.gyan.dev/ffmpeg/builds/ffmpeg-release-essentials.zip',
}

export type FfmpegResolverOptions = {
  cacheDir: string
  fetchImpl: typeof fetch
  platform?: NodeJS.Platform
  runCommand?: CommandRunner
  downloadUrls?: Partial<Record<NodeJS.Platform, string>>
  progress?: { enabled: boolean; stream: NodeJS.WritableStream }
  log?: VerboseLog
  now?: () => number
}

export type FfmpegResolver = {
  resolve: () => Promise<BinaryLocation>
}

export function isFfmpegFileName(name: string): boolean {
  const extension = path.extname(name)
  return (
    path.basename(name, extension) === FFMPEG_COMMAND &&
    EXECUTABLE_EXTENSIONS.has(extension.toLowerCase())
  )
}

/** Depth-first, name-ordered walk; first matching file wins. */
export async function findCachedFfmpeg(dir: string): Promise<string | null> {
  let entries: Dirent[]
  try {
    entries = await readdir(dir, { withFileTypes: true })
  } catch (error) {
    if ((error as { code?: unknown }).code === 'ENOENT') return null
    throw error
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      const nested = await findCachedFfmpeg(fullPath)
      if (nested) return nested
    } else if (entry.isFile() && isFfmpegFileName(entry.name)) {
      return fullPath
    }
  }
  return null
}

export async function isFfmpegOnPath(runCommand: CommandRunner): Promise<boolean> {
  try {
    const { stdout, stderr } = await runCommand(FFMPEG_COMMAND, ['-version'])
    return `${stdout}${stderr}`.includes(FFMPEG_VERSION_MARKER)
  } catch {
    // Not installed, or not runnable: fall through to the cache.
    return false
  }
}

/**
 * Locates ffmpeg: PATH first, then the cache directory, then (on platforms
 * with a known build) a download that is unpacked into the cache.
 *
 * The work runs at most once per resolver; later calls share the result. A
 * failed attempt is forgotten so the next call starts over. There is no lock on
 * the cache directory, so two processes bootstrapping at once can race.
 */
export function createFfmpegResolver({
  cacheDir,
  fetchImpl,
  platform = process.platform,
  runCommand = defaultRunCommand,
  downloadUrls = FFMPEG_DOWNLOAD_URLS,
  progress,
  log = silentLog,
  now = Date.now,
}: FfmpegResolverOptions): FfmpegResolver {
  let pending: Promise<BinaryLocation> | null = null

  const download = async (): Promise<void> => {
    const url = downloadUrls[platform]
    if (!url) throw new UnsupportedPlatformError(platform)

    const archivePath = path.join(cacheDir, ARCHIVE_NAME)
    log(`downloading ffmpeg from ${url}`)
    try {
      await downloadToFile({
        url,
        filePath: archivePath,
        fetchImpl,
        startProgress: (total) =>
          startByteProgress({
            label: 'Downloading ffmpeg',
            total,
            enabled: progress?.enabled ?? false,
            stream: progress?.stream ?? process.stderr,
          }),
      })
    } catch (error) {
      throw wrapError('could not download ffmpeg', error)
    }

    // The archive stays on disk when extraction fails.
    try {
      await extractZip(archivePath, cacheDir)
    } catch (error) {
      throw wrapError('could not extract ffmpeg', error)
    }
    await rm(archivePath, { force: true })
  }

  const locate = async (): Promise<BinaryLocation> => {
    const startedAt = now()
    try {
      if (await isFfmpegOnPath(runCommand)) {
        log('using ffmpeg from PATH')
        return FFMPEG_COMMAND
      }

      await mkdir(cacheDir, { recursive: true })
      const cached = await findCachedFfmpeg(cacheDir)
      if (cached) {
        log(`using cached ffmpeg at ${cached}`)
        return cached
      }

      await download()
      const extracted = await findCachedFfmpeg(cacheDir)
      if (!extracted) {
        throw new GetSongError('NO_BINARY', `no ffmpeg binary found in ${cacheDir} after download`)
      }
      log(`using downloaded ffmpeg at ${extracted}`)
      return extracted
    } finally {
      log(`ffmpeg lookup took ${now() - startedAt}ms`)
    }
  }

  return {
    resolve: () => {
      if (!pending) {
        pending = locate().catch((error: unknown) => {
          pending = null
          throw error
        })
      }
      return pending
    },
  }
}
