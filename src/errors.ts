export type GetSongErrorKind =
  | 'INPUT'
  | 'NO_MATCH'
  | 'HTTP_STATUS'
  | 'NO_AUDIO'
  | 'ILLEGAL_ARCHIVE_PATH'
  | 'TRANSCODE'
  | 'NO_BINARY'
  | 'STAGE'

/**
 * Base class for every recoverable failure. Callers can retry, report or skip.
 */
export class GetSongError extends Error {
  readonly kind: GetSongErrorKind

  constructor(kind: GetSongErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GetSongError'
    this.kind = kind
  }
}

export class InputError extends GetSongError {
  constructor(message: string) {
    super('INPUT', message)
    this.name = 'InputError'
  }
}

export class NoMatchError extends GetSongError {
  constructor(message = 'no matching videos found') {
    super('NO_MATCH', message)
    this.name = 'NoMatchError'
  }
}

export class HttpStatusError extends GetSongError {
  readonly status: number
  readonly url: string

  constructor({ status, url }: { status: number; url: string }) {
    super('HTTP_STATUS', `received status code ${status} from ${url}`)
    this.name = 'HttpStatusError'
    this.status = status
    this.url = url
  }
}

export class NoAudioError extends GetSongError {
  constructor() {
    super('NO_AUDIO', 'no audio available')
    this.name = 'NoAudioError'
  }
}

export class IllegalArchivePathError extends GetSongError {
  readonly path: string

  constructor(path: string) {
    super('ILLEGAL_ARCHIVE_PATH', `${path}: illegal file path`)
    this.name = 'IllegalArchivePathError'
    this.path = path
  }
}

export class TranscodeError extends GetSongError {
  readonly output: string

  constructor({ message, output }: { message: string; output: string }) {
    super('TRANSCODE', output.trim().length > 0 ? `${message}\n${output.trimEnd()}` : message)
    this.name = 'TranscodeError'
    this.output = output
  }
}

/**
 * No download source exists for the running platform. Deliberately not a
 * GetSongError: nothing can be retried, so the caller decides whether to exit.
 */
export class UnsupportedPlatformError extends Error {
  readonly platform: string

  constructor(platform: string) {
    super(`ffmpeg is not installed and no download is available for platform "${platform}"`)
    this.name = 'UnsupportedPlatformError'
    this.platform = platform
  }
}

/** Prefix a failure with the stage it happened in, keeping the original as `cause`. */
export function wrapError(stage: string, error: unknown): GetSongError {
  const message = error instanceof Error ? error.message : String(error)
  return new GetSongError('STAGE', `${stage}: ${message}`, { cause: error })
}
