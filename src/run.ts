import { existsSync, readFileSync } from 'node:fs'
import { Command, CommanderError } from 'commander'
import { loadGetSongConfig } from './config.js'
import { InputError } from './errors.js'
import { getSong, type GetSongContext } from './get-song.js'
import { isTty } from './tty/ansi.js'

export type RunCliContext = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
} & Pick<GetSongContext, 'platform' | 'ffmpeg' | 'streamResolver' | 'runCommand'>

type CliFlags = {
  artist?: string
  duration?: string
  progress?: boolean
  verbose?: boolean
  download: boolean
  outputDir?: string
}

function readPackageVersion(): string {
  const packageJsonUrl = new URL('../package.json', import.meta.url)
  if (!existsSync(packageJsonUrl)) return '0.0.0'
  const raw: unknown = JSON.parse(readFileSync(packageJsonUrl, 'utf8'))
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version
  }
  return '0.0.0'
}

export function parseDurationFlag(raw: string | undefined): number | null {
  if (raw === undefined) return null
  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) <= 0) {
    throw new InputError(`--duration must be a positive number of seconds (got "${raw}")`)
  }
  return Number.parseInt(trimmed, 10)
}

function buildProgram(ctx: RunCliContext): Command {
  return new Command()
    .name('getsong')
    .description('Find a song on YouTube, download its best audio stream and save it as mp3.')
    .version(readPackageVersion())
    .argument('<title...>', 'song title')
    .option('-a, --artist <name>', 'artist, used for matching and the file name')
    .option('-d, --duration <seconds>', 'expected length; only videos within 20s are considered')
    .option('--progress', 'show download progress (default on a TTY)')
    .option('--no-progress', 'never show download progress')
    .option('-v, --verbose', 'print search, scoring and download details to stderr')
    .option('--no-download', 'only print the chosen video id')
    .option('-o, --output-dir <dir>', 'where to write the mp3 (default: current directory)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.stdout.write(text),
      writeErr: (text) => ctx.stderr.write(text),
      outputError: () => {},
    })
}

export async function runCli(argv: string[], ctx: RunCliContext): Promise<void> {
  const program = buildProgram(ctx)
  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) return
      throw new InputError(error.message.replace(/^error: /, ''))
    }
    throw error
  }

  const flags = program.opts<CliFlags>()
  const title = program.args.join(' ')
  const { config } = loadGetSongConfig({ env: ctx.env, platform: ctx.platform })

  const verbose = flags.verbose ?? config?.verbose ?? false
  const wantsProgress = flags.progress ?? config?.progress ?? true

  const result = await getSong(
    {
      title,
      artist: flags.artist ?? null,
      durationSeconds: parseDurationFlag(flags.duration),
      verbose,
      showProgress: wantsProgress && isTty(ctx.stderr),
      doNotDownload: !flags.download,
      outputDir: flags.outputDir ?? config?.outputDir,
    },
    {
      env: ctx.env,
      fetch: ctx.fetch,
      stderr: ctx.stderr,
      platform: ctx.platform,
      ffmpeg: ctx.ffmpeg,
      streamResolver: ctx.streamResolver,
      runCommand: ctx.runCommand,
    }
  )

  ctx.stdout.write(`${result.path ?? result.videoId}\n`)
}
