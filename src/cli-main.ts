import { runCli, type RunCliContext } from './run.js'
import { isTty } from './tty/ansi.js'

export type CliMainArgs = RunCliContext & {
  argv: string[]
  exit: (code: number) => void
  setExitCode: (code: number) => void
}

/** A reader closing the pipe early (`getsong … | head`) is a clean exit. */
export function handlePipeErrors(stream: NodeJS.WritableStream, exit: (code: number) => void) {
  stream.on('error', (error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'EPIPE') {
      exit(0)
      return
    }
    throw error
  })
}

/**
 * The message alone, or with `verbose` the stack followed by one
 * `Caused by:` block per wrapped error.
 */
export function formatFailure(error: unknown, verbose: boolean): string {
  if (!(error instanceof Error)) return `${error ? String(error) : 'Unknown error'}\n`
  if (!verbose || typeof error.stack !== 'string') return `${error.message}\n`

  const blocks = [error.stack]
  for (let cause = error.cause; cause instanceof Error; cause = cause.cause) {
    blocks.push(`Caused by: ${cause.stack ?? `${cause.name}: ${cause.message}`}`)
  }
  return `${blocks.join('\n')}\n`
}

export async function runCliMain({ argv, exit, setExitCode, ...ctx }: CliMainArgs): Promise<void> {
  handlePipeErrors(ctx.stdout, exit)
  handlePipeErrors(ctx.stderr, exit)

  try {
    await runCli(argv, ctx)
  } catch (error: unknown) {
    // Start below any progress line.
    const lead = isTty(ctx.stderr) ? '\n' : ''
    const verbose = argv.includes('--verbose') || argv.includes('-v')
    ctx.stderr.write(`${lead}${formatFailure(error, verbose)}`)
    setExitCode(1)
  }
}
