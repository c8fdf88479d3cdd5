import { ansi, isTty } from './tty/ansi.js'

export type VerboseLog = (message: string) => void

export const silentLog: VerboseLog = () => {}

/**
 * `[getsong] …` lines on stderr while `enabled`; a no-op otherwise. The prefix
 * is coloured when stderr is a terminal.
 */
export function createVerboseLog({
  stderr,
  enabled,
  color = isTty(stderr),
}: {
  stderr: NodeJS.WritableStream
  enabled: boolean
  color?: boolean
}): VerboseLog {
  if (!enabled) return silentLog
  const prefix = ansi('36', '[getsong]', color)
  return (message) => {
    stderr.write(`${prefix} ${message}\n`)
  }
}
