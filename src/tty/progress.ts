import ora from 'ora'
import { formatByteProgress } from './format.js'

/** Passive mirror of bytes copied elsewhere. */
export type ByteProgress = {
  add: (bytes: number) => void
  done: () => void
}

export const noopByteProgress: ByteProgress = { add: () => {}, done: () => {} }

/**
 * An ora spinner on `stream` whose text follows the byte count. Text is only
 * re-rendered when the formatted line changes.
 */
export function startByteProgress({
  label,
  total,
  enabled,
  stream,
}: {
  label: string
  /** Declared content length; null or 0 shows a running count only. */
  total: number | null
  enabled: boolean
  stream: NodeJS.WritableStream
}): ByteProgress {
  if (!enabled) return noopByteProgress

  let received = 0
  let text = formatByteProgress({ label, received, total })
  let finished = false
  const spinner = ora({
    text,
    stream,
    spinner: 'dots12',
    color: 'cyan',
    discardStdin: false,
  }).start()

  return {
    add: (bytes) => {
      received += bytes
      const next = formatByteProgress({ label, received, total })
      if (next === text) return
      text = next
      spinner.text = next
    },
    done: () => {
      if (finished) return
      finished = true
      if (spinner.isSpinning) spinner.stop()
      stream.write('\r\u001b[2K')
    },
  }
}
