import { createWriteStream } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { Readable, Transform } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { HttpStatusError } from '../errors.js'
import { type ByteProgress, noopByteProgress } from '../tty/progress.js'

export function parseContentLength(raw: string | null): number | null {
  if (!raw) return null
  const value = Number.parseInt(raw, 10)
  return Number.isFinite(value) && value >= 0 ? value : null
}

/**
 * Streams `url` into `filePath`. A non-2xx status throws before the file is
 * created; a failure mid-stream leaves the partial file in place.
 */
export async function downloadToFile({
  url,
  filePath,
  fetchImpl,
  startProgress,
}: {
  url: string
  filePath: string
  fetchImpl: typeof fetch
  startProgress?: (total: number | null) => ByteProgress
}): Promise<{ bytes: number }> {
  const response = await fetchImpl(url)
  if (!response.ok) {
    await response.body?.cancel()
    throw new HttpStatusError({ status: response.status, url })
  }

  const body = response.body
  if (!body) {
    await writeFile(filePath, new Uint8Array(0))
    return { bytes: 0 }
  }

  const total = parseContentLength(response.headers.get('content-length'))
  const progress = startProgress ? startProgress(total) : noopByteProgress
  let bytes = 0
  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      bytes += chunk.length
      progress.add(chunk.length)
      callback(null, chunk)
    },
  })

  try {
    await pipeline(Readable.fromWeb(body), counter, createWriteStream(filePath))
  } finally {
    progress.done()
  }
  return { bytes }
}
