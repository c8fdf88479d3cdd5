import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { describe, expect, it, vi } from 'vitest'

import { downloadToFile, parseContentLength } from '../src/media/download.js'
import type { ByteProgress } from '../src/tty/progress.js'
import { makeTempDir } from './helpers.js'

describe('parseContentLength', () => {
  it('parses a declared length and ignores junk', () => {
    expect(parseContentLength('2048')).toBe(2048)
    expect(parseContentLength('0')).toBe(0)
    expect(parseContentLength(null)).toBeNull()
    expect(parseContentLength('unknown')).toBeNull()
  })
})

describe('downloadToFile', () => {
  it('mirrors every byte to the progress sink sized by content length', async () => {
    const filePath = join(makeTempDir('getsong-download-'), 'out.bin')
    const added: number[] = []
    const done = vi.fn()
    const startProgress = vi.fn((_total: number | null): ByteProgress => ({
      add: (bytes) => added.push(bytes),
      done,
    }))
    const fetchMock = vi.fn(
      async () => new Response('hello world', { headers: { 'content-length': '11' } })
    )

    const result = await downloadToFile({
      url: 'https://media.test/file',
      filePath,
      fetchImpl: fetchMock as unknown as typeof fetch,
      startProgress,
    })

    expect(result).toEqual({ bytes: 11 })
    expect(readFileSync(filePath, 'utf8')).toBe('hello world')
    expect(startProgress).toHaveBeenCalledWith(11)
    expect(added.reduce((sum, n) => sum + n, 0)).toBe(11)
    expect(done).toHaveBeenCalledTimes(1)
  })

  it('starts the sink without a total when the length is not declared', async () => {
    const filePath = join(makeTempDir('getsong-download-'), 'out.bin')
    const startProgress = vi.fn((_total: number | null): ByteProgress => ({
      add: () => {},
      done: () => {},
    }))
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('abc'))
        controller.close()
      },
    })
    const fetchMock = vi.fn(async () => new Response(body))

    await downloadToFile({
      url: 'https://media.test/file',
      filePath,
      fetchImpl: fetchMock as unknown as typeof fetch,
      startProgress,
    })

    expect(startProgress).toHaveBeenCalledWith(null)
    expect(readFileSync(filePath, 'utf8')).toBe('abc')
  })
})
