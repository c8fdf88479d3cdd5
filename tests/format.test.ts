import { describe, expect, it } from 'vitest'

import { formatByteProgress, formatBytes } from '../src/tty/format.js'
import { startByteProgress } from '../src/tty/progress.js'
import { collectStream } from './helpers.js'

describe('formatBytes', () => {
  it('renders bytes, kilobytes and megabytes', () => {
    expect(formatBytes(0)).toBe('0 B')
    expect(formatBytes(1023)).toBe('1023 B')
    expect(formatBytes(1024)).toBe('1.0 KB')
    expect(formatBytes(1536)).toBe('1.5 KB')
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MB')
    expect(formatBytes(3 * 1024 ** 3)).toBe('3.0 GB')
  })
})

describe('formatByteProgress', () => {
  it('shows received, total and percentage when the total is known', () => {
    expect(formatByteProgress({ label: 'Downloading audio', received: 1536, total: 3072 })).toBe(
      'Downloading audio 1.5 KB / 3.0 KB (50%)'
    )
  })

  it('never goes past 100%', () => {
    expect(formatByteProgress({ label: 'x', received: 2048, total: 1024 })).toBe(
      'x 2.0 KB / 1.0 KB (100%)'
    )
  })

  it('degrades to a count for an unknown or zero total', () => {
    expect(formatByteProgress({ label: 'Downloading ffmpeg', received: 512, total: null })).toBe(
      'Downloading ffmpeg 512 B'
    )
    expect(formatByteProgress({ label: 'Downloading ffmpeg', received: 512, total: 0 })).toBe(
      'Downloading ffmpeg 512 B'
    )
  })
})

describe('startByteProgress', () => {
  it('writes nothing when disabled', () => {
    const { stream, getText } = collectStream()
    const progress = startByteProgress({ label: 'x', total: 10, enabled: false, stream })
    progress.add(5)
    progress.done()
    expect(getText()).toBe('')
  })
})
