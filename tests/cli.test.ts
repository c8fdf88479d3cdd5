import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { PassThrough } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'

import { formatFailure, handlePipeErrors, runCliMain } from '../src/cli-main.js'
import { InputError } from '../src/errors.js'
import { parseDurationFlag, runCli } from '../src/run.js'
import { collectStream, makeTempDir, resultLine, searchPage } from './helpers.js'

function setup() {
  const fetchMock = vi.fn(async (input: string | URL) => {
    const url = typeof input === 'string' ? input : input.toString()
    if (url.startsWith('https://www.youtube.com/results')) {
      return new Response(
        searchPage([resultLine({ id: 'cli0001', title: 'Yesterday', duration: '2:05' })]),
        { headers: { 'Content-Type': 'text/html' } }
      )
    }
    throw new Error(`Unexpected fetch call: ${url}`)
  })
  const stdout = collectStream()
  const stderr = collectStream()
  const home = makeTempDir('getsong-cli-')
  return {
    fetchMock,
    stdout,
    stderr,
    home,
    ctx: {
      env: { HOME: home },
      fetch: fetchMock as unknown as typeof fetch,
      stdout: stdout.stream,
      stderr: stderr.stream,
      platform: 'linux' as const,
    },
  }
}

describe('parseDurationFlag', () => {
  it('accepts positive whole seconds', () => {
    expect(parseDurationFlag(undefined)).toBeNull()
    expect(parseDurationFlag(' 125 ')).toBe(125)
  })

  it('rejects anything else', () => {
    expect(() => parseDurationFlag('0')).toThrow(InputError)
    expect(() => parseDurationFlag('2:05')).toThrow(
      '--duration must be a positive number of seconds (got "2:05")'
    )
  })
})

describe('formatFailure', () => {
  const failure = () => {
    const cause = new Error('inner')
    cause.stack = 'Error: inner\n    at inner.ts:1'
    const error = new Error('outer: inner', { cause })
    error.stack = 'Error: outer: inner\n    at outer.ts:1'
    return error
  }

  it('prints only the message by default', () => {
    expect(formatFailure(failure(), false)).toBe('outer: inner\n')
    expect(formatFailure('plain', false)).toBe('plain\n')
    expect(formatFailure(undefined, true)).toBe('Unknown error\n')
  })

  it('prints each stack in the cause chain when verbose', () => {
    expect(formatFailure(failure(), true)).toBe(
      'Error: outer: inner\n    at outer.ts:1\nCaused by: Error: inner\n    at inner.ts:1\n'
    )
  })
})

describe('cli', () => {
  it('prints the chosen video id without downloading', async () => {
    const { ctx, stdout, stderr } = setup()

    await runCli(['Yesterday', '--artist', 'The Beatles', '--no-download'], ctx)

    expect(stdout.getText()).toBe('cli0001\n')
    expect(stderr.getText()).toBe('')
  })

  it('joins the title words', async () => {
    const { ctx, fetchMock } = setup()

    await runCli(['Hey', 'Jude', '--no-download'], ctx)

    expect(fetchMock).toHaveBeenCalledWith(
      'https://www.youtube.com/results?search_query=%22Provided+to+YouTube%22+Hey+Jude'
    )
  })

  it('turns on verbose output from the config file', async () => {
    const { ctx, home, stderr } = setup()
    mkdirSync(join(home, '.getsong'), { recursive: true })
    writeFileSync(join(home, '.getsong', 'config.json'), JSON.stringify({ verbose: true }), 'utf8')

    await runCli(['Yesterday', '--no-download'], ctx)

    expect(stderr.getText().split('\n')[0]).toBe(
      '[getsong] searching url: https://www.youtube.com/results?search_query=%22Provided+to+YouTube%22+Yesterday'
    )
  })

  it('prints the package version', async () => {
    const { ctx, stdout, fetchMock } = setup()

    await runCli(['--version'], ctx)

    expect(stdout.getText()).toBe('1.0.0\n')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('sets exit code 1 when the title is missing', async () => {
    const { ctx, stderr, fetchMock } = setup()
    const setExitCode = vi.fn()

    await runCliMain({ ...ctx, argv: [], exit: vi.fn(), setExitCode })

    expect(setExitCode).toHaveBeenCalledWith(1)
    expect(stderr.getText()).toBe("missing required argument 'title'\n")
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('reports a bad duration', async () => {
    const { ctx, stderr } = setup()
    const setExitCode = vi.fn()

    await runCliMain({ ...ctx, argv: ['Yesterday', '--duration', 'abc'], exit: vi.fn(), setExitCode })

    expect(setExitCode).toHaveBeenCalledWith(1)
    expect(stderr.getText()).toBe('--duration must be a positive number of seconds (got "abc")\n')
  })

  it('prints the error chain when verbose', async () => {
    const { ctx, stderr } = setup()
    const setExitCode = vi.fn()

    await runCliMain({
      ...ctx,
      argv: ['Yesterday', '--duration', '500', '--no-download', '--verbose'],
      exit: vi.fn(),
      setExitCode,
    })

    const output = stderr.getText()
    expect(setExitCode).toHaveBeenCalledWith(1)
    expect(output).toContain("'Yesterday' duration (125s) is different than expected (500s)\n")
    expect(output).toMatch(/^\w*Error: could not get youtube ID: no matching videos found$/m)
    expect(output).toMatch(/^Caused by: \w*Error: no matching videos found$/m)
  })

  it('exits 0 when the reader closes the pipe', () => {
    const stream = new PassThrough()
    const exit = vi.fn()
    handlePipeErrors(stream, exit)

    stream.emit('error', Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }))

    expect(exit).toHaveBeenCalledWith(0)
  })
})
