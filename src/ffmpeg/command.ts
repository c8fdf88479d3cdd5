import { execFile } from 'node:child_process'

export type CommandResult = { stdout: string; stderr: string }

/** Runs a binary to completion; rejects on spawn failure or a non-zero exit. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>

export class CommandFailedError extends Error {
  readonly stdout: string
  readonly stderr: string

  constructor({
    command,
    stdout,
    stderr,
    cause,
  }: {
    command: string
    stdout: string
    stderr: string
    cause: unknown
  }) {
    super(`${command} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    this.name = 'CommandFailedError'
    this.stdout = stdout
    this.stderr = stderr
  }
}

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { encoding: 'utf8', maxBuffer: 16 * 1024 * 1024, windowsHide: true },
      (error, stdout, stderr) => {
        if (error) {
          reject(new CommandFailedError({ command, stdout, stderr, cause: error }))
          return
        }
        resolve({ stdout, stderr })
      }
    )
  })
