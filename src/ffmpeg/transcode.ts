import { rm } from 'node:fs/promises'
import path from 'node:path'
import { TranscodeError } from '../errors.js'
import { silentLog, type VerboseLog } from '../logging.js'
import type { CommandRunner } from './command.js'
import { CommandFailedError, runCommand as defaultRunCommand } from './command.js'
import type { BinaryLocation } from './resolve.js'

export function replaceExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath)
  return path.join(parsed.dir, `${parsed.name}.${extension}`)
}

/**
 * `ffmpeg -i <input> -y <input>.mp3`. The input is deleted only after ffmpeg
 * exits cleanly; on failure ffmpeg's own output becomes the error message.
 */
export async function convertToMp3({
  ffmpeg,
  inputPath,
  runCommand = defaultRunCommand,
  log = silentLog,
}: {
  ffmpeg: BinaryLocation
  inputPath: string
  runCommand?: CommandRunner
  log?: VerboseLog
}): Promise<string> {
  const outputPath = replaceExtension(inputPath, 'mp3')
  if (outputPath === inputPath) return outputPath

  log(`converting ${inputPath} to ${outputPath}`)
  try {
    await runCommand(ffmpeg, ['-i', inputPath, '-y', outputPath])
  } catch (error) {
    if (error instanceof CommandFailedError) {
      throw new TranscodeError({ message: error.message, output: `${error.stdout}${error.stderr}` })
    }
    throw error
  }

  await rm(inputPath, { force: true })
  return outputPath
}
