import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'

export type GetSongConfig = {
  verbose?: boolean
  progress?: boolean
  outputDir?: string
}

type JsonRecord = Record<string, unknown>

function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function resolveHomeDir(
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform
): string | null {
  if (platform === 'win32') {
    const drivePath = `${env.HOMEDRIVE ?? ''}${env.HOMEPATH ?? ''}`
    if (drivePath) return drivePath
    return env.USERPROFILE?.trim() || null
  }
  return env.HOME?.trim() || null
}

/** `~/.getsong`; holds config.json and the downloaded ffmpeg. */
export function resolveGetSongDir(
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform
): string | null {
  const home = resolveHomeDir(env, platform)
  return home ? join(home, '.getsong') : null
}

function readOptionalBoolean(record: JsonRecord, key: string, path: string): boolean | undefined {
  const value = record[key]
  if (value === undefined) return undefined
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid config file ${path}: "${key}" must be a boolean.`)
  }
  return value
}

function readOptionalString(record: JsonRecord, key: string, path: string): string | undefined {
  const value = record[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`Invalid config file ${path}: "${key}" must be a non-empty string.`)
  }
  return value
}

export function parseGetSongConfig(raw: unknown, path: string): GetSongConfig {
  if (!isJsonRecord(raw)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level.`)
  }
  const config: GetSongConfig = {}
  const verbose = readOptionalBoolean(raw, 'verbose', path)
  const progress = readOptionalBoolean(raw, 'progress', path)
  const outputDir = readOptionalString(raw, 'outputDir', path)
  if (verbose !== undefined) config.verbose = verbose
  if (progress !== undefined) config.progress = progress
  if (outputDir !== undefined) config.outputDir = outputDir
  return config
}

export function loadGetSongConfig({
  env,
  platform,
}: {
  env: Record<string, string | undefined>
  platform?: NodeJS.Platform
}): { path: string | null; config: GetSongConfig | null } {
  const dir = resolveGetSongDir(env, platform)
  if (!dir) return { path: null, config: null }
  const path = join(dir, 'config.json')
  if (!existsSync(path)) return { path, config: null }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`, { cause: error })
  }
  return { path, config: parseGetSongConfig(raw, path) }
}
