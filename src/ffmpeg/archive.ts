import { chmod, mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import AdmZip from 'adm-zip'
import { IllegalArchivePathError } from '../errors.js'

function unixMode(entry: AdmZip.IZipEntry): number | null {
  const mode = (entry.header.attr >>> 16) & 0o7777
  return mode === 0 ? null : mode
}

/** True when `target` lies strictly inside `root` (both already resolved). */
export function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target)
  return (
    relative.length > 0 &&
    relative !== '..' &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  )
}

/**
 * Extracts every entry of the zip at `source` into `destination` and returns
 * the written paths in archive order.
 *
 * An entry that would land outside `destination` aborts the whole call with
 * IllegalArchivePathError before anything is written for it. Entries written
 * earlier in the same call are left in place.
 */
export async function extractZip(source: string, destination: string): Promise<string[]> {
  const zip = new AdmZip(source)
  const root = path.resolve(destination)
  const extracted: string[] = []

  for (const entry of zip.getEntries()) {
    const target = path.resolve(root, entry.entryName)
    if (!isInside(root, target)) throw new IllegalArchivePathError(target)

    extracted.push(target)
    if (entry.isDirectory) {
      await mkdir(target, { recursive: true })
      continue
    }

    await mkdir(path.dirname(target), { recursive: true })
    await writeFile(target, entry.getData())
    const mode = unixMode(entry)
    if (mode !== null && process.platform !== 'win32') await chmod(target, mode)
  }
  return extracted
}
