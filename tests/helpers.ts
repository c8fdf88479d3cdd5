import AdmZip from 'adm-zip'
import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'

export function makeTempDir(prefix = 'getsong-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix))
}

export function collectStream() {
  let text = ''
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, getText: () => text }
}

export function resultLine({
  id,
  title,
  duration,
}: {
  id: string
  title: string
  duration: string
}): string {
  return (
    `  <div class="yt-lockup-content"><h3 class="yt-lockup-title "><a href="/watch?v=${id}" ` +
    `class="yt-uix-tile-link" title="${title}" aria-describedby="desc-${id}">${title}</a>` +
    `<span class="accessible-description" id="desc-${id}"> - Duration: ${duration}.</span></h3>` +
    `<div class="yt-lockup-description">Provided to YouTube by Test Label</div></div>  `
  )
}

export function searchPage(lines: string[]): string {
  return ['<!doctype html>', '<html><body>', ...lines, '</body></html>'].join('\n')
}

export type ZipFixtureEntry = { name: string; content?: string; mode?: number }

/**
 * Zip bytes with entries in the given order. `addFile` normalises `../` away,
 * so each name is set back on the entry afterwards to keep it verbatim.
 */
export function buildZip(entries: ZipFixtureEntry[]): Buffer {
  const zip = new AdmZip(undefined, { noSort: true })
  for (const entry of entries) {
    const data = Buffer.from(entry.content ?? '')
    if (entry.mode === undefined) zip.addFile(entry.name, data)
    else zip.addFile(entry.name, data, '', entry.mode)
    const added = zip.getEntries().at(-1)
    if (!added) throw new Error(`zip fixture lost entry ${entry.name}`)
    added.entryName = entry.name
  }
  return zip.toBuffer()
}

export function readZipEntryNames(bytes: Buffer): string[] {
  return new AdmZip(bytes).getEntries().map((entry) => entry.entryName)
}
