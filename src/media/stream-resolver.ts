import ytdl from '@distube/ytdl-core'

export type StreamFormat = {
  /** kbps; 0 when the format carries no audio */
  audioBitrate: number
  hasVideoEncoding: boolean
  /** container extension without the dot, e.g. `webm` */
  extension: string
}

/**
 * Turns a video identifier into its available formats and, for a chosen
 * format, a direct (time-limited) download URL.
 */
export interface StreamResolver<F extends StreamFormat = StreamFormat> {
  getFormats(identifier: string): Promise<F[]>
  getDownloadUrl(format: F): Promise<string>
}

export type YtdlStreamFormat = StreamFormat & { url: string; itag: number }

export function createYtdlStreamResolver(): StreamResolver<YtdlStreamFormat> {
  return {
    async getFormats(identifier) {
      const info = await ytdl.getInfo(identifier)
      return info.formats.map((format) => ({
        itag: format.itag,
        url: format.url,
        audioBitrate: format.audioBitrate ?? 0,
        hasVideoEncoding: format.hasVideo,
        extension: format.container,
      }))
    },
    async getDownloadUrl(format) {
      if (!format.url) throw new Error(`format ${format.itag} has no url`)
      return format.url
    },
  }
}
