import type {InferIssue} from 'valibot'

import type {YtDlpVideoSchema} from './schemas'

export type StreamKind = 'video' | 'audio' | 'combined' | 'none'

/**
 * One downloadable format of a video, reduced to what stream selection needs.
 */
export type StreamFormat = {
  /** yt-dlp's format id, passed back with `-f` to fetch this stream. */
  formatId: string
  ext: string
  kind: StreamKind

  /**
   * Codec of the track that matters for `kind`: the video codec for `video`
   * and `combined`, the audio codec for `audio`, `"none"` otherwise.
   */
  codec: string

  /** Higher is better. Only comparable between streams of the same kind. */
  qualityScore: number

  /** Whether the stream can go into the MP4 output without re-encoding. */
  streamCopy: boolean

  /** Whether MP4 holds the codec natively (H.264, HEVC, AV1, AAC). */
  mp4Native: boolean
}

export type VideoDescriptor = {
  id: string
  title: string
  description: string
  durationSeconds: number

  /** `null` means YouTube didn't report a count - it is not the same as 0. */
  viewCount: number | null

  url: string
  streams: StreamFormat[]
}

export type MetadataRecord = {
  id: string
  title: string
  description: string

  /** Always derived from `title` and `description`, never set directly. */
  hashtags: string[]
  durationSeconds: number
  viewCount: number | null
}

/**
 * Per-video problems. These never stop the run; they're collected and
 * returned to the caller once every Short has been processed.
 */
export type Failure = {date: number} & (
  | {
      type: 'videoInfo'
      videoId: string
      url: string
      error: Record<string, unknown>
    }
  | {
      type: 'schemaParse'
      schemaName: 'YtDlpVideoSchema'
      videoId: string
      issues: InferIssue<typeof YtDlpVideoSchema>[]
    }
  | {
      type: 'streamUnavailable'
      videoId: string
      title: string
      message: string
    }
  | {
      type: 'mux'
      videoId: string
      title: string
      exitCode: number | null
      stderr: string
    }
  | {
      type: 'generic'
      error: Record<string, unknown>
      context: string
    }
)

/**
 * The slice of `yt-dlp-wrap` this project uses. Anything that can run yt-dlp
 * with a list of arguments and hand back stdout will do.
 */
export type YtDlpRunner = {
  execPromise: (args?: string[]) => Promise<string>
}

export type MuxInput = {
  videoPath: string
  audioPath: string
  outputPath: string
}

/** Combines one video file and one audio file into a single MP4. */
export type Muxer = {
  /** Resolves with the tool's version line, or `null` if it can't be run. */
  version: () => Promise<string | null>
  mux: (input: MuxInput) => Promise<void>
}

export type DownloadYouTubeShortsInput = {
  /** Any channel URL - `/shorts` is appended when missing. */
  channelUrl: string

  /** Where media files and both metadata files are written. */
  directory: string

  /** Adds ` [<id>]` to file names so equal titles can't collide. */
  includeId?: boolean

  /** Only process this many of the newest Shorts. */
  mostRecentItemsCount?: number
  silent?: boolean
  timeZone?: string
  ytDlpPath?: string
  ffmpegPath?: string

  /** Replaces the default `yt-dlp-wrap` instance. */
  ytDlp?: YtDlpRunner

  /** Replaces the default ffmpeg muxer. */
  muxer?: Muxer
}

export type DownloadYouTubeShortsOutput = {
  channelTitle: string

  /** The normalized Shorts URL that was listed. */
  channelUrl: string

  /** One record per listed Short, downloaded or not, in listing order. */
  records: MetadataRecord[]

  /** Paths of the media files written during this run. */
  filesDownloaded: string[]
  failures: Failure[]
  downloadCount: DownloadCount
  jsonPath: string
  csvPath: string
}

export type DownloadCount = {listed: number; downloaded: number; skipped: number}
