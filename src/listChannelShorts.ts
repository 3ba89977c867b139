import {errorToObject} from '@qodestack/utils'
import {safeParse} from 'valibot'

import {InvalidSourceError} from './errors'
import {YtDlpPlaylistSchema, YtDlpVideoSchema} from './schemas'
import {toStreamFormat} from './streams'
import type {Failure, VideoDescriptor, YtDlpRunner} from './types'
import {flatPlaylistArgs, videoInfoArgs} from './ytDlp'

/**
 * The first path segment(s) that identify a channel. Everything after them is
 * a tab (`/videos`, `/shorts`, `/streams`, ...).
 */
const channelPathRegex = /^\/(@[^/]+|channel\/[^/]+|c\/[^/]+|user\/[^/]+)/

export type ChannelShorts = {
  channelTitle: string

  /** The normalized URL that was listed. */
  url: string

  /** Number of entries the listing returned. */
  total: number

  /**
   * Lazily resolves each listed Short's full metadata, one yt-dlp call per
   * `next()`. Like any generator it can only be iterated once.
   */
  descriptors: AsyncGenerator<VideoDescriptor, void, undefined>
}

/**
 * Validates a channel URL and points it at the channel's Shorts tab, e.g.
 * `https://youtube.com/@someone/videos?x=1` becomes
 * `https://youtube.com/@someone/shorts`.
 */
export function normalizeShortsUrl(input: string): string {
  const trimmed = input.trim()
  const withScheme = /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`
  const url = (() => {
    try {
      return new URL(withScheme)
    } catch {
      throw new InvalidSourceError(input, 'not a valid URL')
    }
  })()

  const isYouTubeHost =
    url.hostname === 'youtube.com' || url.hostname.endsWith('.youtube.com')

  if (!['http:', 'https:'].includes(url.protocol) || !isYouTubeHost) {
    throw new InvalidSourceError(input, 'not a YouTube URL')
  }

  const channelPath = url.pathname.match(channelPathRegex)?.[1]

  if (!channelPath) {
    throw new InvalidSourceError(input, 'not a channel URL')
  }

  return `${url.protocol}//${url.host}/${channelPath}/shorts`
}

/**
 * Lists a channel's Shorts. The listing itself happens up front so a bad
 * source fails with `InvalidSourceError` before anything is processed. Full
 * metadata for each Short is only fetched as the returned generator is
 * consumed.
 *
 * Shorts whose metadata can't be fetched or parsed are pushed to `failures`
 * and skipped.
 */
export async function listChannelShorts({
  channelUrl,
  ytDlp,
  failures,
  mostRecentItemsCount,
}: {
  channelUrl: string
  ytDlp: YtDlpRunner
  failures: Failure[]
  mostRecentItemsCount?: number
}): Promise<ChannelShorts> {
  const url = normalizeShortsUrl(channelUrl)
  const stdout = await ytDlp
    .execPromise(flatPlaylistArgs({url, mostRecentItemsCount}))
    .catch((error: unknown) => {
      throw new InvalidSourceError(url, 'yt-dlp could not list this channel', {
        cause: error,
      })
    })

  const parsedResults = safeParse(YtDlpPlaylistSchema, parseJson(stdout))

  if (!parsedResults.success) {
    throw new InvalidSourceError(url, 'yt-dlp did not return a Shorts listing')
  }

  const {title, entries} = parsedResults.output
  const selectedEntries =
    mostRecentItemsCount !== undefined
      ? entries.slice(0, mostRecentItemsCount)
      : entries

  async function* genDescriptors(): AsyncGenerator<
    VideoDescriptor,
    void,
    undefined
  > {
    for (const entry of selectedEntries) {
      const entryUrl = entry.url ?? `https://www.youtube.com/shorts/${entry.id}`
      const descriptor = await genVideoDescriptor({
        id: entry.id,
        url: entryUrl,
        ytDlp,
        failures,
      })

      if (descriptor) yield descriptor
    }
  }

  return {
    channelTitle: title,
    url,
    total: selectedEntries.length,
    descriptors: genDescriptors(),
  }
}

/**
 * Fetches and validates the full yt-dlp metadata for one video. Returns `null`
 * after recording a `Failure` if that isn't possible.
 */
export async function genVideoDescriptor({
  id,
  url,
  ytDlp,
  failures,
}: {
  id: string
  url: string
  ytDlp: YtDlpRunner
  failures: Failure[]
}): Promise<VideoDescriptor | null> {
  let stdout: string

  try {
    stdout = await ytDlp.execPromise(videoInfoArgs(url))
  } catch (error) {
    failures.push({
      type: 'videoInfo',
      videoId: id,
      url,
      error: errorToObject(error),
      date: Date.now(),
    })

    return null
  }

  const parsedResults = safeParse(YtDlpVideoSchema, parseJson(stdout))

  if (!parsedResults.success) {
    failures.push({
      type: 'schemaParse',
      schemaName: 'YtDlpVideoSchema',
      videoId: id,
      issues: parsedResults.issues,
      date: Date.now(),
    })

    return null
  }

  const {output} = parsedResults
  const viewCount = output.view_count

  return {
    id: output.id,
    title: output.title,
    description: output.description,
    durationSeconds: Math.max(0, Math.round(output.duration ?? 0)),
    viewCount:
      viewCount === null || viewCount === undefined
        ? null
        : Math.max(0, Math.round(viewCount)),
    url: output.webpage_url ?? url,
    streams: output.formats.map(toStreamFormat),
  }
}

/**
 * yt-dlp prints one JSON document with `-J`. Anything that isn't JSON is
 * handed to the schema as-is so it fails validation like any other bad shape.
 */
function parseJson(stdout: string): unknown {
  try {
    return JSON.parse(stdout)
  } catch {
    return stdout
  }
}
