import path from 'node:path'

import fs from 'fs-extra'

import {StreamUnavailableError} from './errors'
import {selectStreams} from './streams'
import type {Muxer, StreamFormat, VideoDescriptor, YtDlpRunner} from './types'
import {createUniqueFileName} from './utils'
import {fetchStream} from './ytDlp'

export type DownloadShortInput = {
  descriptor: VideoDescriptor
  directory: string
  ytDlp: YtDlpRunner
  muxer: Muxer
  includeId?: boolean

  /**
   * Lower-cased names of the files already written this run. A Short whose
   * name is taken gets its id appended instead of overwriting the other one.
   * The chosen name is added once the file is written.
   */
  takenFileNames?: Set<string>
}

/**
 * Downloads one Short as a single MP4 in `directory` and returns its path.
 *
 * The selected streams are fetched into hidden temp files next to the output,
 * then muxed without re-encoding. A combined stream is fetched once and
 * remuxed into the MP4 container the same way. Temp files are removed whether
 * or not this succeeds.
 *
 * Throws `StreamUnavailableError` when there is nothing usable or a stream
 * can't be fetched, and `MuxError` when muxing fails.
 */
export async function downloadShort({
  descriptor,
  directory,
  ytDlp,
  muxer,
  includeId,
  takenFileNames = new Set(),
}: DownloadShortInput): Promise<string> {
  const {id, title, url, streams} = descriptor
  const selection = selectStreams(streams)

  if (!selection) {
    throw new StreamUnavailableError(id, describeMissingStreams(streams))
  }

  const fileName = createUniqueFileName({
    id,
    title,
    includeId,
    takenFileNames,
  })
  const outputPath = path.join(directory, fileName)
  const tempPath = (stream: StreamFormat) =>
    path.join(directory, `.${id}.f${stream.formatId}.${stream.ext}`)
  const toFetch =
    selection.type === 'pair'
      ? [selection.video, selection.audio]
      : [selection.stream]
  const [videoPath, audioPath] =
    selection.type === 'pair'
      ? [tempPath(selection.video), tempPath(selection.audio)]
      : [tempPath(selection.stream), tempPath(selection.stream)]

  try {
    for (const stream of toFetch) {
      await fetchStream({
        ytDlp,
        url,
        formatId: stream.formatId,
        outputPath: tempPath(stream),
      }).catch((error: unknown) => {
        throw new StreamUnavailableError(
          id,
          `failed to fetch ${stream.kind} format ${stream.formatId}`,
          {cause: error}
        )
      })
    }

    await muxer.mux({videoPath, audioPath, outputPath}).catch(async error => {
      // Don't leave a half-written file behind under the real name.
      await fs.remove(outputPath)
      throw error
    })
  } finally {
    await Promise.all(toFetch.map(stream => fs.remove(tempPath(stream))))
  }

  takenFileNames.add(fileName.toLowerCase())

  return outputPath
}

function describeMissingStreams(streams: StreamFormat[]): string {
  if (!streams.length) return 'no formats listed'

  const hasVideo = streams.some(s => s.kind === 'video' && s.streamCopy)
  const hasAudio = streams.some(s => s.kind === 'audio' && s.streamCopy)

  if (hasVideo === hasAudio) {
    return 'no video-only, audio-only or combined streams that can be copied into MP4'
  }

  return hasVideo
    ? 'no audio-only stream that can be copied into MP4'
    : 'no video-only stream that can be copied into MP4'
}
