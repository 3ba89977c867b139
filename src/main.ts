import path from 'node:path'

import {createLogger, emptyLog, errorToObject, pluralize} from '@qodestack/utils'
import cliProgress from 'cli-progress'
import fs from 'fs-extra'

import {downloadShort} from './downloadShort'
import {
  MissingDependencyError,
  MuxError,
  PersistenceError,
  StreamUnavailableError,
} from './errors'
import {listChannelShorts} from './listChannelShorts'
import {
  METADATA_CSV_FILE_NAME,
  METADATA_JSON_FILE_NAME,
  MetadataRecorder,
} from './metadataRecorder'
import {createFfmpegMuxer} from './mux'
import type {
  DownloadCount,
  DownloadYouTubeShortsInput,
  DownloadYouTubeShortsOutput,
  Failure,
  VideoDescriptor,
} from './types'
import {sanitizeTime} from './utils'
import {createYtDlp, getYtDlpVersion} from './ytDlp'

export async function downloadYouTubeShorts(
  options: DownloadYouTubeShortsInput
): Promise<DownloadYouTubeShortsOutput> {
  const {
    // Required options.
    channelUrl,
    directory,

    // Optional options.
    includeId = false,
    mostRecentItemsCount,
    silent = false,
    timeZone,
    ytDlpPath,
    ffmpegPath,
  } = options

  const log = createLogger({timeZone})
  const logger = silent ? emptyLog : log
  const processStart = performance.now()
  const ytDlp = options.ytDlp ?? createYtDlp(ytDlpPath)
  const muxer = options.muxer ?? createFfmpegMuxer(ffmpegPath)

  /**
   * Per-video problems don't stop the run. They're stored here, logged once
   * the progress bar is done and returned to the caller at the end.
   */
  const failures: Failure[] = []

  /**
   * *********
   * STEP 1: *
   * *********
   * Check for system dependencies.
   *
   * yt-dlp lists the channel and fetches the streams. ffmpeg muxes each video
   * stream with its audio stream. Without either there's nothing to do, so
   * this is the first place the run can end with an error.
   */

  logger.text('Checking for yt-dlp and ffmpeg...')

  const [ytDlpVersion, ffmpegVersion] = await Promise.all([
    getYtDlpVersion(ytDlp),
    muxer.version(),
  ])

  if (ytDlpVersion === null) {
    logger.error('Could not find the `yt-dlp` package on this system.')
    logger.error(
      'Please head to https://github.com/yt-dlp/yt-dlp for download instructions.'
    )
    throw new MissingDependencyError('yt-dlp')
  }

  if (ffmpegVersion === null) {
    logger.error('Could not find the `ffmpeg` package on this system.')
    logger.error(
      'You can download a binary at https://www.ffmpeg.org/download.html or run `brew install ffmpeg`.'
    )
    throw new MissingDependencyError('ffmpeg')
  }

  logger.text(`Using yt-dlp ${ytDlpVersion} and ${ffmpegVersion}`)

  /**
   * *********
   * STEP 2: *
   * *********
   * List the channel's Shorts.
   *
   * Only the flat listing happens here. Full metadata (streams, description,
   * view count) is fetched one video at a time inside the loop below, so a bad
   * channel URL fails fast without touching any video.
   */

  logger.text(`Listing Shorts for ${channelUrl}...`)

  const shorts = await listChannelShorts({
    channelUrl,
    ytDlp,
    failures,
    mostRecentItemsCount,
  })

  logger.text(
    `Found ${pluralize(shorts.total, 'Short')} on "${shorts.channelTitle}" (${shorts.url})`
  )

  if (!shorts.total) {
    logger.text(
      'Nothing to download. Only empty metadata files will be written.'
    )
  }

  /**
   * *********
   * STEP 3: *
   * *********
   * Download each Short and record its metadata.
   *
   * Metadata is recorded for every Short whose details could be fetched,
   * whether or not its download worked. A failed download is recorded and
   * the loop moves on; nothing is retried. Two Shorts whose titles give the
   * same file name don't overwrite each other: the later one gets its id
   * appended.
   */

  await fs.ensureDir(directory).catch((error: unknown) => {
    throw new PersistenceError(directory, {cause: error})
  })

  const recorder = new MetadataRecorder()
  const filesDownloaded: string[] = []
  const takenFileNames = new Set<string>()
  const downloadCount: DownloadCount = {
    listed: shorts.total,
    downloaded: 0,
    skipped: 0,
  }
  const startProcessing = performance.now()
  const downloadProgressBar = silent
    ? null
    : new cliProgress.SingleBar(
        {
          format:
            '👉 {bar} {percentage}% | {value}/{total} | {duration_formatted}',
        },
        cliProgress.Presets.shades_grey
      )

  downloadProgressBar?.start(shorts.total, 0)

  for await (const descriptor of shorts.descriptors) {
    const filePath = await downloadShort({
      descriptor,
      directory,
      ytDlp,
      muxer,
      includeId,
      takenFileNames,
    }).catch((error: unknown) => {
      failures.push(toDownloadFailure(descriptor, error))
      return null
    })

    if (filePath !== null) {
      filesDownloaded.push(filePath)
      downloadCount.downloaded++
    }

    recorder.record(descriptor)
    downloadProgressBar?.increment()
  }

  downloadProgressBar?.update(shorts.total)
  downloadProgressBar?.stop()

  // Logged only now: writing while the bar renders garbles its line.
  failures.forEach(failure => logger.error(describeFailure(failure)))

  downloadCount.skipped = shorts.total - downloadCount.downloaded

  const processingTime = sanitizeTime(performance.now() - startProcessing)
  logger.text(
    `Downloaded ${downloadCount.downloaded}/${pluralize(
      shorts.total,
      'Short'
    )}, skipped ${downloadCount.skipped} [${processingTime}]`
  )

  /**
   * *********
   * STEP 4: *
   * *********
   * Write the metadata files.
   *
   * This happens exactly once, after every Short has been handled. A failure
   * here is fatal: the `PersistenceError` goes straight to the caller.
   */

  const jsonPath = path.join(directory, METADATA_JSON_FILE_NAME)
  const csvPath = path.join(directory, METADATA_CSV_FILE_NAME)

  await recorder.flush({jsonPath, csvPath})

  logger.text(`Saved metadata to ${jsonPath} and ${csvPath}`)
  logger.success(
    `Process complete! [${sanitizeTime(performance.now() - processStart)}]`
  )

  return {
    channelTitle: shorts.channelTitle,
    channelUrl: shorts.url,
    records: [...recorder.records],
    filesDownloaded,
    failures,
    downloadCount,
    jsonPath,
    csvPath,
  }
}

function toDownloadFailure(
  {id, title}: VideoDescriptor,
  error: unknown
): Failure {
  if (error instanceof StreamUnavailableError) {
    return {
      type: 'streamUnavailable',
      videoId: id,
      title,
      message: error.message,
      date: Date.now(),
    }
  }

  if (error instanceof MuxError) {
    return {
      type: 'mux',
      videoId: id,
      title,
      exitCode: error.exitCode,
      stderr: error.stderr,
      date: Date.now(),
    }
  }

  return {
    type: 'generic',
    error: errorToObject(error),
    context: `downloadShort - ${id}`,
    date: Date.now(),
  }
}

/** A one-line, human-readable version of a `Failure`. */
export function describeFailure(failure: Failure): string {
  switch (failure.type) {
    case 'videoInfo':
      return `Skipped ${failure.videoId}: could not fetch video details (${failure.error.message})`
    case 'schemaParse':
      return `Skipped ${failure.videoId}: unexpected yt-dlp output (${pluralize(
        failure.issues.length,
        'issue'
      )})`
    case 'streamUnavailable':
      return `Skipped download of "${failure.title}": ${failure.message}`
    case 'mux':
      return `Skipped download of "${failure.title}": ffmpeg exited with code ${
        failure.exitCode ?? 'none'
      }`
    case 'generic':
      return `Unexpected error (${failure.context}): ${failure.error.message}`
  }
}

export {getConfig, resolveChannelUrl} from './config'
export {
  InvalidSourceError,
  MissingDependencyError,
  MuxError,
  PersistenceError,
  ShortsDownloaderError,
  StreamUnavailableError,
} from './errors'
export {extractHashtags} from './hashtags'
export {MetadataRecorder} from './metadataRecorder'
export {pickBestPair, selectStreams} from './streams'
export {createFileName, sanitizeTitle} from './utils'
export type * from './types'
