import YTDlpWrap from 'yt-dlp-wrap'

import type {YtDlpRunner} from './types'

/**
 * Creates the yt-dlp runner used for listing, metadata and downloads. Without
 * a `binaryPath`, `yt-dlp` is looked up on the PATH.
 */
export function createYtDlp(binaryPath?: string): YTDlpWrap {
  return new YTDlpWrap(binaryPath || 'yt-dlp')
}

/**
 * Resolves with yt-dlp's version string, or `null` if yt-dlp can't be run.
 */
export async function getYtDlpVersion(
  ytDlp: YtDlpRunner
): Promise<string | null> {
  return ytDlp
    .execPromise(['--version'])
    .then(stdout => stdout.trim() || null)
    .catch(() => null)
}

/** Arguments for a flat listing of a channel tab, as a single JSON document. */
export function flatPlaylistArgs({
  url,
  mostRecentItemsCount,
}: {
  url: string
  mostRecentItemsCount?: number
}): string[] {
  const playlistEnd =
    mostRecentItemsCount !== undefined
      ? ['--playlist-end', String(mostRecentItemsCount)]
      : []

  return ['--flat-playlist', '-J', ...playlistEnd, url]
}

/** Arguments for the full metadata of one video, formats included. */
export function videoInfoArgs(url: string): string[] {
  return ['-J', '--no-playlist', '--no-warnings', url]
}

/**
 * Downloads a single format of a video to exactly `outputPath`. No muxing
 * happens here: each stream of a pair is fetched on its own.
 */
export async function fetchStream({
  ytDlp,
  url,
  formatId,
  outputPath,
}: {
  ytDlp: YtDlpRunner
  url: string
  formatId: string
  outputPath: string
}): Promise<void> {
  await ytDlp.execPromise([
    '-f',
    formatId,
    '-o',
    outputPath,
    '--no-playlist',
    '--no-part',
    '--no-progress',
    '--force-overwrites',
    '--quiet',
    url,
  ])
}
