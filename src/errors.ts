/**
 * Every error this package throws on purpose extends `ShortsDownloaderError`.
 * Two groups exist:
 *
 * - Fatal: `MissingDependencyError`, `InvalidSourceError` and
 *   `PersistenceError` stop the run and surface to the caller.
 * - Per-video: `StreamUnavailableError` and `MuxError` are caught by the
 *   driver, stored as a `Failure` and the loop moves on to the next Short.
 */
export class ShortsDownloaderError extends Error {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = new.target.name
  }
}

/** `yt-dlp` or `ffmpeg` could not be executed on this system. */
export class MissingDependencyError extends ShortsDownloaderError {
  readonly dependency: 'yt-dlp' | 'ffmpeg'

  constructor(dependency: 'yt-dlp' | 'ffmpeg', options?: {cause?: unknown}) {
    super(`Could not find \`${dependency}\` on this system.`, options)
    this.dependency = dependency
  }
}

/** The URL is not a channel, or the channel's Shorts could not be listed. */
export class InvalidSourceError extends ShortsDownloaderError {
  readonly url: string

  constructor(url: string, reason: string, options?: {cause?: unknown}) {
    super(`Invalid channel source "${url}": ${reason}`, options)
    this.url = url
  }
}

export class StreamUnavailableError extends ShortsDownloaderError {
  readonly videoId: string

  constructor(videoId: string, reason: string, options?: {cause?: unknown}) {
    super(`No usable streams for ${videoId}: ${reason}`, options)
    this.videoId = videoId
  }
}

export class MuxError extends ShortsDownloaderError {
  readonly outputPath: string
  readonly exitCode: number | null
  readonly stderr: string

  constructor({
    outputPath,
    exitCode,
    stderr,
    cause,
  }: {
    outputPath: string
    exitCode: number | null
    stderr: string
    cause?: unknown
  }) {
    super(
      `ffmpeg failed to mux ${outputPath} (exit code ${exitCode ?? 'none'})`,
      {cause}
    )
    this.outputPath = outputPath
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

export class PersistenceError extends ShortsDownloaderError {
  readonly filePath: string

  constructor(filePath: string, options?: {cause?: unknown}) {
    super(`Unable to write ${filePath}`, options)
    this.filePath = filePath
  }
}
