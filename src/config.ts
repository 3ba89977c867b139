import minimist from 'minimist'

import {InvalidSourceError, ShortsDownloaderError} from './errors'

export const DEFAULT_OUTPUT_DIR = 'downloads'

export type CliConfig = {
  /** The positional channel URL, if one was given. */
  channelUrl: string | undefined
  directory: string
  includeId: boolean
  mostRecentItemsCount: number | undefined
  silent: boolean
  timeZone: string | undefined
  ytDlpPath: string | undefined
  ffmpegPath: string | undefined
  help: boolean
}

export const usage = `Usage: dl-yt-shorts [channelUrl] [options]

Downloads every Short of a YouTube channel plus shorts_metadata.json and
shorts_metadata.csv. Without a channel URL you will be prompted for one.

Options:
  -o, --output <dir>     Output directory (default: $SHORTS_OUTPUT_DIR or "${DEFAULT_OUTPUT_DIR}")
  -n, --limit <count>    Only process the newest <count> Shorts
      --include-id       Add " [<video id>]" to file names
      --silent           No logging or progress bar
      --time-zone <tz>   Time zone for log timestamps, e.g. "Europe/Berlin"
  -h, --help             Show this message

Environment:
  SHORTS_OUTPUT_DIR, YT_DLP_PATH, FFMPEG_PATH`

const knownFlags = new Set([
  'output',
  'o',
  'limit',
  'n',
  'include-id',
  'silent',
  'time-zone',
  'help',
  'h',
])

/** Bad command line flags. */
export class ConfigError extends ShortsDownloaderError {}

/**
 * Builds the run configuration from command line arguments (without the node
 * and script paths) and the environment. Flags win over environment variables.
 */
export function getConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const args = minimist<{
    output?: string
    limit?: string
    'time-zone'?: string
    'include-id': boolean
    silent: boolean
    help: boolean
  }>(argv, {
    string: ['output', 'limit', 'time-zone'],
    boolean: ['include-id', 'silent', 'help'],
    alias: {o: 'output', n: 'limit', h: 'help'},
  })

  const unknownFlags = Object.keys(args).filter(
    key => key !== '_' && !knownFlags.has(key)
  )

  if (unknownFlags.length) {
    throw new ConfigError(`Unknown option: --${unknownFlags.join(', --')}`)
  }

  const [channelUrl, ...extra] = args._.map(String)

  if (extra.length) {
    throw new ConfigError(`Expected one channel URL, got ${args._.length}`)
  }

  return {
    channelUrl,
    directory: args.output || env.SHORTS_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    includeId: args['include-id'],
    mostRecentItemsCount: parseLimit(args.limit),
    silent: args.silent,
    timeZone: args['time-zone'] || undefined,
    ytDlpPath: env.YT_DLP_PATH || undefined,
    ffmpegPath: env.FFMPEG_PATH || undefined,
    help: args.help,
  }
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined

  const limit = Number(value)

  if (!Number.isInteger(limit) || limit < 1) {
    throw new ConfigError(`--limit must be a positive integer, got "${value}"`)
  }

  return limit
}

/**
 * Decides which channel URL to use: the explicit argument if there is one,
 * otherwise whatever `prompt` returns. An empty answer is an
 * `InvalidSourceError`.
 */
export async function resolveChannelUrl({
  argument,
  prompt,
}: {
  argument: string | undefined
  prompt: () => Promise<string>
}): Promise<string> {
  const channelUrl = argument?.trim() || (await prompt()).trim()

  if (!channelUrl) {
    throw new InvalidSourceError(channelUrl, 'no URL provided')
  }

  return channelUrl
}
