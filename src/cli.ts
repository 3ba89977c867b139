import {createInterface} from 'node:readline/promises'

import {createLogger} from '@qodestack/utils'

import {ConfigError, getConfig, resolveChannelUrl, usage} from './config'
import {ShortsDownloaderError} from './errors'
import {describeFailure, downloadYouTubeShorts} from './main'
import type {DownloadYouTubeShortsInput} from './types'

export type CliOptions = Pick<DownloadYouTubeShortsInput, 'ytDlp' | 'muxer'> & {
  env?: NodeJS.ProcessEnv
  prompt?: () => Promise<string>
}

async function promptForChannelUrl(): Promise<string> {
  const rl = createInterface({input: process.stdin, output: process.stdout})

  try {
    return await rl.question(
      'Enter YouTube channel Shorts URL (e.g. https://www.youtube.com/@username/shorts): '
    )
  } finally {
    rl.close()
  }
}

/**
 * Runs the downloader for command line arguments (without the node and script
 * paths). Resolves with 0 once the run completes, per-video failures
 * included. Fatal errors are thrown.
 */
export async function run(
  argv: string[],
  {
    env = process.env,
    prompt = promptForChannelUrl,
    ytDlp,
    muxer,
  }: CliOptions = {}
): Promise<number> {
  const config = getConfig(argv, env)

  if (config.help) {
    console.log(usage)
    return 0
  }

  const channelUrl = await resolveChannelUrl({
    argument: config.channelUrl,
    prompt,
  })

  const {failures, ...results} = await downloadYouTubeShorts({
    channelUrl,
    directory: config.directory,
    includeId: config.includeId,
    mostRecentItemsCount: config.mostRecentItemsCount,
    silent: config.silent,
    timeZone: config.timeZone,
    ytDlpPath: config.ytDlpPath,
    ffmpegPath: config.ffmpegPath,
    ytDlp,
    muxer,
  })

  if (!config.silent) {
    console.log('\nRESULTS:')
    console.table({
      channel: results.channelTitle,
      ...results.downloadCount,
      json: results.jsonPath,
      csv: results.csvPath,
    })

    if (failures.length) {
      console.log('\nFAILURES:')
      console.table(failures.map(describeFailure))
    }
  }

  return 0
}

/**
 * `run`, with fatal errors printed and turned into exit code 1. Bad flags
 * print the usage text as well.
 */
export async function runCli(
  argv: string[],
  options?: CliOptions
): Promise<number> {
  return run(argv, options).catch((error: unknown) => {
    const log = createLogger({})

    if (error instanceof ConfigError) {
      log.error(error.message)
      console.error(usage)
    } else if (error instanceof ShortsDownloaderError) {
      log.error(error.message)
    } else {
      console.error(error)
    }

    return 1
  })
}
