import {describe, expect, test, vi} from 'vitest'

import {
  ConfigError,
  DEFAULT_OUTPUT_DIR,
  getConfig,
  resolveChannelUrl,
} from '../src/config'
import {InvalidSourceError} from '../src/errors'

describe('getConfig', () => {
  test('defaults', () => {
    expect(getConfig([], {})).toEqual({
      channelUrl: undefined,
      directory: DEFAULT_OUTPUT_DIR,
      includeId: false,
      mostRecentItemsCount: undefined,
      silent: false,
      timeZone: undefined,
      ytDlpPath: undefined,
      ffmpegPath: undefined,
      help: false,
    })
  })

  test('reads every flag', () => {
    const config = getConfig(
      [
        'https://www.youtube.com/@someone',
        '-o',
        'out',
        '-n',
        '5',
        '--include-id',
        '--silent',
        '--time-zone',
        'Europe/Berlin',
      ],
      {}
    )

    expect(config).toMatchObject({
      channelUrl: 'https://www.youtube.com/@someone',
      directory: 'out',
      includeId: true,
      mostRecentItemsCount: 5,
      silent: true,
      timeZone: 'Europe/Berlin',
    })
  })

  test('reads long flag names', () => {
    expect(getConfig(['--output', 'out', '--limit', '3'], {})).toMatchObject({
      directory: 'out',
      mostRecentItemsCount: 3,
    })
  })

  test('falls back to the environment', () => {
    const env = {
      SHORTS_OUTPUT_DIR: 'env-dir',
      YT_DLP_PATH: '/opt/bin/yt-dlp',
      FFMPEG_PATH: '/opt/bin/ffmpeg',
    }

    expect(getConfig([], env)).toMatchObject({
      directory: 'env-dir',
      ytDlpPath: '/opt/bin/yt-dlp',
      ffmpegPath: '/opt/bin/ffmpeg',
    })
    expect(getConfig(['-o', 'flag-dir'], env).directory).toBe('flag-dir')
  })

  test('help', () => {
    expect(getConfig(['-h'], {}).help).toBe(true)
    expect(getConfig(['--help'], {}).help).toBe(true)
  })

  test.each(['0', '2.5', 'ten'])('rejects --limit %s', limit => {
    expect(() => getConfig(['--limit', limit], {})).toThrow(
      `--limit must be a positive integer, got "${limit}"`
    )
  })

  test('rejects unknown flags', () => {
    expect(() => getConfig(['--verbose'], {})).toThrow(ConfigError)
    expect(() => getConfig(['--verbose'], {})).toThrow('Unknown option: --verbose')
  })

  test('rejects more than one channel URL', () => {
    expect(() => getConfig(['one', 'two'], {})).toThrow(
      'Expected one channel URL, got 2'
    )
  })
})

describe('resolveChannelUrl', () => {
  test('uses the argument without prompting', async () => {
    const prompt = vi.fn(async () => 'https://www.youtube.com/@prompted')

    await expect(
      resolveChannelUrl({argument: ' https://www.youtube.com/@arg ', prompt})
    ).resolves.toBe('https://www.youtube.com/@arg')
    expect(prompt).not.toHaveBeenCalled()
  })

  test('prompts when there is no argument', async () => {
    const prompt = vi.fn(async () => ' https://www.youtube.com/@prompted\n')

    await expect(resolveChannelUrl({argument: undefined, prompt})).resolves.toBe(
      'https://www.youtube.com/@prompted'
    )
    expect(prompt).toHaveBeenCalledTimes(1)
  })

  test('an empty answer is an InvalidSourceError', async () => {
    await expect(
      resolveChannelUrl({argument: '', prompt: async () => '   '})
    ).rejects.toBeInstanceOf(InvalidSourceError)
  })
})
