import {spawn} from 'node:child_process'

import {MuxError} from './errors'
import type {MuxInput, Muxer} from './types'

/** Only the tail of ffmpeg's stderr is kept on failures. */
const MAX_STDERR_LENGTH = 2000

function runFfmpeg(
  ffmpegPath: string,
  args: string[]
): Promise<{exitCode: number | null; stdout: string; stderr: string}> {
  return new Promise((resolve, reject) => {
    const subprocess = spawn(ffmpegPath, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    })
    let stdout = ''
    let stderr = ''

    subprocess.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })
    subprocess.stderr.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-MAX_STDERR_LENGTH)
    })

    // Spawning itself failed, e.g. ENOENT when ffmpeg isn't installed.
    subprocess.on('error', reject)
    subprocess.on('close', exitCode => resolve({exitCode, stdout, stderr}))
  })
}

/**
 * Builds the ffmpeg arguments for a stream-copy mux: the first video track of
 * `videoPath` and the first audio track of `audioPath`, nothing re-encoded.
 */
export function ffmpegMuxArgs({
  videoPath,
  audioPath,
  outputPath,
}: MuxInput): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-y',
    '-i',
    videoPath,
    '-i',
    audioPath,
    '-map',
    '0:v:0',
    '-map',
    '1:a:0',
    '-c',
    'copy',
    '-movflags',
    '+faststart',
    outputPath,
  ]
}

export function createFfmpegMuxer(ffmpegPath = 'ffmpeg'): Muxer {
  return {
    version() {
      return runFfmpeg(ffmpegPath, ['-version'])
        .then(({exitCode, stdout}) => {
          if (exitCode !== 0) return null
          return stdout.split('\n')[0]?.trim() || null
        })
        .catch(() => null)
    },

    async mux(input) {
      const {exitCode, stderr} = await runFfmpeg(
        ffmpegPath,
        ffmpegMuxArgs(input)
      ).catch((error: unknown) => {
        throw new MuxError({
          outputPath: input.outputPath,
          exitCode: null,
          stderr: '',
          cause: error,
        })
      })

      if (exitCode !== 0) {
        throw new MuxError({outputPath: input.outputPath, exitCode, stderr})
      }
    },
  }
}
