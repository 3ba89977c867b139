import type {InferOutput} from 'valibot'

import type {YtDlpFormatSchema} from './schemas'
import type {StreamFormat, StreamKind} from './types'

/**
 * Codec prefixes an MP4 container holds natively. These are tried first, the
 * same preference as yt-dlp's `bestvideo[ext=mp4]+bestaudio[ext=m4a]`.
 */
const MP4_NATIVE_VIDEO_CODECS = ['avc1', 'hev1', 'hvc1', 'av01']
const MP4_NATIVE_AUDIO_CODECS = ['mp4a']

/** Codecs ffmpeg can also stream-copy into MP4 (`-c copy`). */
const MP4_COPY_VIDEO_CODECS = [...MP4_NATIVE_VIDEO_CODECS, 'vp9', 'vp09']
const MP4_COPY_AUDIO_CODECS = [...MP4_NATIVE_AUDIO_CODECS, 'opus']

export type StreamPair = {video: StreamFormat; audio: StreamFormat}

type YtDlpFormat = InferOutput<typeof YtDlpFormatSchema>

function isCodecIn(codec: string, prefixes: string[]): boolean {
  const lowerCodec = codec.toLowerCase()
  return prefixes.some(prefix => lowerCodec.startsWith(prefix))
}

function getKind({vcodec, acodec}: YtDlpFormat): StreamKind {
  const hasVideo = vcodec !== 'none'
  const hasAudio = acodec !== 'none'

  if (hasVideo && hasAudio) return 'combined'
  if (hasVideo) return 'video'
  if (hasAudio) return 'audio'
  return 'none'
}

/**
 * Video streams rank by height, then frame rate, then total bitrate. The
 * weights keep each component from spilling into the one above it.
 */
function getVideoScore({height, fps, tbr}: YtDlpFormat): number {
  return (
    (height ?? 0) * 1e8 +
    Math.round(fps ?? 0) * 1e5 +
    Math.min(Math.round(tbr ?? 0), 99_999)
  )
}

function getAudioScore({abr, tbr}: YtDlpFormat): number {
  return abr ?? tbr ?? 0
}

/** Maps a yt-dlp `formats` entry onto a `StreamFormat`. */
export function toStreamFormat(format: YtDlpFormat): StreamFormat {
  const kind = getKind(format)
  const {format_id: formatId, ext, vcodec, acodec} = format
  const base = {formatId, ext, kind}

  switch (kind) {
    case 'video':
      return {
        ...base,
        codec: vcodec,
        qualityScore: getVideoScore(format),
        streamCopy: isCodecIn(vcodec, MP4_COPY_VIDEO_CODECS),
        mp4Native: isCodecIn(vcodec, MP4_NATIVE_VIDEO_CODECS),
      }
    case 'audio':
      return {
        ...base,
        codec: acodec,
        qualityScore: getAudioScore(format),
        streamCopy: isCodecIn(acodec, MP4_COPY_AUDIO_CODECS),
        mp4Native: isCodecIn(acodec, MP4_NATIVE_AUDIO_CODECS),
      }
    case 'combined':
      return {
        ...base,
        codec: vcodec,
        qualityScore: getVideoScore(format),
        streamCopy:
          isCodecIn(vcodec, MP4_COPY_VIDEO_CODECS) &&
          isCodecIn(acodec, MP4_COPY_AUDIO_CODECS),
        mp4Native:
          isCodecIn(vcodec, MP4_NATIVE_VIDEO_CODECS) &&
          isCodecIn(acodec, MP4_NATIVE_AUDIO_CODECS),
      }
    case 'none':
      return {
        ...base,
        codec: 'none',
        qualityScore: 0,
        streamCopy: false,
        mp4Native: false,
      }
  }
}

function pickBest(
  streams: StreamFormat[],
  kind: StreamKind,
  isEligible: (stream: StreamFormat) => boolean
): StreamFormat | null {
  return streams.reduce<StreamFormat | null>((best, stream) => {
    if (stream.kind !== kind || !isEligible(stream)) return best

    // Strictly greater - on a tie the stream listed first wins.
    return !best || stream.qualityScore > best.qualityScore ? stream : best
  }, null)
}

/**
 * Picks a video-only and an audio-only stream to mux. A pair MP4 holds
 * natively wins; otherwise the best streams of any codec ffmpeg can copy
 * into MP4 (VP9, Opus) are used. Returns `null` when either half is missing.
 * Combined (progressive) streams are never part of a pair.
 */
export function pickBestPair(streams: StreamFormat[]): StreamPair | null {
  for (const isEligible of [
    (stream: StreamFormat) => stream.mp4Native,
    (stream: StreamFormat) => stream.streamCopy,
  ]) {
    const video = pickBest(streams, 'video', isEligible)
    const audio = pickBest(streams, 'audio', isEligible)

    if (video && audio) return {video, audio}
  }

  return null
}

export type StreamSelection =
  | ({type: 'pair'} & StreamPair)
  | {type: 'combined'; stream: StreamFormat}

/**
 * What `downloadShort` fetches: the best pair, or the best copyable combined
 * stream when no pair exists.
 */
export function selectStreams(
  streams: StreamFormat[]
): StreamSelection | null {
  const pair = pickBestPair(streams)
  if (pair) return {type: 'pair', ...pair}

  const combined = pickBest(streams, 'combined', stream => stream.streamCopy)
  return combined ? {type: 'combined', stream: combined} : null
}
