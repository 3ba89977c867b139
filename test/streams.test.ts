import {describe, expect, test} from 'vitest'

import {pickBestPair, selectStreams} from '../src/streams'
import {createStreams} from './testUtils'

describe('toStreamFormat', () => {
  test('classifies formats and flags the ones MP4 can hold as-is', () => {
    const streams = createStreams()

    expect(
      streams.map(({formatId, kind, streamCopy, mp4Native}) => [
        formatId,
        kind,
        streamCopy,
        mp4Native,
      ])
    ).toEqual([
      ['sb0', 'none', false, false],
      ['18', 'combined', true, true],
      ['134', 'video', true, true],
      ['136', 'video', true, true],
      ['248', 'video', true, false],
      ['139', 'audio', true, true],
      ['140', 'audio', true, true],
      ['251', 'audio', true, false],
    ])
  })

  test('treats missing or null codecs as "none"', () => {
    const [stream] = createStreams([
      {format_id: 'x', ext: 'mp4', vcodec: null, acodec: 'mp4a.40.2', abr: 64},
    ])

    expect(stream).toEqual({
      formatId: 'x',
      ext: 'mp4',
      kind: 'audio',
      codec: 'mp4a.40.2',
      qualityScore: 64,
      streamCopy: true,
      mp4Native: true,
    })
  })

  test('ranks video by height before frame rate and bitrate', () => {
    const [tall, fast] = createStreams([
      {format_id: 'tall', ext: 'mp4', vcodec: 'avc1', height: 1080, fps: 30, tbr: 100},
      {format_id: 'fast', ext: 'mp4', vcodec: 'avc1', height: 720, fps: 60, tbr: 90_000},
    ])

    expect(tall?.qualityScore).toBeGreaterThan(fast?.qualityScore ?? Infinity)
  })
})

describe('pickBestPair', () => {
  test('prefers the pair MP4 holds natively over higher VP9 and Opus streams', () => {
    const pair = pickBestPair(createStreams())

    expect(pair?.video.formatId).toBe('136')
    expect(pair?.audio.formatId).toBe('140')
  })

  test('never picks a combined stream', () => {
    const pair = pickBestPair(
      createStreams([
        {format_id: '18', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a.40.2', height: 2160},
        {format_id: '134', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 360},
        {format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2', abr: 129},
      ])
    )

    expect(pair?.video.formatId).toBe('134')
  })

  test('keeps the first stream when scores tie', () => {
    const pair = pickBestPair(
      createStreams([
        {format_id: 'a', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 720},
        {format_id: 'b', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 720},
        {format_id: 'c', ext: 'm4a', vcodec: 'none', acodec: 'mp4a', abr: 128},
        {format_id: 'd', ext: 'm4a', vcodec: 'none', acodec: 'mp4a', abr: 128},
      ])
    )

    expect(pair?.video.formatId).toBe('a')
    expect(pair?.audio.formatId).toBe('c')
  })

  test('falls back to VP9 and Opus streams ffmpeg can copy into MP4', () => {
    const pair = pickBestPair(
      createStreams([
        {format_id: '248', ext: 'webm', vcodec: 'vp9', acodec: 'none', height: 1080},
        {format_id: '251', ext: 'webm', vcodec: 'none', acodec: 'opus', abr: 160},
      ])
    )

    expect(pair?.video.formatId).toBe('248')
    expect(pair?.audio.formatId).toBe('251')
  })

  test('mixes codecs when only one side has an MP4-native stream', () => {
    const pair = pickBestPair(
      createStreams([
        {format_id: '136', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 720},
        {format_id: '251', ext: 'webm', vcodec: 'none', acodec: 'opus', abr: 160},
      ])
    )

    expect(pair?.video.formatId).toBe('136')
    expect(pair?.audio.formatId).toBe('251')
  })

  test('returns null without an audio stream that can be copied', () => {
    expect(
      pickBestPair(
        createStreams([
          {format_id: '136', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 720},
          {format_id: 'x', ext: 'webm', vcodec: 'none', acodec: 'vorbis', abr: 160},
        ])
      )
    ).toBeNull()
  })

  test('returns null for an empty list', () => {
    expect(pickBestPair([])).toBeNull()
  })
})

describe('selectStreams', () => {
  test('uses the best pair when there is one', () => {
    expect(selectStreams(createStreams())).toMatchObject({
      type: 'pair',
      video: {formatId: '136'},
      audio: {formatId: '140'},
    })
  })

  test('falls back to the best combined stream', () => {
    const selection = selectStreams(
      createStreams([
        {format_id: '17', ext: '3gp', vcodec: 'mp4v', acodec: 'mp4a.40.2', height: 144},
        {format_id: '18', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a.40.2', height: 360},
        {format_id: '22', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a.40.2', height: 720},
        {format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2', abr: 129},
      ])
    )

    expect(selection).toMatchObject({type: 'combined', stream: {formatId: '22'}})
  })

  test('returns null when nothing can be copied into MP4', () => {
    expect(
      selectStreams(
        createStreams([
          {format_id: '17', ext: '3gp', vcodec: 'mp4v', acodec: 'mp4a.40.2', height: 144},
          {format_id: 'x', ext: 'webm', vcodec: 'none', acodec: 'vorbis', abr: 160},
        ])
      )
    ).toBeNull()
  })
})
