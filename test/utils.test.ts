import {describe, expect, test} from 'vitest'

import {
  createFileName,
  createUniqueFileName,
  sanitizeTime,
  sanitizeTitle,
  truncateToBytes,
} from '../src/utils'

describe('sanitizeTitle', () => {
  test('replaces path separators but keeps hashtags and emoji', () => {
    expect(sanitizeTitle('A/B #test 😀')).toBe('A B #test 😀')
  })

  test('replaces every character that is illegal on common filesystems', () => {
    expect(sanitizeTitle('What? <No> "Way" | a:b*c\\d')).toBe(
      'What No Way a b c d'
    )
  })

  test('trims surrounding spaces and dots', () => {
    expect(sanitizeTitle('  ..hello world..  ')).toBe('hello world')
  })

  test('caps the name at 200 bytes without splitting characters', () => {
    expect(sanitizeTitle('a'.repeat(300))).toBe('a'.repeat(200))
    expect(sanitizeTitle('😀'.repeat(60))).toBe('😀'.repeat(50))
  })
})

describe('truncateToBytes', () => {
  test('leaves short strings alone', () => {
    expect(truncateToBytes('short', 10)).toBe('short')
  })

  test('drops whole multi-byte characters', () => {
    // "é" is 2 bytes in UTF-8.
    expect(truncateToBytes('ééé', 5)).toBe('éé')
  })
})

describe('createFileName', () => {
  test('uses the sanitized title with an mp4 extension', () => {
    expect(createFileName({id: 'abc', title: 'A/B #test 😀'})).toBe(
      'A B #test 😀.mp4'
    )
  })

  test('adds the id in brackets when asked to', () => {
    expect(
      createFileName({id: 'abc', title: 'Same title', includeId: true})
    ).toBe('Same title [abc].mp4')
  })

  test('falls back to the id when nothing of the title survives', () => {
    expect(createFileName({id: 'xyz', title: '...'})).toBe('xyz.mp4')
    expect(createFileName({id: 'xyz', title: '///', includeId: true})).toBe(
      'xyz.mp4'
    )
  })
})

describe('createUniqueFileName', () => {
  test('keeps the plain name while it is free', () => {
    expect(
      createUniqueFileName({
        id: 'a2',
        title: '#shorts',
        takenFileNames: new Set(['other.mp4']),
      })
    ).toBe('#shorts.mp4')
  })

  test('adds the id when the name is taken', () => {
    expect(
      createUniqueFileName({
        id: 'a2',
        title: '#shorts',
        takenFileNames: new Set(['#shorts.mp4']),
      })
    ).toBe('#shorts [a2].mp4')
  })

  test('compares names case-insensitively', () => {
    expect(
      createUniqueFileName({
        id: 'a2',
        title: 'Mud Run',
        takenFileNames: new Set(['mud run.mp4']),
      })
    ).toBe('Mud Run [a2].mp4')
  })

  test('adds the id to a title that sanitizes to a taken id', () => {
    expect(
      createUniqueFileName({
        id: 'xyz',
        title: '///',
        takenFileNames: new Set(['xyz.mp4']),
      })
    ).toBe('xyz [xyz].mp4')
  })
})

describe('sanitizeTime', () => {
  test('formats milliseconds as minutes and seconds', () => {
    expect(sanitizeTime(1000)).toBe('1 second')
    expect(sanitizeTime(65_000)).toBe('1 minute 5 seconds')
  })
})
