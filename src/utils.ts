import {pluralize, sanitizeDecimal} from '@qodestack/utils'
import sanitizeFilename from 'sanitize-filename'

/** Keeps file names well under the 255 byte limit most filesystems have. */
const MAX_TITLE_BYTES = 200

export const MEDIA_EXTENSION = 'mp4'

/**
 * Converts a number of milliseconds into a plain-english string, such as
 * "4 minutes 32 seconds"
 */
export function sanitizeTime(ms: number): string {
  const totalSeconds = ms / 1000
  const minutes = Math.floor(totalSeconds / 60)
  const seconds = sanitizeDecimal(totalSeconds % 60)
  const secondsFinalValue = pluralize(seconds, 'second')

  return minutes
    ? `${pluralize(minutes, 'minute')} ${secondsFinalValue}`
    : secondsFinalValue
}

/**
 * Makes a video title safe to use as a file name. Characters that are illegal
 * on Windows, macOS or Linux (`/ \ : * ? " < > |` and control characters) are
 * replaced with a space. Emoji and `#` are left alone - Shorts titles lean on
 * them heavily.
 */
export function sanitizeTitle(str: string): string {
  const safeTitle = sanitizeFilename(str, {replacement: ' '})
    // Use a regular expression to replace consecutive spaces with a single space.
    .replace(/\s+/g, ' ')
    .replace(/^[\s.]+|[\s.]+$/g, '')

  return truncateToBytes(safeTitle, MAX_TITLE_BYTES).trim()
}

/**
 * Drops whole characters (never half of a surrogate pair) from the end of
 * `str` until its UTF-8 encoding fits in `maxBytes`.
 */
export function truncateToBytes(str: string, maxBytes: number): string {
  if (Buffer.byteLength(str) <= maxBytes) return str

  const chars = Array.from(str)

  while (chars.length && Buffer.byteLength(chars.join('')) > maxBytes) {
    chars.pop()
  }

  return chars.join('')
}

/**
 * The name a downloaded Short is saved under. Titles that sanitize down to
 * nothing fall back to the video id.
 */
export function createFileName({
  id,
  title,
  includeId = false,
}: {
  id: string
  title: string
  includeId?: boolean
}): string {
  const safeTitle = sanitizeTitle(title) || id
  const suffix = includeId && safeTitle !== id ? ` [${id}]` : ''

  return `${safeTitle}${suffix}.${MEDIA_EXTENSION}`
}

/**
 * Like `createFileName`, but never returns a name in `takenFileNames`
 * (compared lower-cased, for case-insensitive filesystems). A clash falls back
 * to the ` [id]` suffix.
 */
export function createUniqueFileName({
  id,
  title,
  includeId = false,
  takenFileNames,
}: {
  id: string
  title: string
  includeId?: boolean
  takenFileNames: ReadonlySet<string>
}): string {
  const isTaken = (name: string) => takenFileNames.has(name.toLowerCase())
  const fileName = createFileName({id, title, includeId})

  if (!isTaken(fileName)) return fileName

  const withId = createFileName({id, title, includeId: true})

  // A title that sanitizes to another Short's id still needs its own id.
  return isTaken(withId)
    ? `${sanitizeTitle(title) || id} [${id}].${MEDIA_EXTENSION}`
    : withId
}
