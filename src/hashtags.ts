/**
 * A `#` followed by letters (with their combining marks), digits or
 * underscores in any script. Anything else, such as whitespace, punctuation or
 * another `#`, ends the tag.
 */
const hashtagRegex = /#([\p{L}\p{M}\p{N}_]+)/gu

/**
 * Pulls hashtags out of a video's title, then its description. Tags are
 * returned without the `#`, in the order they first appear, with exact
 * (case-sensitive) duplicates removed.
 *
 * @example
 * extractHashtags('The Elmo laugh 😂 #offroad #fordperformance #ford', '')
 * // ['offroad', 'fordperformance', 'ford']
 */
export function extractHashtags(title: string, description: string): string[] {
  const seen = new Set<string>()

  for (const text of [title, description]) {
    for (const match of text.matchAll(hashtagRegex)) {
      const tag = match[1]

      if (tag !== undefined) seen.add(tag)
    }
  }

  // Sets iterate in insertion order, which is first-seen order here.
  return [...seen]
}
