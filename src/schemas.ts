import {array, literal, nullish, number, object, string} from 'valibot'

/**
 * Output of `yt-dlp --flat-playlist -J <channel>/shorts`. Flat entries only
 * carry enough to identify each video; full metadata is fetched per video
 * with `YtDlpVideoSchema`.
 */
export const YtDlpPlaylistSchema = object({
  _type: literal('playlist'),
  id: string(),
  title: nullish(string(), ''),
  entries: array(
    object({
      id: string(),
      url: nullish(string()),
      title: nullish(string(), ''),
    })
  ),
})

/**
 * A single entry of the `formats` array. yt-dlp uses the string `"none"` for a
 * missing codec, but some extractors leave the field out or set it to `null`.
 */
export const YtDlpFormatSchema = object({
  format_id: string(),
  ext: string(),
  vcodec: nullish(string(), 'none'),
  acodec: nullish(string(), 'none'),
  height: nullish(number()),
  fps: nullish(number()),
  tbr: nullish(number()),
  abr: nullish(number()),
})

/**
 * Output of `yt-dlp -J --no-playlist <video url>`. Only the fields this
 * project stores or needs for stream selection are validated. A video without
 * formats still parses; stream selection reports it later.
 */
export const YtDlpVideoSchema = object({
  id: string(),
  title: string(),
  description: nullish(string(), ''),
  duration: nullish(number()),
  view_count: nullish(number()),
  webpage_url: nullish(string()),
  formats: nullish(array(YtDlpFormatSchema), []),
})
