import {createObjectCsvStringifier} from 'csv-writer'
import fs from 'fs-extra'

import {PersistenceError} from './errors'
import {extractHashtags} from './hashtags'
import type {MetadataRecord, VideoDescriptor} from './types'

export const METADATA_JSON_FILE_NAME = 'shorts_metadata.json'
export const METADATA_CSV_FILE_NAME = 'shorts_metadata.csv'

/** Column order shared by both output files. */
const COLUMNS = [
  'id',
  'title',
  'description',
  'hashtags',
  'duration',
  'view_count',
] as const

type SerializedRecord = {
  id: string
  title: string
  description: string
  hashtags: string[]
  duration: number
  view_count: number | null
}

/**
 * Collects one `MetadataRecord` per processed Short and writes the whole
 * collection to JSON and CSV at the end of a run. Records are only ever
 * appended.
 */
export class MetadataRecorder {
  private readonly recordList: MetadataRecord[] = []

  get records(): readonly MetadataRecord[] {
    return this.recordList
  }

  record(descriptor: VideoDescriptor): MetadataRecord {
    const {id, title, description, durationSeconds, viewCount} = descriptor
    const record: MetadataRecord = {
      id,
      title,
      description,
      hashtags: extractHashtags(title, description),
      durationSeconds,
      viewCount,
    }

    this.recordList.push(record)
    return record
  }

  toJson(): string {
    return `${JSON.stringify(this.recordList.map(serializeRecord), null, 2)}\n`
  }

  /**
   * Hashtags go in a single space-separated field; a space can never be part
   * of a tag. An unknown view count is an empty field. Carriage returns in
   * text fields become `\n`, which the stringifier knows to quote.
   */
  toCsv(): string {
    const csvStringifier = createObjectCsvStringifier({
      header: COLUMNS.map(column => ({id: column, title: column})),
    })
    const rows = this.recordList.map(record => {
      const {title, description, hashtags, ...rest} = serializeRecord(record)
      return {
        ...rest,
        title: normalizeLineBreaks(title),
        description: normalizeLineBreaks(description),
        hashtags: hashtags.join(' '),
      }
    })
    const header = csvStringifier.getHeaderString() ?? ''

    // `stringifyRecords([])` still emits a line break.
    return rows.length ? header + csvStringifier.stringifyRecords(rows) : header
  }

  /**
   * Writes both files. Each document is built in memory and written to a temp
   * file beside its target first; targets are only replaced once both temp
   * files are complete and neither target is a directory. The temp files sit
   * beside their targets, so a rename failing after that point is unlikely
   * but would leave the new JSON next to the old CSV.
   *
   * Output depends on nothing but the recorded data, so flushing an unchanged
   * collection again produces identical bytes.
   */
  async flush({
    jsonPath,
    csvPath,
  }: {
    jsonPath: string
    csvPath: string
  }): Promise<void> {
    const files = [
      {filePath: jsonPath, contents: this.toJson()},
      {filePath: csvPath, contents: this.toCsv()},
    ].map(file => ({...file, tempPath: `${file.filePath}.${process.pid}.tmp`}))

    try {
      for (const {filePath, tempPath, contents} of files) {
        await fs.writeFile(tempPath, contents, 'utf8').catch(
          (error: unknown) => {
            throw new PersistenceError(filePath, {cause: error})
          }
        )
      }

      for (const {filePath} of files) {
        if (await isDirectory(filePath)) {
          throw new PersistenceError(filePath, {
            cause: new Error(`${filePath} is a directory`),
          })
        }
      }

      for (const {filePath, tempPath} of files) {
        await fs.move(tempPath, filePath, {overwrite: true}).catch(
          (error: unknown) => {
            throw new PersistenceError(filePath, {cause: error})
          }
        )
      }
    } finally {
      await Promise.all(files.map(({tempPath}) => fs.remove(tempPath)))
    }
  }
}

async function isDirectory(filePath: string): Promise<boolean> {
  if (!(await fs.pathExists(filePath))) return false
  return (await fs.stat(filePath)).isDirectory()
}

function normalizeLineBreaks(text: string): string {
  return text.replace(/\r\n?/g, '\n')
}

function serializeRecord(record: MetadataRecord): SerializedRecord {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    hashtags: record.hashtags,
    duration: record.durationSeconds,
    view_count: record.viewCount,
  }
}
