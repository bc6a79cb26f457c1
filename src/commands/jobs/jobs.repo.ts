import { Injectable } from '@nestjs/common'
import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { readTextFile } from '../../shared/utils/fs.util'
import { JobsMissingColumnsException, JobsSourceNotFoundException } from './jobs.error'
import { REQUIRED_POSTING_COLUMNS } from './jobs.model'
import type { Posting, PostingColumn } from './jobs.model'

const CsvRowsSchema = z.array(z.array(z.string()))

@Injectable()
export class JobsRepo {
  /**
   * Load every posting from a CSV file with a header row.
   *
   * Header names are trimmed and matched case-insensitively. A blank id
   * becomes the 1-based data row number.
   */
  async findAllPostings(source: string): Promise<Posting[]> {
    const content = await readTextFile(source, JobsSourceNotFoundException)
    const rows = CsvRowsSchema.parse(
      parse(content, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    )

    const [header = [], ...records] = rows
    const columnIndex = new Map<string, number>()
    header.forEach((name, index) => {
      const key = name.trim().toLowerCase()
      if (!columnIndex.has(key)) columnIndex.set(key, index)
    })

    const missing = REQUIRED_POSTING_COLUMNS.filter((column) => !columnIndex.has(column))
    if (missing.length > 0) {
      throw JobsMissingColumnsException(source, missing)
    }

    return records.map((record, rowIndex) => {
      const cell = (column: PostingColumn): string => {
        const index = columnIndex.get(column)
        return index === undefined ? '' : (record[index] ?? '').trim()
      }

      const applyUrl = cell('apply_url')
      const postingSource = cell('source')
      return {
        id: cell('id') || String(rowIndex + 1),
        title: cell('title'),
        company: cell('company'),
        location: cell('location'),
        description: cell('description'),
        ...(applyUrl ? { applyUrl } : {}),
        ...(postingSource ? { source: postingSource } : {}),
      }
    })
  }
}
