/**
 * Dataset files
 *
 * Each source is written to `<dataDir>/<id>.csv` with its native field
 * names; the master dataset is rebuilt from scratch into `<dataDir>/data.csv`
 * on every combine.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ILogger } from '@pricegrid/logger'
import { errorCodeOf } from '../scraper/errors.js'
import type { RawRecord, SourceId, SourceManifest } from '../ingestion/scrape/types.js'
import { fromCsv, toCsv } from './csv.js'
import { CANONICAL_COLUMNS } from './schema.js'
import type { CanonicalRecord } from './schema.js'
import { combineSources } from './unify.js'

export const MASTER_FILE_NAME = 'data.csv'

export function sourceFilePath(dataDir: string, id: SourceId): string {
  return join(dataDir, `${id}.csv`)
}

export function sourceColumns(manifest: SourceManifest): string[] {
  return manifest.records.fields.map(field => field.field)
}

export async function writeSourceFile(dataDir: string, manifest: SourceManifest, records: readonly RawRecord[]): Promise<string> {
  await mkdir(dataDir, { recursive: true })
  const path = sourceFilePath(dataDir, manifest.id)
  await writeFile(path, toCsv(sourceColumns(manifest), records), 'utf8')
  return path
}

/** Rows of a source file, or undefined when the source has not been crawled */
export async function readSourceFile(dataDir: string, manifest: SourceManifest): Promise<Array<Record<string, string>> | undefined> {
  let text: string
  try {
    text = await readFile(sourceFilePath(dataDir, manifest.id), 'utf8')
  } catch (error) {
    if (errorCodeOf(error) === 'ENOENT') return undefined
    throw error
  }
  return fromCsv(text)
}

export async function writeMasterFile(dataDir: string, records: readonly CanonicalRecord[]): Promise<string> {
  await mkdir(dataDir, { recursive: true })
  const path = join(dataDir, MASTER_FILE_NAME)
  await writeFile(path, toCsv(CANONICAL_COLUMNS, records), 'utf8')
  return path
}

export interface CombineResult {
  path: string
  rows: number
  /** Rows contributed per source, in combine order */
  perSource: Array<{ source: SourceId; rows: number }>
  /** Sources with no file in the data directory */
  missing: SourceId[]
}

/**
 * Rebuild the master dataset from the per-source files in `dataDir`.
 * A missing source file contributes nothing.
 */
export async function combineFromDirectory(dataDir: string, manifests: readonly SourceManifest[], log?: ILogger): Promise<CombineResult> {
  const perSource: CombineResult['perSource'] = []
  const missing: SourceId[] = []
  const records: CanonicalRecord[] = []

  for (const manifest of manifests) {
    const rows = await readSourceFile(dataDir, manifest)
    if (!rows) {
      log?.info('Source file not found, skipped', { source: manifest.id })
      missing.push(manifest.id)
      continue
    }
    const unified = combineSources([{ manifest, records: rows }], log)
    perSource.push({ source: manifest.id, rows: unified.length })
    records.push(...unified)
  }

  const path = await writeMasterFile(dataDir, records)
  log?.info('Master dataset written', { path, rows: records.length })
  return { path, rows: records.length, perSource, missing }
}
