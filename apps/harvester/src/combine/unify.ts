import type { ILogger } from '@pricegrid/logger'
import { cleanFlag } from '../ingestion/scrape/kit/normalize.js'
import type { FieldValue, SourceManifest } from '../ingestion/scrape/types.js'
import {
  emptyCanonicalRecord,
  isCanonicalColumn,
  NUMERIC_COLUMNS,
  PRICE_COLUMNS,
  TRI_STATE_COLUMNS,
} from './schema.js'
import type { CanonicalColumn, CanonicalRecord, CanonicalValue } from './schema.js'

/** A source's records as extracted, or as read back from its CSV file */
export type NativeRecord = Record<string, FieldValue | undefined>

export interface UnifiedSource {
  records: CanonicalRecord[]
  /** Rows without product_id and url after renaming */
  skipped: number
}

export function canonicalColumnFor(manifest: SourceManifest, nativeField: string): CanonicalColumn | undefined {
  const column = manifest.renames[nativeField] ?? nativeField
  return isCanonicalColumn(column) && column !== 'source' ? column : undefined
}

function toNumber(value: FieldValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string' || value.trim() === '') return null
  const parsed = Number(value.trim())
  return Number.isFinite(parsed) ? parsed : null
}

/** Coerce a value to the column's type; CSV text and extracted values give the same result */
export function coerceValue(column: CanonicalColumn, value: FieldValue | undefined): CanonicalValue {
  if (value === undefined || value === null) return null

  if (NUMERIC_COLUMNS.has(column)) {
    const parsed = toNumber(value)
    if (parsed === null) return null
    return PRICE_COLUMNS.has(column) && parsed < 0 ? null : parsed
  }

  if (TRI_STATE_COLUMNS.has(column)) {
    return cleanFlag(value)
  }

  const text = String(value).trim()
  return text.length > 0 ? text : null
}

function hasIdentity(record: CanonicalRecord): boolean {
  return record.product_id !== null || record.url !== null
}

/**
 * Rename one source's fields to the canonical schema, fill the columns the
 * source does not produce and stamp the source label. Fields with no
 * canonical column are dropped.
 */
export function unifySource(manifest: SourceManifest, records: Iterable<NativeRecord>, log?: ILogger): UnifiedSource {
  const result: UnifiedSource = { records: [], skipped: 0 }

  for (const native of records) {
    const record = emptyCanonicalRecord(manifest.label)
    for (const [field, value] of Object.entries(native)) {
      const column = canonicalColumnFor(manifest, field)
      if (column) {
        record[column] = coerceValue(column, value)
      }
    }

    if (!hasIdentity(record)) {
      result.skipped++
      continue
    }
    result.records.push(record)
  }

  if (result.skipped > 0) {
    log?.warn('Rows without identity dropped', { source: manifest.id, skipped: result.skipped })
  }
  return result
}

/**
 * Concatenate unified sources in the order given. Keys may repeat across
 * sources; each source is already deduplicated.
 */
export function combineSources(sources: Array<{ manifest: SourceManifest; records: Iterable<NativeRecord> }>, log?: ILogger): CanonicalRecord[] {
  const combined: CanonicalRecord[] = []
  for (const { manifest, records } of sources) {
    combined.push(...unifySource(manifest, records, log).records)
  }
  return combined
}
