/**
 * Run-Level Deduplication
 *
 * Collapses one source's records to one per identity key (product id,
 * falling back to URL). Last-seen-wins: a later record replaces an earlier
 * one with the same key, and the output keeps the position where the key
 * first appeared. Input must be in page-index order for the tie-break to be
 * deterministic.
 */

import type { RawRecord, SourceIdentity } from '../../ingestion/scrape/types.js'
import { resolveIdentity } from '../../ingestion/scrape/kit/extract.js'

export interface DedupeResult<T> {
  records: T[]
  /** Records replaced by a later record with the same key */
  duplicates: number
}

export function dedupeByKey<T>(records: Iterable<T>, keyOf: (record: T) => string): DedupeResult<T> {
  const byKey = new Map<string, T>()
  let seen = 0

  for (const record of records) {
    seen++
    // Map.set on an existing key keeps its insertion position
    byKey.set(keyOf(record), record)
  }

  return { records: [...byKey.values()], duplicates: seen - byKey.size }
}

/**
 * Throws IdentityMissingError for a record without identity; the extractor
 * drops those before they get here.
 */
export function dedupeRecords(records: Iterable<RawRecord>, identity: SourceIdentity): DedupeResult<RawRecord> {
  return dedupeByKey(records, record => resolveIdentity(record, identity))
}
