import { serializeValue } from './codec.js'
import { isEmptyValue, isValidFieldName } from './fields.js'
import type { ListingRecord, MergeResult } from './types.js'

/**
 * Merge an incoming record into an existing row.
 *
 * - Non-empty incoming values win
 * - Empty incoming values never clear a non-empty existing value
 * - Fields empty on both sides are kept as null so the column survives
 * - Fields only on the existing row are carried through
 */
export function mergeRecords(existing: ListingRecord | undefined, incoming: ListingRecord): MergeResult {
  const record: ListingRecord = { ...existing }
  const updatedFields: string[] = []
  const addedFields: string[] = []

  for (const [field, value] of Object.entries(incoming)) {
    if (!isValidFieldName(field)) continue

    const current = record[field]
    const currentEmpty = isEmptyValue(current)

    if (!isEmptyValue(value)) {
      if (currentEmpty) {
        addedFields.push(field)
      } else if (serializeValue(current) !== serializeValue(value)) {
        updatedFields.push(field)
      }
      record[field] = value
    } else if (currentEmpty) {
      record[field] = null
    }
  }

  return { record, updatedFields, addedFields }
}
