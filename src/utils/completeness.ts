/**
 * Metadata Completeness Calculation
 *
 * Percentage of expected fields that a built record actually filled.
 */

import { MetadataFields, MetadataValue } from '../types/models.js';

export interface Completeness {
  filled: number;
  expected: number;
  percent: number;
}

/**
 * Empty strings, zero, empty lists and empty objects count as missing
 */
export function isFilled(value: MetadataValue | undefined): boolean {
  if (value == null || value === '' || value === 0 || value === false) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * Calculate metadata completeness percentage
 *
 * @param fields - Fields the record is expected to carry
 * @param ignored - Fields excluded from the calculation
 *
 * @example
 * calculateCompleteness(
 *   { summary: 'A hacker discovers...', tagline: '', genre: ['Action'] },
 *   ['summary', 'tagline', 'genre', 'runtime']
 * ) // { filled: 2, expected: 4, percent: 50 }
 *
 * @example
 * // Everything ignored
 * calculateCompleteness({}, ['runtime'], ['runtime']) // { filled: 0, expected: 0, percent: 100 }
 */
export function calculateCompleteness(
  record: MetadataFields,
  fields: readonly string[],
  ignored: readonly string[] = []
): Completeness {
  const expectedFields = fields.filter((field) => !ignored.includes(field));
  if (expectedFields.length === 0) {
    return { filled: 0, expected: 0, percent: 100 };
  }

  const filled = expectedFields.filter((field) => isFilled(record[field])).length;
  return {
    filled,
    expected: expectedFields.length,
    percent: Math.round((filled / expectedFields.length) * 100),
  };
}
