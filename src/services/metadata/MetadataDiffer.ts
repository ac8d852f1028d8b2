/**
 * Metadata Differ
 *
 * Decides whether a freshly built record changes a persisted one.
 * Lists compare as sorted multisets of their stringified elements, nested
 * objects compare recursively and scalars compare as trimmed strings.
 * A field missing from the existing record counts as empty.
 */

import { MetadataFields, MetadataValue } from '../../types/models.js';

type MetadataObject = { [key: string]: MetadataValue };

function isMetadataObject(value: MetadataValue | undefined): value is MetadataObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Elements that are objects or lists compare by their JSON form
 */
export function stringifyElement(value: MetadataValue): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function normalizeList(values: readonly MetadataValue[]): string[] {
  return values.map(stringifyElement).sort();
}

function listsEqual(a: readonly MetadataValue[], b: readonly MetadataValue[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const left = normalizeList(a);
  const right = normalizeList(b);
  return left.every((value, index) => value === right[index]);
}

function fieldChanged(existing: MetadataValue | undefined, candidate: MetadataValue): boolean {
  const absent = existing === undefined || existing === null;

  if (Array.isArray(candidate)) {
    if (absent) {
      return candidate.length > 0;
    }
    return !Array.isArray(existing) || !listsEqual(existing, candidate);
  }

  if (isMetadataObject(candidate)) {
    if (absent) {
      return diffMetadata({}, candidate).length > 0;
    }
    return !isMetadataObject(existing) || diffMetadata(existing, candidate).length > 0;
  }

  return String(existing ?? '').trim() !== String(candidate ?? '').trim();
}

/**
 * Names of the candidate's top-level fields that differ from the existing record.
 * Fields only present in the existing record are ignored.
 */
export function diffMetadata(
  existing: MetadataFields | undefined,
  candidate: MetadataFields
): string[] {
  const changed: string[] = [];
  for (const [field, value] of Object.entries(candidate)) {
    if (fieldChanged(existing?.[field], value)) {
      changed.push(field);
    }
  }
  return changed;
}

export function isUnchanged(existing: MetadataFields | undefined, candidate: MetadataFields): boolean {
  return diffMetadata(existing, candidate).length === 0;
}
