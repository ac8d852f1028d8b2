/**
 * Metadata Document Store
 *
 * One JSON document per library with a top-level `metadata` map keyed by
 * "Title (Year)". Records are only ever replaced whole, and only when the
 * differ reports a change.
 */

import path from 'path';
import { z } from 'zod';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import { MetadataDocument, MetadataFields, MetadataRecord, MetadataValue } from '../../types/models.js';
import { readJsonFile, writeFileAtomically } from '../../utils/atomicWrite.js';
import { logger } from '../../utils/logging.js';
import { diffMetadata } from './MetadataDiffer.js';

export type UpsertOutcome = 'created' | 'updated' | 'unchanged';

export interface UpsertResult {
  outcome: UpsertOutcome;
  changedFields: string[];
}

const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(metadataValueSchema),
    z.record(metadataValueSchema),
  ])
);

const documentSchema = z.object({
  metadata: z.record(z.record(metadataValueSchema)).nullable().default({}),
});

/**
 * "TV Shows" -> "tv_shows_metadata.json"
 */
export function documentFileName(libraryName: string): string {
  return `${libraryName.trim().toLowerCase().replace(/\s+/g, '_')}_metadata.json`;
}

export class MetadataDocumentStore {
  readonly filePath: string;
  private readonly records = new Map<string, MetadataFields>();
  private dirty = false;

  constructor(
    metadataDir: string,
    readonly libraryName: string,
    private readonly dryRun: boolean = false
  ) {
    this.filePath = path.join(metadataDir, documentFileName(libraryName));
  }

  async load(): Promise<void> {
    this.records.clear();
    this.dirty = false;

    const raw = await readJsonFile(this.filePath, 'MetadataDocumentStore');
    if (raw === undefined) {
      logger.info('[MetadataDocumentStore] No existing document, starting empty', {
        library: this.libraryName,
        file: this.filePath,
      });
      return;
    }

    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FileSystemError(
        `Metadata document has an unexpected shape: ${this.filePath}`,
        ErrorCode.FS_READ_FAILED,
        this.filePath,
        { service: 'MetadataDocumentStore', operation: 'load' },
        parsed.error
      );
    }

    for (const [title, record] of Object.entries(parsed.data.metadata ?? {})) {
      this.records.set(title, record);
    }
    logger.info('[MetadataDocumentStore] Document loaded', {
      library: this.libraryName,
      records: this.records.size,
    });
  }

  get(titleKey: string): MetadataFields | undefined {
    return this.records.get(titleKey);
  }

  titles(): string[] {
    return [...this.records.keys()];
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Store a freshly built record unless nothing changed, in which case the
   * existing record is kept verbatim, including fields the candidate lacks.
   */
  upsert(titleKey: string, candidate: MetadataRecord): UpsertResult {
    const existing = this.records.get(titleKey);
    if (!existing) {
      this.records.set(titleKey, candidate);
      this.dirty = true;
      return { outcome: 'created', changedFields: Object.keys(candidate) };
    }

    const changedFields = diffMetadata(existing, candidate);
    if (changedFields.length === 0) {
      return { outcome: 'unchanged', changedFields };
    }

    this.records.set(titleKey, candidate);
    this.dirty = true;
    return { outcome: 'updated', changedFields };
  }

  /**
   * Remove records whose title is not live. Returns the removed titles.
   */
  removeMissing(liveTitles: ReadonlySet<string>): string[] {
    const removed = this.titles().filter((title) => !liveTitles.has(title));
    for (const title of removed) {
      this.records.delete(title);
    }
    if (removed.length > 0) {
      this.dirty = true;
    }
    return removed;
  }

  hasChanges(): boolean {
    return this.dirty;
  }

  toDocument(): MetadataDocument {
    return { metadata: Object.fromEntries(this.records) };
  }

  /**
   * Write the whole document. Skipped when nothing changed or in dry run.
   */
  async save(): Promise<boolean> {
    if (!this.dirty) {
      logger.debug('[MetadataDocumentStore] No changes to save', { library: this.libraryName });
      return false;
    }

    if (this.dryRun) {
      logger.info('[DryRun] Would save metadata document', {
        library: this.libraryName,
        file: this.filePath,
        records: this.records.size,
      });
      return false;
    }

    await writeFileAtomically(this.filePath, JSON.stringify(this.toDocument(), null, 2), 'MetadataDocumentStore');
    this.dirty = false;
    logger.info('[MetadataDocumentStore] Document saved', {
      library: this.libraryName,
      file: this.filePath,
      records: this.records.size,
    });
    return true;
  }
}
