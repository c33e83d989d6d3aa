/**
 * Persistence seam for parsed manifests and merged frame records.
 * Append-only: the pipeline never updates or deletes individual entries.
 */

import type { FrameRecord, ManifestEntry } from '../conform/types';

export interface RecordStore {
  insertManifest(entry: ManifestEntry): Promise<void>;
  insertFrameRecord(record: FrameRecord): Promise<void>;
  /** Append several records in order as one write */
  insertFrameRecords(records: readonly FrameRecord[]): Promise<void>;
  /** All frame records in insertion order */
  findAllFrameRecords(): Promise<FrameRecord[]>;
  /** The first manifest inserted, or null when none has been */
  findManifestMetadata(): Promise<ManifestEntry | null>;
  /** Drop everything (used before a fresh ingest) */
  clear(): Promise<void>;
}
