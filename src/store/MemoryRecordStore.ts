import type { FrameRecord, ManifestEntry } from '../conform/types';
import type { RecordStore } from './RecordStore';

/** In-process store for single runs and tests. */
export class MemoryRecordStore implements RecordStore {
  private manifests: ManifestEntry[] = [];
  private frameRecords: FrameRecord[] = [];

  async insertManifest(entry: ManifestEntry): Promise<void> {
    this.manifests.push(entry);
  }

  async insertFrameRecord(record: FrameRecord): Promise<void> {
    this.frameRecords.push(record);
  }

  async insertFrameRecords(records: readonly FrameRecord[]): Promise<void> {
    this.frameRecords.push(...records);
  }

  async findAllFrameRecords(): Promise<FrameRecord[]> {
    return [...this.frameRecords];
  }

  async findManifestMetadata(): Promise<ManifestEntry | null> {
    return this.manifests[0] ?? null;
  }

  async clear(): Promise<void> {
    this.manifests = [];
    this.frameRecords = [];
  }
}
