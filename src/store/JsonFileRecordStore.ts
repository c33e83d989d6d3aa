/**
 * JsonFileRecordStore - durable RecordStore backed by a single JSON document.
 *
 * Lets ingest and report generation run as separate invocations. The file is
 * loaded lazily on first access and rewritten in full after every insert,
 * through a temporary file renamed over the store.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StoreError } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { FrameRecord, ManifestEntry, ManifestLocation } from '../conform/types';
import type { RecordStore } from './RecordStore';

const log = new Logger('JsonFileRecordStore');

export const STORE_FORMAT_VERSION = 1;

interface StoreDocument {
  version: typeof STORE_FORMAT_VERSION;
  manifests: ManifestEntry[];
  frameRecords: FrameRecord[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isManifestLocation(value: unknown): value is ManifestLocation {
  return isRecord(value) && typeof value.stripped === 'string' && typeof value.full === 'string';
}

function isManifestEntry(value: unknown): value is ManifestEntry {
  return (
    isRecord(value) &&
    typeof value.producer === 'string' &&
    typeof value.operator === 'string' &&
    typeof value.job === 'string' &&
    (value.notes === undefined || typeof value.notes === 'string') &&
    Array.isArray(value.locations) &&
    value.locations.every(isManifestLocation)
  );
}

function isFrameRecord(value: unknown): value is FrameRecord {
  return isRecord(value) && typeof value.location === 'string' && typeof value.frame === 'string';
}

function parseDocument(text: string, path: string): StoreDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StoreError(`Store file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(raw) || raw.version !== STORE_FORMAT_VERSION) {
    throw new StoreError(`Store file ${path} has an unsupported format`);
  }
  const { manifests, frameRecords } = raw;
  if (!Array.isArray(manifests) || !manifests.every(isManifestEntry)) {
    throw new StoreError(`Store file ${path}: invalid manifests`);
  }
  if (!Array.isArray(frameRecords) || !frameRecords.every(isFrameRecord)) {
    throw new StoreError(`Store file ${path}: invalid frame records`);
  }
  return { version: STORE_FORMAT_VERSION, manifests, frameRecords };
}

function emptyDocument(): StoreDocument {
  return { version: STORE_FORMAT_VERSION, manifests: [], frameRecords: [] };
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

export class JsonFileRecordStore implements RecordStore {
  private document: StoreDocument | null = null;

  constructor(private readonly path: string) {}

  async insertManifest(entry: ManifestEntry): Promise<void> {
    const doc = await this.load();
    doc.manifests.push(entry);
    await this.save(doc);
  }

  async insertFrameRecord(record: FrameRecord): Promise<void> {
    const doc = await this.load();
    doc.frameRecords.push(record);
    await this.save(doc);
  }

  async insertFrameRecords(records: readonly FrameRecord[]): Promise<void> {
    if (records.length === 0) return;
    const doc = await this.load();
    doc.frameRecords.push(...records);
    await this.save(doc);
  }

  async findAllFrameRecords(): Promise<FrameRecord[]> {
    const doc = await this.load();
    return [...doc.frameRecords];
  }

  async findManifestMetadata(): Promise<ManifestEntry | null> {
    const doc = await this.load();
    return doc.manifests[0] ?? null;
  }

  async clear(): Promise<void> {
    const doc = emptyDocument();
    await this.save(doc);
    log.info(`Cleared ${this.path}`);
  }

  private async load(): Promise<StoreDocument> {
    if (this.document) return this.document;

    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (!isMissingFile(err)) {
        throw new StoreError(`Cannot read store file ${this.path}: ${err instanceof Error ? err.message : String(err)}`);
      }
      log.debug(`No store at ${this.path}, starting empty`);
      this.document = emptyDocument();
      return this.document;
    }

    this.document = parseDocument(text, this.path);
    return this.document;
  }

  private async save(doc: StoreDocument): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      const tmpPath = `${this.path}.tmp`;
      await writeFile(tmpPath, JSON.stringify(doc, null, 2) + '\n', 'utf8');
      await rename(tmpPath, this.path);
    } catch (err) {
      throw new StoreError(`Cannot write store file ${this.path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.document = doc;
  }
}
