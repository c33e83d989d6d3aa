/**
 * Conform data model shared by the reconciliation, merge and report stages.
 */

/** One location line from a facility manifest */
export interface ManifestLocation {
  /** Path with the facility root removed; the join key */
  stripped: string;
  /** Line exactly as it appears in the manifest */
  full: string;
}

/** Parsed facility manifest. Immutable once built. */
export interface ManifestEntry {
  readonly producer: string;
  readonly operator: string;
  readonly job: string;
  readonly notes?: string;
  readonly locations: readonly ManifestLocation[];
}

/** Stripped key -> authoritative facility path */
export type LocationMap = ReadonlyMap<string, string>;

/** Frame number -> resolved facility path */
export type FrameAnnotations = ReadonlyMap<number, string>;

/**
 * Persisted unit produced by the merger: one maximal run of consecutive
 * frames on one location. `frame` is either `"<n>"` or `"<start>-<end>"`.
 */
export interface FrameRecord {
  readonly location: string;
  readonly frame: string;
}

/** Inclusive frame span decoded from a FrameRecord */
export interface FrameSpan {
  start: number;
  end: number;
}
