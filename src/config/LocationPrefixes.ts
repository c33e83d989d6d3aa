/**
 * Root-prefix rules for the two naming conventions that are joined on
 * their stripped keys.
 *
 * Each rule is anchored at the start of the path. Keep them separate so
 * the facility layout and the grading storage layout can change
 * independently.
 */

export interface PrefixRule {
  /** Short name used in log output */
  readonly name: string;
  /** Anchored pattern matching the root prefix to remove */
  readonly pattern: RegExp;
}

/** Facility manifest roots: `/hpsans<digits>/production` */
export const FACILITY_ROOT_PREFIX: PrefixRule = {
  name: 'facility-root',
  pattern: /^\/hpsans\d+\/production/,
};

/** Grading-tool storage root: `/baselightfilesystem1` */
export const STORAGE_ROOT_PREFIX: PrefixRule = {
  name: 'storage-root',
  pattern: /^\/baselightfilesystem1/,
};
