/**
 * Image records and the derived hierarchy index.
 */

/** Tag entry that stands for "no tag assigned". */
export const NONE_TAG = '<none>:<none>';

/** Number of id characters shown when ids are truncated. */
export const SHORT_ID_LENGTH = 12;

/**
 * One image layer or snapshot and its lineage pointer.
 */
export interface ImageRecord {
  readonly id: string;
  /** Empty string when the image has no parent */
  readonly parentId: string;
  /** Never empty: untagged images carry exactly one NONE_TAG entry */
  readonly repoTags: readonly string[];
  /** Bytes, including inherited parent layers */
  readonly virtualSize: number;
  /** Bytes of this layer alone */
  readonly size: number;
  readonly created: number;
}

/**
 * Parent/child grouping rebuilt on every render.
 */
export interface ImageHierarchy {
  /** Images with no parent, and orphans, in collection order */
  readonly roots: readonly ImageRecord[];
  /** Images whose parent id names no image of the collection */
  readonly orphans: readonly ImageRecord[];
  /** Parent id -> direct children, in collection order */
  readonly byParent: ReadonlyMap<string, readonly ImageRecord[]>;
}

export interface TreeRenderOptions {
  /** Show full ids instead of the 12-character prefix */
  noTrunc?: boolean;
}

/**
 * Renderer selected on the command line.
 */
export type RenderMode = 'dot' | 'tree' | 'short';

/**
 * Whether an image carries at least one real tag.
 */
export function isTagged(image: ImageRecord): boolean {
  return image.repoTags[0] !== NONE_TAG;
}
