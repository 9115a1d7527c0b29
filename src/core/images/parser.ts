/**
 * Turns serialized listings and engine responses into image records.
 */
import { ErrorCodes, MalformedInputError } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { RawImageListSchema, type RawImage } from './schema.js';
import { NONE_TAG, type ImageRecord } from './types.js';

/**
 * Normalize one listing entry. Missing or empty tag lists become the
 * one-element sentinel list and a missing parent becomes "".
 */
export function toImageRecord(raw: RawImage): ImageRecord {
  const repoTags = raw.RepoTags && raw.RepoTags.length > 0 ? [...raw.RepoTags] : [NONE_TAG];
  return {
    id: raw.Id,
    parentId: raw.ParentId ?? '',
    repoTags,
    virtualSize: raw.VirtualSize ?? raw.Size,
    size: raw.Size,
    created: raw.Created,
  };
}

/**
 * Validate an already-decoded value as an image listing.
 */
export function toImageRecords(value: unknown): ImageRecord[] {
  const result = RawImageListSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedInputError(
      ErrorCodes.INVALID_IMAGE_RECORD,
      `Invalid image listing: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return result.data.map(toImageRecord);
}

/**
 * Parse a JSON array of image objects.
 */
export function parseImagesJson(raw: string): ImageRecord[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new MalformedInputError(
      ErrorCodes.INVALID_JSON,
      `Error reading JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
  return toImageRecords(decoded);
}
