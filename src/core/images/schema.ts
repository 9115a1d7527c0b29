/**
 * Zod schema for serialized image listings.
 *
 * Field names follow the engine's image-list API so that a saved
 * `GET /images/json?all=1` response can be piped in unchanged.
 */
import { z } from 'zod';

const ByteCountSchema = z.number().int().nonnegative();

/** One entry of a serialized image listing. */
export const RawImageSchema = z.object({
  Id: z.string().min(1),
  ParentId: z.string().nullish(),
  RepoTags: z.array(z.string()).nullish(),
  /** Dropped by recent engine API versions; falls back to Size */
  VirtualSize: ByteCountSchema.nullish(),
  Size: ByteCountSchema.default(0),
  Created: z.number().int().default(0),
});

export const RawImageListSchema = z.array(RawImageSchema);

export type RawImage = z.infer<typeof RawImageSchema>;
