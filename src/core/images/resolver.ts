/**
 * Maps a tree root selector (id prefix or repo:tag) to an image.
 */
import { RootNotFoundError } from '../../utils/errors.js';
import { shortenId } from './format.js';
import { isTagged, type ImageRecord } from './types.js';

/**
 * Append `:latest` to a selector that names a repository without a tag.
 * A colon before the last `/` belongs to a registry port, not a tag.
 */
export function withDefaultTag(selector: string): string {
  const lastSegment = selector.slice(selector.lastIndexOf('/') + 1);
  return lastSegment.includes(':') ? selector : `${selector}:latest`;
}

function matches(image: ImageRecord, selector: string, repoTag: string): boolean {
  if (image.id.startsWith(selector) || image.id === selector) {
    return true;
  }
  if (isTagged(image) && image.repoTags.includes(repoTag)) {
    return true;
  }
  return shortenId(image.id) === selector;
}

/**
 * Find the image a selector names, scanning in collection order.
 *
 * @returns undefined for an empty selector (render the whole forest)
 * @throws RootNotFoundError when nothing matches
 */
export function resolveRoot(
  selector: string | undefined,
  images: readonly ImageRecord[]
): ImageRecord | undefined {
  if (!selector) {
    return undefined;
  }

  const repoTag = withDefaultTag(selector);
  const found = images.find((image) => matches(image, selector, repoTag));
  if (!found) {
    throw new RootNotFoundError(selector);
  }
  return found;
}
