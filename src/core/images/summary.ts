/**
 * Condensed repository -> tags listing.
 */
import { splitRepoTag } from './format.js';
import { NONE_TAG, type ImageRecord } from './types.js';

/**
 * Collect the tags recorded under each repository, in input order.
 */
export function groupTagsByRepository(images: readonly ImageRecord[]): Map<string, string[]> {
  const byRepository = new Map<string, string[]>();

  for (const image of images) {
    for (const repoTag of image.repoTags) {
      if (repoTag === NONE_TAG) continue;

      const { repository, tag } = splitRepoTag(repoTag);
      const tags = byRepository.get(repository);
      if (tags) {
        tags.push(tag);
      } else {
        byRepository.set(repository, [tag]);
      }
    }
  }

  return byRepository;
}

/**
 * One `repository: tag, tag` line per repository.
 */
export function renderSummary(images: readonly ImageRecord[]): string {
  let output = '';
  for (const [repository, tags] of groupTagsByRepository(images)) {
    output += `${repository}: ${tags.join(', ')}\n`;
  }
  return output;
}
