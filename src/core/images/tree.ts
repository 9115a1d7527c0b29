/**
 * ASCII tree rendering of the image forest.
 */
import { humanSize, shortenId } from './format.js';
import { buildHierarchy } from './hierarchy.js';
import { isTagged, type ImageRecord, type TreeRenderOptions } from './types.js';

const BRANCH = '├─';
const TERMINAL = '└─';
const GUIDE = '│ ';
const GAP = '  ';

function formatNode(image: ImageRecord, prefix: string, options: TreeRenderOptions): string {
  const displayedId = options.noTrunc ? image.id : shortenId(image.id);
  const line = `${prefix}${displayedId} Virtual Size: ${humanSize(image.virtualSize)}`;
  return isTagged(image) ? `${line} Tags: ${image.repoTags.join(', ')}\n` : `${line}\n`;
}

/**
 * Render the subtrees under `starts`, depth first, pre-order.
 */
export function renderTree(
  starts: readonly ImageRecord[],
  byParent: ReadonlyMap<string, readonly ImageRecord[]>,
  options: TreeRenderOptions = {}
): string {
  const lines: string[] = [];

  const walk = (images: readonly ImageRecord[], prefix: string): void => {
    images.forEach((image, index) => {
      const isLast = index === images.length - 1;
      lines.push(formatNode(image, prefix + (isLast ? TERMINAL : BRANCH), options));

      const children = byParent.get(image.id);
      if (children) {
        walk(children, prefix + (isLast ? GAP : GUIDE));
      }
    });
  };

  walk(starts, '');
  return lines.join('');
}

/**
 * Render the whole forest, or only the subtree under `root` when given.
 */
export function renderImageTree(
  images: readonly ImageRecord[],
  root: ImageRecord | undefined,
  options: TreeRenderOptions = {}
): string {
  const { roots, byParent } = buildHierarchy(images);
  return renderTree(root ? [root] : roots, byParent, options);
}
