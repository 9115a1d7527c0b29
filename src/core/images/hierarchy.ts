/**
 * Reconstructs image lineage from the flat parent pointers.
 */
import type { ImageHierarchy, ImageRecord } from './types.js';

/**
 * Group images by parent id and collect the roots of the forest.
 *
 * Sibling order is collection order. Cycles are not detected: images on a
 * parent cycle are unreachable from the roots, and rooting the tree walk at
 * one of them recurses without end.
 */
export function buildHierarchy(images: readonly ImageRecord[]): ImageHierarchy {
  const knownIds = new Set(images.map((image) => image.id));
  const roots: ImageRecord[] = [];
  const orphans: ImageRecord[] = [];
  const byParent = new Map<string, ImageRecord[]>();

  for (const image of images) {
    if (image.parentId === '') {
      roots.push(image);
      continue;
    }

    if (!knownIds.has(image.parentId)) {
      roots.push(image);
      orphans.push(image);
    }

    const children = byParent.get(image.parentId);
    if (children) {
      children.push(image);
    } else {
      byParent.set(image.parentId, [image]);
    }
  }

  return { roots, orphans, byParent };
}
