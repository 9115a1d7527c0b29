/**
 * Graphviz DOT rendering of the image graph.
 */
import { shortenId } from './format.js';
import { isTagged, type ImageRecord } from './types.js';

const TAGGED_NODE_STYLE = 'shape=box,fillcolor="paleturquoise",style="filled,rounded"';

/**
 * Render every image as a node of one digraph.
 *
 * Roots hang off an invisible `base` node so that separate lineages are laid
 * out as a single graph. Tagged images get a labelled, filled box.
 */
export function renderDot(images: readonly ImageRecord[]): string {
  const lines: string[] = ['digraph docker {'];

  for (const image of images) {
    const id = shortenId(image.id);

    if (image.parentId === '') {
      lines.push(` base -> "${id}" [style=invis]`);
    } else {
      lines.push(` "${shortenId(image.parentId)}" -> "${id}"`);
    }

    if (isTagged(image)) {
      const label = [id, ...image.repoTags].join('\\n');
      lines.push(` "${id}" [label="${label}",${TAGGED_NODE_STYLE}];`);
    }
  }

  lines.push(' base [style=invisible]', '}');
  return `${lines.join('\n')}\n`;
}
