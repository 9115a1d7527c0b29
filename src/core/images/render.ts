/**
 * Runs the one renderer selected for an invocation.
 */
import { renderDot } from './dot.js';
import { resolveRoot } from './resolver.js';
import { renderSummary } from './summary.js';
import { renderImageTree } from './tree.js';
import type { ImageRecord, RenderMode } from './types.js';

export interface RenderRequest {
  mode: RenderMode;
  images: readonly ImageRecord[];
  /** Tree root selector; ignored by the other modes */
  root?: string;
  noTrunc?: boolean;
}

/**
 * Produce the complete output text. Root resolution happens before any
 * rendering, so an unknown root yields an error and no partial tree.
 */
export function renderImages(request: RenderRequest): string {
  switch (request.mode) {
    case 'dot':
      return renderDot(request.images);
    case 'short':
      return renderSummary(request.images);
    case 'tree': {
      const root = resolveRoot(request.root, request.images);
      return renderImageTree(request.images, root, { noTrunc: request.noTrunc });
    }
  }
}
