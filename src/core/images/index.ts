export { NONE_TAG, SHORT_ID_LENGTH, isTagged } from './types.js';
export type { ImageRecord, ImageHierarchy, TreeRenderOptions, RenderMode } from './types.js';
export { humanSize, shortenId, splitRepoTag } from './format.js';
export { buildHierarchy } from './hierarchy.js';
export { resolveRoot, withDefaultTag } from './resolver.js';
export { renderTree, renderImageTree } from './tree.js';
export { renderDot } from './dot.js';
export { renderSummary, groupTagsByRepository } from './summary.js';
export { RawImageSchema, RawImageListSchema } from './schema.js';
export type { RawImage } from './schema.js';
export { parseImagesJson, toImageRecords, toImageRecord } from './parser.js';
export { renderImages, type RenderRequest } from './render.js';
