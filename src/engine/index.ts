export {
  createEngineClient,
  fromEngineImages,
  listEngineImages,
  toDockerOptions,
  type ImageListingClient,
} from './docker.js';
export { acquireImages, selectSource, type ImageSourceKind, type SourceOptions } from './source.js';
