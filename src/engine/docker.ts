/**
 * Live image listing from the container engine through dockerode.
 */
import Docker from 'dockerode';
import type { EngineSettings } from '../core/config/schema.js';
import { toImageRecords } from '../core/images/parser.js';
import type { ImageRecord } from '../core/images/types.js';
import { EngineUnavailableError, ErrorCodes } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * The part of the dockerode client this module needs.
 */
export interface ImageListingClient {
  listImages(options: { all: boolean }): Promise<Docker.ImageInfo[]>;
}

/**
 * Build dockerode options from the config file's engine section.
 * An explicit socket path wins over host/port.
 */
export function toDockerOptions(settings: EngineSettings): Docker.DockerOptions | undefined {
  if (settings.socket_path) {
    return { socketPath: settings.socket_path };
  }
  if (settings.host) {
    return settings.port === undefined
      ? { host: settings.host }
      : { host: settings.host, port: settings.port };
  }
  return undefined;
}

export function createEngineClient(settings: EngineSettings): ImageListingClient {
  const options = toDockerOptions(settings);
  return options ? new Docker(options) : new Docker();
}

/**
 * Translate the engine's image-list entries field for field. The response
 * goes through the same schema as a piped-in listing, which also covers
 * engines that no longer report VirtualSize.
 */
export function fromEngineImages(images: readonly Docker.ImageInfo[]): ImageRecord[] {
  return toImageRecords(images);
}

function unavailableMessage(reason: string): string {
  if (process.env.IN_DOCKER) {
    return [
      'Unable to access the engine socket, please run like this:',
      '  docker run --rm -v /var/run/docker.sock:/var/run/docker.sock layerviz images <args>',
      "For more help, run 'layerviz help'",
    ].join('\n');
  }
  return `Unable to connect: ${reason}\nFor help, run 'layerviz help'`;
}

/**
 * List every image, intermediate layers included.
 */
export async function listEngineImages(
  settings: EngineSettings,
  client: ImageListingClient = createEngineClient(settings)
): Promise<ImageRecord[]> {
  const log = logger.child('engine');
  log.debug('Listing images from the engine', { ...settings });

  let images: Docker.ImageInfo[];
  try {
    images = await client.listImages({ all: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EngineUnavailableError(ErrorCodes.ENGINE_UNAVAILABLE, unavailableMessage(reason), {
      reason,
    });
  }

  log.debug(`Engine returned ${images.length} images`);
  return fromEngineImages(images);
}
