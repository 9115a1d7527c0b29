/**
 * Picks where the image listing comes from: a snapshot file, piped
 * stdin, or the live engine, in that order.
 */
import type { EngineSettings } from '../core/config/schema.js';
import { parseImagesJson } from '../core/images/parser.js';
import type { ImageRecord } from '../core/images/types.js';
import { ErrorCodes, InputError } from '../utils/errors.js';
import { readFile, readStream } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { listEngineImages } from './docker.js';

export interface SourceOptions {
  /** Snapshot file given with --input */
  inputPath?: string;
  engine: EngineSettings;
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
  /** Replaces the dockerode listing, for tests and embedding */
  listImages?: (settings: EngineSettings) => Promise<ImageRecord[]>;
}

export type ImageSourceKind = 'file' | 'stdin' | 'engine';

export function selectSource(options: SourceOptions): ImageSourceKind {
  if (options.inputPath) return 'file';
  const stdin = options.stdin ?? process.stdin;
  return stdin.isTTY ? 'engine' : 'stdin';
}

async function readInput(kind: 'file' | 'stdin', options: SourceOptions): Promise<string> {
  try {
    if (kind === 'file' && options.inputPath) {
      return await readFile(options.inputPath);
    }
    return await readStream(options.stdin ?? process.stdin);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const from = kind === 'file' ? options.inputPath : 'stdin';
    throw new InputError(ErrorCodes.INPUT_READ_FAILED, `Error reading input from ${from}: ${reason}`, {
      source: kind,
      reason,
    });
  }
}

/**
 * Materialize the complete image collection before any rendering.
 */
export async function acquireImages(options: SourceOptions): Promise<ImageRecord[]> {
  const kind = selectSource(options);
  logger.child('input').debug(`Reading images from ${kind}`);

  if (kind === 'engine') {
    const listImages = options.listImages ?? ((settings: EngineSettings) => listEngineImages(settings));
    return listImages(options.engine);
  }

  return parseImagesJson(await readInput(kind, options));
}
