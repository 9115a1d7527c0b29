/**
 * The `images` command: tree, dot or short view of the engine's images.
 */
import chalk from 'chalk';
import { Command } from 'commander';
import type { Config } from '../../core/config/schema.js';
import { DEFAULT_CONFIG_PATH, getDefaultConfig, loadConfig } from '../../core/config/loader.js';
import { buildHierarchy } from '../../core/images/hierarchy.js';
import { renderImages } from '../../core/images/render.js';
import type { ImageRecord, RenderMode } from '../../core/images/types.js';
import { acquireImages, type SourceOptions } from '../../engine/source.js';
import { ErrorCodes, UsageError } from '../../utils/errors.js';
import { isLogLevel, logger as log } from '../../utils/logger.js';

export interface ImagesOptions {
  dot?: boolean;
  tree?: boolean;
  short?: boolean;
  /** false when --no-trunc is given */
  trunc?: boolean;
  input?: string;
  config?: string;
  logLevel?: string;
}

/**
 * Collaborators the command talks to, swapped out in tests.
 */
export interface ImagesIO {
  cwd: () => string;
  write: (output: string) => void;
  stdin?: SourceOptions['stdin'];
  listImages?: SourceOptions['listImages'];
}

const defaultIO: ImagesIO = {
  cwd: () => process.cwd(),
  write: (output) => {
    process.stdout.write(output);
  },
};

/**
 * Create the images command.
 */
export function createImagesCommand(io: ImagesIO = defaultIO): Command {
  return new Command('images')
    .description('Visualize container images as a tree, a Graphviz graph or a tag summary')
    .argument('[root]', 'Image id prefix or repository[:tag] to root the tree at (--tree only)')
    .option('-d, --dot', 'Show image information as Graphviz dot')
    .option('-t, --tree', 'Show image information as tree')
    .option('-s, --short', 'Show short summary of images (repo name and list of tags)')
    .option('-n, --no-trunc', "Don't truncate the image IDs")
    .option('-i, --input <path>', 'Read a JSON image listing from a file instead of stdin or the engine')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--log-level <level>', 'Diagnostics on stderr (debug, info, warn, error, silent)')
    .action(async (root: string | undefined, options: ImagesOptions) => {
      let config = getDefaultConfig();
      try {
        const mode = selectRenderMode(options);
        config = await loadConfig(io.cwd(), options.config);
        io.write(await runImages(mode, root, options, config, io));
        process.exitCode = config.exit_codes.success;
      } catch (error) {
        // Fatal errors print at every log level, silent included
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error');
        process.exit(config.exit_codes.error);
      }
    });
}

/**
 * Exactly one of --dot, --tree and --short must be given.
 */
export function selectRenderMode(options: ImagesOptions): RenderMode {
  const selected = (['dot', 'tree', 'short'] as const).filter((mode) => options[mode] === true);

  if (selected.length === 0) {
    throw new UsageError(ErrorCodes.NO_RENDER_MODE, 'Please specify either --dot, --tree, or --short');
  }
  if (selected.length > 1) {
    throw new UsageError(
      ErrorCodes.CONFLICTING_RENDER_MODES,
      `Only one of --dot, --tree, or --short may be given (got ${selected.map((m) => `--${m}`).join(', ')})`,
      { modes: selected }
    );
  }
  return selected[0];
}

function applyLogLevel(options: ImagesOptions, config: Config): void {
  const level = options.logLevel ?? config.log_level;
  if (!isLogLevel(level)) {
    throw new UsageError(ErrorCodes.INVALID_OPTION, `Unknown log level: ${level}`);
  }
  log.setLevel(level);
}

function reportOrphans(images: readonly ImageRecord[]): void {
  const { orphans } = buildHierarchy(images);
  if (orphans.length > 0) {
    log.info(`${orphans.length} image(s) reference a parent outside the listing; showing them as roots`, {
      ids: orphans.map((image) => image.id),
    });
  }
}

/**
 * Acquire the listing and render it. Returns the text to print.
 */
export async function runImages(
  mode: RenderMode,
  root: string | undefined,
  options: ImagesOptions,
  config: Config,
  io: ImagesIO = defaultIO
): Promise<string> {
  applyLogLevel(options, config);

  if (root && mode !== 'tree') {
    log.warn(`Ignoring root "${root}": it only applies to --tree`);
  }

  const images = await acquireImages({
    inputPath: options.input,
    engine: config.engine,
    stdin: io.stdin,
    listImages: io.listImages,
  });
  log.debug(`Rendering ${images.length} images as ${mode}`);

  if (mode === 'tree') {
    reportOrphans(images);
  }

  return renderImages({
    mode,
    images,
    root,
    noTrunc: options.trunc === false || !config.output.truncate_ids,
  });
}
