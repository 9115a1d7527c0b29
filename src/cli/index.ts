import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createImagesCommand } from './commands/images.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageManifestSchema = z.object({ version: z.string() });
const VERSION = PackageManifestSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('layerviz')
    .description('Visualize container image lineage as trees, graphs and tag summaries')
    .version(VERSION);
  [createImagesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
