/**
 * Ingest command: store an evidence file as a new upload.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import { v4 as uuidv4 } from 'uuid';

import { createCliContext } from '../context.js';
import {
  addStorageOption,
  addVerboseOption,
  printBanner,
  printInfo,
  printSuccess,
  resolveInputPath,
  type CommonOptions,
} from '../options.js';

export function registerIngestCommand(program: Command): void {
  const cmd = program
    .command('ingest')
    .description('Store an evidence file and print its upload id')
    .argument('<file>', 'Evidence file (JSON array or NDJSON events)');

  addStorageOption(cmd);
  addVerboseOption(cmd);

  cmd.action(async (file: string, options: CommonOptions) => {
    await runIngest(file, options);
  });
}

async function runIngest(file: string, options: CommonOptions): Promise<void> {
  printBanner('Ingest');

  const inputPath = resolveInputPath(file);
  const { storage } = createCliContext(options);

  const uploadId = uuidv4();
  const data = await readFile(inputPath);
  const storedPath = await storage.saveFile(uploadId, basename(inputPath), data);

  printInfo(`Stored:    ${storedPath}`);
  printSuccess(`Upload id: ${chalk.bold(uploadId)}`);
  console.log('');
  printInfo(`Next: threatline analyze ${uploadId}`);
  console.log('');
}
