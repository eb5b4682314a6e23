#!/usr/bin/env node

import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { ThumbnailManager, createThumbnailServices } from '../services/thumbnails';
import { ArgumentError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CommandIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CommandIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

/**
 * `[--source <path>]`; without a source every thumbnail is deleted.
 */
export function parseClearArgs(argv: string[]): { source?: string } {
  let source: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--source') {
      source = argv[++i];
      if (!source) {
        throw new ArgumentError('Missing value for `--source`');
      }
    } else if (arg.startsWith('--source=')) {
      source = arg.slice('--source='.length);
    } else {
      throw new ArgumentError(`Unknown argument \`${arg}\``);
    }
  }

  return source ? { source } : {};
}

/**
 * Deletes thumbnails and prints how many. Returns the exit code.
 */
export async function runClearThumbnails(
  argv: string[],
  manager: ThumbnailManager,
  io: CommandIo = consoleIo
): Promise<number> {
  try {
    const { source } = parseClearArgs(argv);
    const deleted = source ? await manager.clear(source) : await manager.clearAll();
    io.out(`Thumbnails deleted: ${deleted}`);
    return 0;
  } catch (error) {
    logger.error('Thumbnail cleanup failed', { error: errorMessage(error) });
    io.err(`Error deleting thumbnails: ${errorMessage(error)}`);
    return 1;
  }
}

async function main(): Promise<number> {
  dotenv.config();
  const { manager } = createThumbnailServices(loadConfig().thumbnails);
  return runClearThumbnails(process.argv.slice(2), manager);
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('Thumbnail cleanup failed to start', { error: errorMessage(error) });
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  );
}
