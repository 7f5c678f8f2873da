#!/usr/bin/env node
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseArgs } from 'util';
import { CancellationToken } from './shared/cancellation';
import { DOWNLOAD_CONFIG } from './shared/config';
import { isOutputFormat, parseTileSizePreference } from './shared/download-options';
import { ConsoleLogSink } from './shared/log-sink';
import { DownloadRequest } from './shared/types';
import { downloadImage, summarizeOutcome } from './server/download-pipeline';
import { createRequestQueueLoggerFromEnv } from './server/file-request-queue-logger';

const USAGE = `Usage: iiif-stitch --url <service-url> [options]

Options:
  --url <url>           IIIF image service or info.json URL
  --out <dir>           Destination directory (default: ~/Downloads or cwd)
  --name <file>         Output file name without extension (default: ${DOWNLOAD_CONFIG.DEFAULT_FILE_NAME})
  --format <fmt>        tiff | png | jpg (default: ${DOWNLOAD_CONFIG.DEFAULT_FORMAT})
  --tile-size <size>    auto | pixels between 64 and 4096 (default: auto)
  --workers <n>         Concurrent downloads, 1-16 (default: ${DOWNLOAD_CONFIG.DEFAULT_WORKERS})
  --retries <n>         Retries per failed tile (default: 0)
  -h, --help            Show this help`;

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  CANCELLED: 130,
} as const;

function defaultDestination(): string {
  const downloads = path.join(os.homedir(), 'Downloads');
  return fs.existsSync(downloads) ? downloads : process.cwd();
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      url: { type: 'string' },
      out: { type: 'string' },
      name: { type: 'string' },
      format: { type: 'string' },
      'tile-size': { type: 'string' },
      workers: { type: 'string' },
      retries: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true
  });
}

/**
 * Turn argv into a DownloadRequest, or an error message for the user
 */
export function parseCliArgs(argv: string[]): DownloadRequest | { help: true } | { error: string } {
  let values: ReturnType<typeof readArgs>['values'];
  try {
    ({ values } = readArgs(argv));
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }

  if (values.help) {
    return { help: true };
  }

  const format = values.format ?? DOWNLOAD_CONFIG.DEFAULT_FORMAT;
  if (!isOutputFormat(format)) {
    return { error: `Unknown format "${format}", expected tiff, png or jpg` };
  }

  const tileSize = parseTileSizePreference(values['tile-size'] ?? 'auto');
  if (tileSize === null) {
    return { error: 'Please enter a valid number for tile size' };
  }

  const workers = Number(values.workers ?? DOWNLOAD_CONFIG.DEFAULT_WORKERS);
  const retries = values.retries === undefined ? undefined : Number(values.retries);

  return {
    url: values.url ?? '',
    destination: values.out ?? defaultDestination(),
    fileName: values.name ?? DOWNLOAD_CONFIG.DEFAULT_FILE_NAME,
    format,
    tileSize,
    workers,
    retries
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseCliArgs(argv);
  if ('help' in parsed) {
    console.log(USAGE);
    return EXIT_CODES.SUCCESS;
  }
  if ('error' in parsed) {
    console.error(`Error: ${parsed.error}\n\n${USAGE}`);
    return EXIT_CODES.FAILURE;
  }

  const cancellation = new CancellationToken();
  const onSigint = (): void => {
    console.log('Cancelling...');
    cancellation.cancel();
  };
  process.once('SIGINT', onSigint);

  let lastStatus = '';
  try {
    const outcome = await downloadImage(parsed, {
      log: new ConsoleLogSink(),
      cancellation,
      queueLogger: createRequestQueueLoggerFromEnv(),
      listener: {
        onStatus: message => {
          // Per-tile status lines are covered by the periodic progress log
          if (!message.startsWith('Downloaded ') && message !== lastStatus) {
            console.log(`» ${message}`);
          }
          lastStatus = message;
        }
      }
    });

    console.log(summarizeOutcome(outcome));
    switch (outcome.status) {
      case 'completed':
        return EXIT_CODES.SUCCESS;
      case 'cancelled':
        return EXIT_CODES.CANCELLED;
      case 'failed':
        return EXIT_CODES.FAILURE;
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error('Unexpected error:', error);
      process.exitCode = EXIT_CODES.FAILURE;
    }
  );
}
