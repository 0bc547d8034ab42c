/**
 * Command-line front end
 *
 * Usage:
 *   blob-vault [--blob-store PATH] [-v] <command> [args]
 *
 * Commands:
 *   store FILE...    store files, printing one digest per line
 *   exists DIGEST    exit 0 if the blob is present, 1 if not
 *   verify DIGEST    re-hash the blob, printing ok or failed
 *   path DIGEST      print the canonical blob path
 *   stat DIGEST      print "<digest> <size>"
 *   clean            garbage collection (not implemented)
 *
 * The store root comes from --blob-store, falling back to BLOB_STORE_PATH.
 */

import { parseArgs } from 'node:util';

import { defaultStoreRoot } from '../config/index.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { createBlobStore, type BlobStore } from '../storage/index.js';

export const EXIT_OK = 0;
export const EXIT_NEGATIVE = 1;
export const EXIT_FAILURE = 2;

const VERBOSITY_LEVELS = ['warn', 'info', 'debug'] as const;

export type VerbosityLevel = (typeof VERBOSITY_LEVELS)[number];

/**
 * Log level for a count of -v flags: none is warn, -v info, -vv and beyond debug
 */
export function verbosityLevel(count: number): VerbosityLevel {
  return VERBOSITY_LEVELS[Math.min(Math.max(count, 0), VERBOSITY_LEVELS.length - 1)] ?? 'warn';
}

export const USAGE = 'usage: blob-vault [--blob-store PATH] [-v] <store|exists|verify|path|stat|clean> [args]';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliOptions {
  io?: CliIo;
  /** Store root used when --blob-store is absent */
  defaultRoot?: string;
  logger?: Logger;
}

const processIo: CliIo = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`)
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type CommandHandler = (store: BlobStore, args: string[], io: CliIo) => Promise<number>;

function single(command: string, args: string[]): string {
  const [digest] = args;
  if (args.length !== 1 || digest === undefined) {
    throw new UsageError(`${command} takes exactly one DIGEST`);
  }
  return digest;
}

const commands: Record<string, CommandHandler> = {
  async store(store, args, io) {
    if (args.length === 0) {
      throw new UsageError('store takes at least one FILE');
    }
    for (const file of args) {
      io.out(await store.store(file));
    }
    return EXIT_OK;
  },

  async exists(store, args) {
    return (await store.exists(single('exists', args))) ? EXIT_OK : EXIT_NEGATIVE;
  },

  async verify(store, args, io) {
    const ok = await store.verify(single('verify', args));
    io.out(ok ? 'ok' : 'failed');
    return ok ? EXIT_OK : EXIT_NEGATIVE;
  },

  async path(store, args, io) {
    io.out(store.blobPath(single('path', args)));
    return EXIT_OK;
  },

  async stat(store, args, io) {
    const info = await store.stat(single('stat', args));
    if (info === null) {
      return EXIT_NEGATIVE;
    }
    io.out(`${info.digest} ${info.size}`);
    return EXIT_OK;
  },

  async clean(store, args) {
    if (args.length > 0) {
      throw new UsageError('clean takes no arguments');
    }
    return store.clean();
  }
};

/**
 * Run one CLI invocation and return its exit code
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? processIo;
  const baseLogger = options.logger ?? defaultLogger;

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        'blob-store': { type: 'string' },
        verbose: { type: 'boolean', short: 'v', multiple: true }
      },
      allowPositionals: true,
      strict: true
    });

    const [command, ...args] = positionals;
    if (command === undefined) {
      throw new UsageError('no command specified');
    }

    const handler = Object.hasOwn(commands, command) ? commands[command] : undefined;
    if (handler === undefined) {
      throw new UsageError(`unknown command "${command}"`);
    }

    const root = values['blob-store'] ?? options.defaultRoot ?? defaultStoreRoot();
    if (root === undefined) {
      throw new UsageError('missing --blob-store (or BLOB_STORE_PATH)');
    }

    const log = baseLogger.child({ command }, { level: verbosityLevel(values.verbose?.length ?? 0) });

    const store = createBlobStore(root, { logger: log });
    return await handler(store, args, io);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`blob-vault: ${error.message}`);
      io.err(USAGE);
      return EXIT_FAILURE;
    }

    const message = error instanceof Error ? error.message : String(error);
    baseLogger.error({ err: error, argv }, 'Command failed');
    io.err(`blob-vault: ${message}`);
    return EXIT_FAILURE;
  }
}
