#!/usr/bin/env node
/**
 * datastore CLI - Composition Root
 *
 * Wires dependencies for each command and interprets the CliResult.
 * All behaviour lives in src/cli/commands/*.ts and src/datastore.
 */

import 'reflect-metadata';
import * as path from 'node:path';
import { Command } from 'commander';

import { initializeContainer, disposeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import type { ValidatedConfig } from './config/app-config.js';
import { DEFAULT_SOFTWARE_VERSION } from './config/app-config.js';
import { Err, formatAppError } from './errors/index.js';
import type { PathHandlerSelector } from './datastore/selector/path-handler-selector.js';
import type { DatastoreFileFinder } from './datastore/finder/datastore-file-finder.js';
import type { DatastoreFileManager } from './datastore/manager/datastore-file-manager.js';
import type { IndexedDatastoreFileManager } from './datastore/manager/indexed-datastore-file-manager.js';
import type { CliResult } from './cli/types/index.js';
import { failure, misuse } from './cli/types/index.js';
import { interpretCliResult } from './cli/interpret-result.js';
import {
  executeAddCommand,
  executeFindCommand,
  executeIdentifyCommand,
  executeLatestCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface RootOption {
  readonly root?: string;
}

/**
 * Initialize the container, run one command, release the index store and
 * interpret the result.
 */
async function runWithContainer(
  options: RootOption,
  command: (selector: PathHandlerSelector, root: string | undefined) => Promise<CliResult>
): Promise<void> {
  const initialized = await initializeContainer({ runtimeMode: { kind: 'cli' }, root: options.root });

  if (initialized.isErr()) {
    const startup: CliResult =
      initialized.error._tag === 'ConfigInvalid'
        ? misuse(formatAppError(initialized.error))
        : failure(formatAppError(initialized.error));
    interpretCliResult(startup, new NodeProcessTerminator());
    return;
  }

  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const config = container.resolve<ValidatedConfig>(DI.Config.App);
  const selector = container.resolve<PathHandlerSelector>(DI.Datastore.Selector);

  const root = options.root === undefined ? config.root : path.resolve(options.root);
  let result: CliResult;
  try {
    result = await command(selector, root);
  } catch (error: unknown) {
    result = failure(formatAppError(Err.unexpected('Command failed unexpectedly', error)));
  } finally {
    await disposeContainer();
  }
  interpretCliResult(result, terminator);
}

const missingRoot = (): CliResult =>
  misuse('No datastore root configured', ['Set DATASTORE_ROOT or pass --root <dir>']);

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('datastore')
  .description('Name, version and store instrument data products')
  .version(DEFAULT_SOFTWARE_VERSION);

program
  .command('identify <file>')
  .description('Show the naming convention, folder and file name for a file')
  .action(async (filePath: string) => {
    await runWithContainer({}, async (selector) =>
      executeIdentifyCommand(filePath, {
        findByPath: (p) => selector.findByPath(p, { throwIfNotFound: true }),
      })
    );
  });

program
  .command('add <file>')
  .description('Place a file in the datastore under its next version')
  .option('-r, --root <dir>', 'Datastore root (defaults to DATASTORE_ROOT)')
  .option('-m, --move', 'Remove the source file after it is stored')
  .option('-i, --indexed', 'Record the file in the index store')
  .option('--metadata <json>', 'JSON object stored with the index record')
  .action(async (filePath: string, options: RootOption & { move?: boolean; indexed?: boolean; metadata?: string }) => {
    await runWithContainer(options, async (selector, root) => {
      if (root === undefined) return missingRoot();

      const files = container.resolve<DatastoreFileManager>(DI.Datastore.FileManager);
      const indexed = container.resolve<IndexedDatastoreFileManager>(DI.Datastore.IndexedFileManager);

      return executeAddCommand(
        filePath,
        {
          findByPath: (p) => selector.findByPath(p, { throwIfNotFound: true }),
          addFile: (p, handler, addOptions) =>
            options.indexed ? indexed.addFile(p, handler, addOptions) : files.addFile(p, handler, addOptions),
        },
        { move: options.move, indexed: options.indexed, metadata: options.metadata }
      );
    });
  });

program
  .command('find <name>')
  .description('Print the stored path for a file name')
  .option('-r, --root <dir>', 'Datastore root (defaults to DATASTORE_ROOT)')
  .action(async (name: string, options: RootOption) => {
    await runWithContainer(options, async (selector, root) => {
      if (root === undefined) return missingRoot();
      const finder = container.resolve<DatastoreFileFinder>(DI.Datastore.Finder);

      return executeFindCommand(name, {
        findByPath: (p) => selector.findByPath(p, { throwIfNotFound: true }),
        findMatchingFile: (handler) => finder.findMatchingFile(root, handler, { throwIfNotFound: true }),
      });
    });
  });

program
  .command('latest <name>')
  .description('Print the highest stored version of a file name')
  .option('-r, --root <dir>', 'Datastore root (defaults to DATASTORE_ROOT)')
  .action(async (name: string, options: RootOption) => {
    await runWithContainer(options, async (selector, root) => {
      if (root === undefined) return missingRoot();
      const finder = container.resolve<DatastoreFileFinder>(DI.Datastore.Finder);

      return executeLatestCommand(name, {
        findByPath: (p) => selector.findByPath(p, { throwIfNotFound: true }),
        findLatestVersion: (handler) => finder.findLatestVersion(root, handler, { throwIfNotFound: true }),
      });
    });
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
