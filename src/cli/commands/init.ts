/**
 * Init Command
 *
 * Creates the index database and its schema.
 */

import { Command } from 'commander';
import { describeError } from '../../lib/errors/TasteStoreErrors.js';
import { openIndex } from '../../services/taste-service-factory.js';
import { loadCliContext } from '../utils/context.js';
import { output } from '../utils/output.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the vector index')
    .action(async () => {
      try {
        const { config } = loadCliContext();
        const index = openIndex(config);
        if (index.isErr()) {
          output.error('Failed to create the vector index', describeError(index.error));
          process.exit(1);
        }

        const count = await index.value.count(config.index.namespace);
        index.value.close();

        output.success(`Vector index ready (${index.value.name})`, {
          db_path: config.index.backend === 'sqlite' ? config.index.dbPath : '(in memory)',
          namespace: config.index.namespace || '(default)',
          records: count.isOk() ? count.value : 'unknown',
        });
      } catch (error) {
        output.error('Unexpected error during initialization', error);
        process.exit(1);
      }
    });
}
