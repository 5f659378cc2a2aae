/**
 * Stats Command
 */

import { Command } from 'commander';
import { ConfigurationManager } from '../../lib/env-config.js';
import { describeError } from '../../lib/errors/TasteStoreErrors.js';
import { withTasteService } from '../utils/context.js';
import { output } from '../utils/output.js';

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show index statistics and the active configuration')
    .action(async () => {
      try {
        const { count, config } = await withTasteService(async (service, context) => ({
          count: await service.count(),
          config: context.config,
        }));

        if (count.isErr()) {
          output.error('Failed to read index statistics', describeError(count.error));
          process.exit(1);
        }

        const apiKey = config.embedding.apiKey;
        output.info('Taste store statistics', {
          records: count.value,
          index: config.index.backend,
          db_path: config.index.dbPath,
          namespace: config.index.namespace || '(default)',
          embedding_endpoint: config.embedding.endpoint,
          embedding_model: `${config.embedding.model} (${config.embedding.dimensions} dims)`,
          api_key: apiKey ? new ConfigurationManager().maskApiKey(apiKey) : '(none)',
          min_score: config.retrieval.minScore,
        });
      } catch (error) {
        output.error('Stats error', error);
        process.exit(1);
      }
    });
}
