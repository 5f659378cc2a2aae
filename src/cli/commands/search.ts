/**
 * Search Command
 *
 * Prints the personalized prompt snippet for each ingredient, in order.
 */

import { Command } from 'commander';
import { describeError } from '../../lib/errors/TasteStoreErrors.js';
import { withTasteService } from '../utils/context.js';
import { output, OutputFormat } from '../utils/output.js';

interface SearchCommandOptions {
  user: string;
  cuisine: string;
  servings: string;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Look up taste preferences for one or more ingredients')
    .argument('<ingredients...>', 'Ingredients to look up')
    .requiredOption('-u, --user <id>', 'User id')
    .requiredOption('-c, --cuisine <name>', 'Cuisine of the dish')
    .option('-s, --servings <n>', 'Requested serving count', '1')
    .action(async (ingredients: string[], options: SearchCommandOptions) => {
      try {
        const response = await withTasteService((service) =>
          service.searchMany({
            userId: options.user,
            cuisine: options.cuisine,
            ingredients,
            servings: Number(options.servings),
          })
        );

        if (response.isErr()) {
          output.error('Invalid search request', describeError(response.error));
          process.exit(1);
        }

        if (output.getFormat() === OutputFormat.JSON) {
          output.json(response.value);
        } else {
          output.searchItems(response.value.items);
        }

        if (response.value.status === 'failure') {
          process.exit(1);
        }
      } catch (error) {
        output.error('Search error', error);
        process.exit(1);
      }
    });
}
