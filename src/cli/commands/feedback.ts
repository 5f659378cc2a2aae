/**
 * Feedback Command
 *
 * Records more/less/perfect feedback against a user's stored preference.
 */

import { Command } from 'commander';
import { describeError } from '../../lib/errors/TasteStoreErrors.js';
import { FEEDBACK_KINDS } from '../../models/feedback.js';
import { withTasteService } from '../utils/context.js';
import { output } from '../utils/output.js';

interface FeedbackCommandOptions {
  user: string;
  ingredient: string;
  cuisine: string;
  exact?: boolean;
}

export function createFeedbackCommand(): Command {
  return new Command('feedback')
    .description('Adjust a stored preference (more, less, perfect)')
    .argument('<feedback>', `One of: ${FEEDBACK_KINDS.join(', ')}`)
    .requiredOption('-u, --user <id>', 'User id')
    .requiredOption('-i, --ingredient <name>', 'Ingredient the feedback is about')
    .requiredOption('-c, --cuisine <name>', 'Cuisine of the dish')
    .option('--exact', 'Only update a record with this exact ingredient and cuisine')
    .action(async (feedback: string, options: FeedbackCommandOptions) => {
      try {
        const update = await withTasteService((service) =>
          service.feedback(options.user, options.ingredient, options.cuisine, feedback, {
            exactMatch: options.exact ?? false,
          })
        );

        if (update.isErr()) {
          output.error('Feedback not applied', describeError(update.error));
          process.exit(1);
        }

        const { id, previous, record } = update.value;
        output.success(`Applied "${feedback}" to record ${id}`, {
          amount: `${previous.amount} -> ${record.amount}${record.unit ? ` ${record.unit}` : ''}`,
          feedback_weight: `${previous.feedbackWeight} -> ${record.feedbackWeight}`,
          text: record.derivedText,
        });
      } catch (error) {
        output.error('Feedback error', error);
        process.exit(1);
      }
    });
}
