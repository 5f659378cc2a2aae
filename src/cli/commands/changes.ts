/**
 * Changes Command
 *
 * Replays change events from the document store, one JSON object per line.
 */

import { Command } from 'commander';
import { ServiceUnavailableError, describeError } from '../../lib/errors/TasteStoreErrors.js';
import { ChangeEventSchema } from '../../models/requests.js';
import { withTasteService } from '../utils/context.js';
import { readValidated } from '../utils/input.js';
import { output } from '../utils/output.js';

interface ReplaySummary {
  upserted: number;
  ignored: number;
  rejected: number;
  failed: number;
  errors: string[];
}

export function createChangesCommand(): Command {
  return new Command('changes')
    .description('Apply a file of change events to the index')
    .argument('<file>', 'JSONL file of change events')
    .action(async (file: string) => {
      try {
        const events = readValidated(file, ChangeEventSchema);

        const summary = await withTasteService(async (service) => {
          const tally: ReplaySummary = { upserted: 0, ignored: 0, rejected: 0, failed: 0, errors: [] };

          for (const [i, event] of events.entries()) {
            const outcome = await service.applyChange(event);
            if (outcome.isErr()) {
              if (outcome.error instanceof ServiceUnavailableError) {
                throw outcome.error;
              }
              tally.failed++;
              tally.errors.push(`event ${i + 1}: ${describeError(outcome.error)}`);
              continue;
            }

            const result = outcome.value;
            if (result.action === 'upserted') {
              tally.upserted++;
            } else if (result.action === 'ignored') {
              tally.ignored++;
            } else {
              tally.rejected++;
              tally.errors.push(`event ${i + 1}: ${result.reason}`);
            }
          }
          return tally;
        });

        output.success(`Applied ${events.length} change events`, {
          upserted: summary.upserted,
          ignored: summary.ignored,
          rejected: summary.rejected,
          failed: summary.failed,
        });
        if (summary.errors.length > 0) {
          output.list(summary.errors);
        }
      } catch (error) {
        output.error('Change replay failed', error);
        process.exit(1);
      }
    });
}
