/**
 * Ingest Command
 *
 * Bulk-loads source documents (JSON array or JSON Lines) into the index.
 */

import { Command } from 'commander';
import { describeError } from '../../lib/errors/TasteStoreErrors.js';
import { SourceDocumentSchema } from '../../models/requests.js';
import { withTasteService } from '../utils/context.js';
import { readValidated } from '../utils/input.js';
import { output } from '../utils/output.js';

interface IngestCommandOptions {
  batchSize?: string;
}

export function createIngestCommand(): Command {
  return new Command('ingest')
    .description('Ingest taste documents from a JSON or JSONL file')
    .argument('<file>', 'File with one document per line, or a JSON array')
    .option('-b, --batch-size <n>', 'Records per index write', '100')
    .action(async (file: string, options: IngestCommandOptions) => {
      try {
        const documents = readValidated(file, SourceDocumentSchema);
        const batchSize = parseInt(options.batchSize ?? '100', 10);
        if (!Number.isInteger(batchSize) || batchSize <= 0) {
          throw new Error(`--batch-size must be a positive integer, got: ${options.batchSize}`);
        }

        const report = await withTasteService((service) => service.ingest(documents, batchSize));
        if (report.isErr()) {
          output.error('Ingestion stopped', describeError(report.error));
          process.exit(1);
        }

        const { total, upserted, rejected, failed, warnings, errors } = report.value;
        output.success(`Ingested ${upserted} of ${total} documents`, { rejected, failed });
        if (warnings.length > 0) {
          output.warning(`${warnings.length} coercion warnings`);
          output.list(warnings);
        }
        if (errors.length > 0) {
          output.warning(`${errors.length} documents skipped`);
          output.list(errors);
        }
      } catch (error) {
        output.error('Ingestion failed', error);
        process.exit(1);
      }
    });
}
