/**
 * Reading document and change-event files
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { formatIssues } from '../../models/requests.js';

/**
 * Parse a file holding either one JSON array or one JSON value per line
 */
export function readJsonRecords(filePath: string): unknown[] {
  const content = readFileSync(filePath, 'utf8').trim();
  if (content === '') {
    return [];
  }

  if (content.startsWith('[')) {
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) {
      throw new Error(`${filePath}: expected a JSON array`);
    }
    return parsed;
  }

  return content
    .split('\n')
    .map((line, i) => ({ line: line.trim(), number: i + 1 }))
    .filter(({ line }) => line !== '')
    .map(({ line, number }) => {
      try {
        const value: unknown = JSON.parse(line);
        return value;
      } catch (error) {
        throw new Error(`${filePath}:${number}: ${error instanceof Error ? error.message : 'invalid JSON'}`);
      }
    });
}

/**
 * Read and validate every record in a file against a schema
 */
export function readValidated<T extends z.ZodTypeAny>(filePath: string, schema: T): Array<z.infer<T>> {
  return readJsonRecords(filePath).map((record, i) => {
    const parsed = schema.safeParse(record);
    if (!parsed.success) {
      throw new Error(`${filePath}: record ${i + 1}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  });
}
