import { z } from 'zod';
import { FEEDBACK_KINDS } from './feedback.js';

// ============================================================================
// Query interface requests
// ============================================================================

const trimmedName = (label: string) =>
  z.string().trim().min(1, `${label} is required`).describe(label);

/**
 * Multi-ingredient search request
 */
export const SearchRequestSchema = z.object({
  userId: trimmedName('userId'),
  cuisine: trimmedName('cuisine'),
  ingredients: z
    .array(z.string())
    .min(1, 'at least one ingredient is required')
    .describe('Ingredients in the order results are returned'),
  servings: z.number().int().positive().describe('Requested serving count'),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;

/**
 * Feedback request
 */
export const FeedbackRequestSchema = z.object({
  userId: trimmedName('userId'),
  ingredient: trimmedName('ingredient'),
  cuisine: trimmedName('cuisine'),
  feedback: z.enum(FEEDBACK_KINDS),
});

export type FeedbackRequest = z.infer<typeof FeedbackRequestSchema>;

// ============================================================================
// Query interface responses
// ============================================================================

export type SearchItem =
  | { ingredient: string; prompt: string }
  | { ingredient: string; error: string };

export type SearchStatus = 'success' | 'partial_success' | 'failure';

export interface SearchResponse {
  userId: string;
  cuisine: string;
  servings: number;

  /** One entry per requested ingredient, in request order */
  items: SearchItem[];
  errors: string[];
  status: SearchStatus;
}

/**
 * Flatten zod issues into one line
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ============================================================================
// Source document and change event input
// ============================================================================

/**
 * A source document: any JSON object; field checks happen in the codec
 */
export const SourceDocumentSchema = z.record(z.unknown());

export const ChangeEventSchema = z.object({
  operationType: z.string().min(1),
  documentKey: z.object({ _id: z.unknown() }).optional(),
  fullDocument: SourceDocumentSchema.nullable().optional(),
});
