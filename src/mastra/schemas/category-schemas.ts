import { z } from 'zod';

const identifierSchema = z.union([z.string(), z.number()]).transform(value => String(value));

// Falsy parents (null, "", 0) mean a top-level category
const parentIdSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => (value ? String(value) : null));

// Category record as it arrives from the category store.
// Malformed fields fall back to defaults instead of failing.
export const categoryRecordSchema = z.object({
  id: identifierSchema.catch(''),
  name: z.string().catch(''),
  parent_id: parentIdSchema.catch(null),
  email_count: z.number().int().nonnegative().catch(0),
});

export const categoryRecordsSchema = z.array(categoryRecordSchema);

// Tool / workflow input
export const mermaidInputSchema = z.object({
  categories: categoryRecordsSchema.describe(
    'List of categories, each with id, name, parent_id (null for root categories) and email_count',
  ),
});

export const mermaidOutputSchema = z.object({
  diagram: z.string(),
  categoryCount: z.number(),
});

export const inboxDiagramOutputSchema = mermaidOutputSchema.extend({
  rootCount: z.number(),
});

// Type exports
export type CategoryRecord = z.output<typeof categoryRecordSchema>;
export type CategoryRecordInput = z.input<typeof categoryRecordSchema>;
export type MermaidInput = z.infer<typeof mermaidInputSchema>;
export type MermaidOutput = z.infer<typeof mermaidOutputSchema>;
export type InboxDiagramOutput = z.infer<typeof inboxDiagramOutputSchema>;
