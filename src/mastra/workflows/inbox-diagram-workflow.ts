import { createStep, createWorkflow } from '@mastra/core/workflows';
import { z } from 'zod';
import {
  categoryRecordSchema,
  inboxDiagramOutputSchema,
  mermaidInputSchema,
} from '../schemas/category-schemas';
import { buildCategoryTree, renderCategoryDiagram } from '../tools/mermaid-generator';
import { logger } from '../config/logger';

const normalizedCategoriesSchema = z.object({
  categories: z.array(categoryRecordSchema),
  rootCount: z.number(),
});

// Step 1: Validate category records and count top-level categories
const normalizeCategories = createStep({
  id: 'normalize-categories',
  description: 'Validates category records and fills defaults for missing fields',
  inputSchema: mermaidInputSchema,
  outputSchema: normalizedCategoriesSchema,
  execute: async ({ inputData }) => {
    if (!inputData) throw new Error('Input data required');

    const { categories } = inputData;
    const { roots } = buildCategoryTree(categories);

    logger.debug('[InboxDiagram] Normalized categories', {
      categoryCount: categories.length,
      rootCount: roots.length,
    });

    return { categories, rootCount: roots.length };
  },
});

// Step 2: Render the mermaid diagram
const renderDiagram = createStep({
  id: 'render-diagram',
  description: 'Renders the category hierarchy as a mermaid diagram',
  inputSchema: normalizedCategoriesSchema,
  outputSchema: inboxDiagramOutputSchema,
  execute: async ({ inputData }) => {
    if (!inputData) throw new Error('Input data required');

    const { categories, rootCount } = inputData;

    return {
      diagram: renderCategoryDiagram(categories),
      categoryCount: categories.length,
      rootCount,
    };
  },
});

const inboxDiagramWorkflow = createWorkflow({
  id: 'inbox-diagram-workflow',
  inputSchema: mermaidInputSchema,
  outputSchema: inboxDiagramOutputSchema,
})
  .then(normalizeCategories)
  .then(renderDiagram);

inboxDiagramWorkflow.commit();

export { inboxDiagramWorkflow };
