import { createTool } from '@mastra/core/tools';
import { mermaidInputSchema, mermaidOutputSchema } from '../schemas/category-schemas';
import { renderCategoryDiagram } from './mermaid-generator';

export const createMermaidDiagramTool = createTool({
  id: 'create-mermaid-diagram',
  description: `Generate a Mermaid diagram of the inbox category hierarchy.
Pass every category with its id, name, parent_id (null for top-level categories) and email_count.
Returns a fenced mermaid block to show the user as-is.`,
  inputSchema: mermaidInputSchema,
  outputSchema: mermaidOutputSchema,
  execute: async (inputData) => {
    const { categories } = inputData;
    return {
      diagram: renderCategoryDiagram(categories),
      categoryCount: categories.length,
    };
  },
});
