import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import {
  applyLabelInputSchema,
  draftInputSchema,
  draftResultSchema,
  labelApplicationResultSchema,
  normalizedEmailSchema,
  readEmailInputSchema,
  searchEmailsInputSchema,
} from '../schemas/email-schemas';
import { categoryRecordSchema } from '../schemas/category-schemas';
import {
  applyCategoryLabel,
  createDraft,
  getEmail,
  listCategoryLabels,
  resolveConnectionId,
  searchEmails,
} from '../integrations/google';

export const searchEmailsTool = createTool({
  id: 'search-emails',
  description: 'Search the Gmail mailbox. Bodies are cut to bodyPreviewLength characters; use read-email for the full text.',
  inputSchema: searchEmailsInputSchema,
  outputSchema: z.object({ emails: z.array(normalizedEmailSchema) }),
  execute: async (inputData) => {
    const { connectionId, query, maxResults, bodyPreviewLength } = inputData;
    const emails = await searchEmails(resolveConnectionId(connectionId), query, maxResults);

    return {
      emails: emails.map(email => ({
        ...email,
        body: email.body.length > bodyPreviewLength ? `${email.body.substring(0, bodyPreviewLength)}...` : email.body,
      })),
    };
  },
});

export const readEmailTool = createTool({
  id: 'read-email',
  description: 'Read one email in full by its Gmail message id.',
  inputSchema: readEmailInputSchema,
  outputSchema: normalizedEmailSchema,
  execute: async (inputData) => getEmail(resolveConnectionId(inputData.connectionId), inputData.messageId),
});

export const createDraftTool = createTool({
  id: 'create-draft',
  description: 'Save a draft reply in Gmail. The draft is never sent; the user reviews it.',
  inputSchema: draftInputSchema,
  outputSchema: draftResultSchema,
  execute: async (inputData) => {
    const { connectionId, ...draft } = inputData;
    return createDraft(resolveConnectionId(connectionId), draft);
  },
});

export const applyCategoryLabelTool = createTool({
  id: 'apply-category-label',
  description: 'File emails under a category by applying a Gmail label. Use "Parent/Child" for subcategories.',
  inputSchema: applyLabelInputSchema,
  outputSchema: labelApplicationResultSchema,
  execute: async (inputData) => {
    const { connectionId, messageIds, category } = inputData;
    return applyCategoryLabel(resolveConnectionId(connectionId), messageIds, category);
  },
});

export const listCategoriesTool = createTool({
  id: 'list-categories',
  description: 'List the existing inbox categories (Gmail user labels) with email counts, ready for create-mermaid-diagram.',
  inputSchema: z.object({
    connectionId: z.string().optional(),
  }),
  outputSchema: z.object({ categories: z.array(categoryRecordSchema) }),
  execute: async (inputData) => ({
    categories: await listCategoryLabels(resolveConnectionId(inputData.connectionId)),
  }),
});
