import { z } from 'zod';

const emailAddressSchema = z.object({
  email: z.string(),
  name: z.string().optional(),
});

// Normalized email schema
export const normalizedEmailSchema = z.object({
  id: z.string(),
  threadId: z.string().optional(),
  subject: z.string(),
  body: z.string(),
  from: emailAddressSchema,
  to: z.array(emailAddressSchema),
  date: z.string(),
  snippet: z.string().optional(),
  hasAttachments: z.boolean(),
  labels: z.array(z.string()).optional(),
});

// Gmail connection managed by Nango; falls back to GMAIL_CONNECTION_ID
const connectionIdSchema = z
  .string()
  .optional()
  .describe('Nango connection id of the Gmail account. Omit to use the configured default.');

export const searchEmailsInputSchema = z.object({
  connectionId: connectionIdSchema,
  query: z.string().default('in:inbox').describe('Gmail search query, e.g. "in:inbox newer_than:7d"'),
  maxResults: z.number().int().min(1).max(500).default(50),
  bodyPreviewLength: z.number().int().min(0).default(2000),
});

export const readEmailInputSchema = z.object({
  connectionId: connectionIdSchema,
  messageId: z.string(),
});

export const draftInputSchema = z.object({
  connectionId: connectionIdSchema,
  to: z.array(z.string()).min(1),
  subject: z.string(),
  body: z.string(),
  threadId: z.string().optional().describe('Thread to attach the draft to when replying'),
  inReplyTo: z.string().optional().describe('Message-ID header of the email being answered'),
});

export const draftResultSchema = z.object({
  draftId: z.string(),
  messageId: z.string().optional(),
  threadId: z.string().optional(),
});

export const applyLabelInputSchema = z.object({
  connectionId: connectionIdSchema,
  messageIds: z.array(z.string()).min(1),
  category: z.string().describe('Category path, e.g. "Work/Project Alpha"'),
});

export const labelApplicationResultSchema = z.object({
  labelId: z.string(),
  labelName: z.string(),
  created: z.boolean(),
  labeledCount: z.number(),
});

// Type exports
export type NormalizedEmail = z.infer<typeof normalizedEmailSchema>;
export type EmailAddress = z.infer<typeof emailAddressSchema>;
export type DraftInput = z.infer<typeof draftInputSchema>;
export type DraftResult = z.infer<typeof draftResultSchema>;
export type LabelApplicationResult = z.infer<typeof labelApplicationResultSchema>;
