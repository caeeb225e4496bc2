import { google, type gmail_v1 } from 'googleapis';
import { getToken } from './nango';
import { logger } from '../config/logger';
import type { CategoryRecord } from '../schemas/category-schemas';
import type {
  DraftInput,
  DraftResult,
  LabelApplicationResult,
  NormalizedEmail,
} from '../schemas/email-schemas';
import {
  buildRawMessage,
  labelsToCategoryRecords,
  normalizeGmailMessage,
} from '../utils/gmail-normalizer';

/**
 * Pick the Gmail connection to use: the explicit one, else GMAIL_CONNECTION_ID.
 */
export function resolveConnectionId(connectionId?: string): string {
  const resolved = connectionId || process.env.GMAIL_CONNECTION_ID;
  if (!resolved) {
    throw new Error('No Gmail connection id given and GMAIL_CONNECTION_ID is not set');
  }
  return resolved;
}

/**
 * Get an authenticated Gmail client with a Nango-managed token.
 */
export async function getGmail(connectionId: string): Promise<gmail_v1.Gmail> {
  const token = await getToken('google-mail', connectionId);
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: token });
  return google.gmail({ version: 'v1', auth });
}

/**
 * Fetch emails matching a Gmail search query.
 *
 * @param query - Gmail search query (e.g. "in:inbox after:2024/01/01")
 */
export async function searchEmails(
  connectionId: string,
  query: string,
  maxResults: number = 50,
): Promise<NormalizedEmail[]> {
  const gmail = await getGmail(connectionId);

  const listResponse = await gmail.users.messages.list({
    userId: 'me',
    q: query,
    maxResults,
  });

  const messageIds = (listResponse.data.messages ?? []).flatMap(msg => (msg.id ? [msg.id] : []));

  logger.info('[Gmail] Search matched messages', { query, count: messageIds.length });

  return Promise.all(
    messageIds.map(async (id) => {
      const detail = await gmail.users.messages.get({ userId: 'me', id, format: 'full' });
      return normalizeGmailMessage(detail.data);
    }),
  );
}

export async function getEmail(connectionId: string, messageId: string): Promise<NormalizedEmail> {
  const gmail = await getGmail(connectionId);
  const detail = await gmail.users.messages.get({ userId: 'me', id: messageId, format: 'full' });
  return normalizeGmailMessage(detail.data);
}

/**
 * Save a draft reply. Nothing is sent.
 */
export async function createDraft(
  connectionId: string,
  draft: Omit<DraftInput, 'connectionId'>,
): Promise<DraftResult> {
  const gmail = await getGmail(connectionId);

  const response = await gmail.users.drafts.create({
    userId: 'me',
    requestBody: {
      message: {
        raw: buildRawMessage(draft),
        threadId: draft.threadId,
      },
    },
  });

  if (!response.data.id) {
    throw new Error('Gmail did not return a draft id');
  }

  logger.info('[Gmail] Draft created', { draftId: response.data.id, threadId: draft.threadId });

  return {
    draftId: response.data.id,
    messageId: response.data.message?.id ?? undefined,
    threadId: response.data.message?.threadId ?? undefined,
  };
}

/**
 * Get all labels for the user's mailbox.
 */
export async function getLabels(connectionId: string): Promise<gmail_v1.Schema$Label[]> {
  const gmail = await getGmail(connectionId);
  const response = await gmail.users.labels.list({ userId: 'me' });
  return response.data.labels ?? [];
}

/**
 * Apply a category label to messages, creating the label when it does not exist.
 * Nested categories use Gmail's "Parent/Child" label naming.
 */
export async function applyCategoryLabel(
  connectionId: string,
  messageIds: string[],
  category: string,
): Promise<LabelApplicationResult> {
  const gmail = await getGmail(connectionId);
  const labels = await getLabels(connectionId);

  let labelId = labels.find(label => label.name === category)?.id ?? undefined;
  let created = false;

  if (!labelId) {
    const response = await gmail.users.labels.create({
      userId: 'me',
      requestBody: {
        name: category,
        labelListVisibility: 'labelShow',
        messageListVisibility: 'show',
      },
    });
    labelId = response.data.id ?? undefined;
    created = true;
  }

  if (!labelId) {
    throw new Error(`Gmail did not return an id for label "${category}"`);
  }

  await gmail.users.messages.batchModify({
    userId: 'me',
    requestBody: { ids: messageIds, addLabelIds: [labelId] },
  });

  logger.info('[Gmail] Category label applied', { category, labelId, created, count: messageIds.length });

  return { labelId, labelName: category, created, labeledCount: messageIds.length };
}

/**
 * Read the user's category labels with their message counts.
 */
export async function listCategoryLabels(connectionId: string): Promise<CategoryRecord[]> {
  const gmail = await getGmail(connectionId);
  const labels = await getLabels(connectionId);

  // labels.list omits counts; fetch each user label for messagesTotal
  const detailed = await Promise.all(
    labels
      .filter(label => label.type === 'user' && label.id)
      .map(async (label) => {
        const response = await gmail.users.labels.get({ userId: 'me', id: label.id ?? '' });
        return response.data;
      }),
  );

  return labelsToCategoryRecords(detailed);
}
