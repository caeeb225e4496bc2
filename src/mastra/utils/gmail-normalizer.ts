import type { CategoryRecord } from '../schemas/category-schemas';
import type { EmailAddress, NormalizedEmail } from '../schemas/email-schemas';

// Gmail API shapes, reduced to the fields we read.
// Fields are nullable to match the googleapis schema types.
export interface GmailHeader {
  name?: string | null;
  value?: string | null;
}

export interface GmailMessagePart {
  mimeType?: string | null;
  filename?: string | null;
  body?: {
    data?: string | null;
    size?: number | null;
  } | null;
  parts?: GmailMessagePart[] | null;
  headers?: GmailHeader[] | null;
}

export interface GmailMessage {
  id?: string | null;
  threadId?: string | null;
  labelIds?: string[] | null;
  snippet?: string | null;
  payload?: GmailMessagePart | null;
  internalDate?: string | null;
}

export interface GmailLabel {
  id?: string | null;
  name?: string | null;
  type?: string | null;
  messagesTotal?: number | null;
}

export const CATEGORY_LABEL_SEPARATOR = '/';

/**
 * Extract a specific header value from Gmail message headers
 */
export function getHeader(headers: GmailHeader[] | null | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const header = headers.find(h => h.name?.toLowerCase() === name.toLowerCase());
  return header?.value ?? undefined;
}

/**
 * Parse email address string like "John Doe <john@example.com>" or "john@example.com"
 */
export function parseEmailAddress(address: string): EmailAddress {
  if (!address) return { email: '' };

  const match = address.match(/^\s*"?([^"<]*?)"?\s*<([^<>]+)>\s*$/);

  if (match) {
    const name = match[1].trim();
    return { email: match[2].trim(), ...(name ? { name } : {}) };
  }

  return { email: address.trim() };
}

/**
 * Parse comma-separated email addresses, ignoring commas inside quoted names
 */
export function parseEmailAddresses(addresses: string | undefined): EmailAddress[] {
  if (!addresses) return [];

  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of addresses) {
    if (char === '"') {
      inQuotes = !inQuotes;
      current += char;
    } else if (char === ',' && !inQuotes) {
      if (current.trim()) parts.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  if (current.trim()) parts.push(current.trim());

  return parts.map(parseEmailAddress);
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function stripHtml(html: string): string {
  return html
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Recursively extract the text body from Gmail message parts.
 * Plain text wins over HTML; HTML is reduced to text.
 */
export function extractBody(part: GmailMessagePart | null | undefined): string {
  if (!part) return '';

  const mimeType = part.mimeType?.toLowerCase() || '';
  if (part.body?.data && (mimeType === 'text/plain' || mimeType === 'text/html')) {
    const decoded = decodeBase64Url(part.body.data);
    return mimeType === 'text/html' ? stripHtml(decoded) : decoded;
  }

  if (part.parts) {
    const plainPart = part.parts.find(p => p.mimeType?.toLowerCase() === 'text/plain');
    if (plainPart) {
      return extractBody(plainPart);
    }

    const htmlPart = part.parts.find(p => p.mimeType?.toLowerCase() === 'text/html');
    if (htmlPart) {
      return extractBody(htmlPart);
    }

    for (const subPart of part.parts) {
      const body = extractBody(subPart);
      if (body) return body;
    }
  }

  return '';
}

function hasAttachments(part: GmailMessagePart | null | undefined): boolean {
  if (!part) return false;
  if (part.filename) return true;
  return part.parts?.some(hasAttachments) ?? false;
}

/**
 * Normalize a single Gmail message to our standard format
 */
export function normalizeGmailMessage(message: GmailMessage): NormalizedEmail {
  const headers = message.payload?.headers;

  let date = getHeader(headers, 'Date') || '';
  if (!date && message.internalDate) {
    date = new Date(parseInt(message.internalDate, 10)).toISOString();
  }

  const body = extractBody(message.payload);

  return {
    id: message.id || '',
    threadId: message.threadId ?? undefined,
    subject: getHeader(headers, 'Subject') || '(no subject)',
    body: body || message.snippet || '',
    from: parseEmailAddress(getHeader(headers, 'From') || ''),
    to: parseEmailAddresses(getHeader(headers, 'To')),
    date,
    snippet: message.snippet ?? undefined,
    hasAttachments: hasAttachments(message.payload),
    labels: message.labelIds ?? undefined,
  };
}

function encodeHeaderValue(value: string): string {
  // RFC 2047 encoded-word for non-ASCII header text
  return /^[\x20-\x7e]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

// CR/LF in a header value would start a new header
function headerSafe(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

/**
 * Build a base64url RFC 2822 message for the Gmail drafts API.
 */
export function buildRawMessage(draft: {
  to: string[];
  subject: string;
  body: string;
  inReplyTo?: string;
}): string {
  const headers = [
    `To: ${draft.to.map(headerSafe).join(', ')}`,
    `Subject: ${encodeHeaderValue(draft.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
  ];

  const inReplyTo = draft.inReplyTo ? headerSafe(draft.inReplyTo) : '';
  if (inReplyTo) {
    headers.push(`In-Reply-To: ${inReplyTo}`, `References: ${inReplyTo}`);
  }

  const raw = `${headers.join('\r\n')}\r\n\r\n${draft.body}`;
  return Buffer.from(raw, 'utf-8').toString('base64url');
}

/**
 * Turn nested user labels ("Work/Project Alpha") into category records.
 * System labels (INBOX, SENT, ...) are skipped.
 */
export function labelsToCategoryRecords(labels: GmailLabel[]): CategoryRecord[] {
  const records: CategoryRecord[] = [];

  for (const label of labels) {
    if (label.type !== 'user' || !label.name) continue;

    const separatorIndex = label.name.lastIndexOf(CATEGORY_LABEL_SEPARATOR);
    records.push({
      id: label.name,
      name: separatorIndex >= 0 ? label.name.slice(separatorIndex + 1) : label.name,
      parent_id: separatorIndex > 0 ? label.name.slice(0, separatorIndex) : null,
      email_count: label.messagesTotal ?? 0,
    });
  }

  return records;
}
