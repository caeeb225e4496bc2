import {
  triageOutputSchema,
  type EvaluationEmail,
  type TriageOutput,
} from '../schemas/evaluation-schemas';

/**
 * Prompt asking the agent for a line-oriented triage answer.
 */
export function buildTriagePrompt(email: EvaluationEmail): string {
  return `Please classify this email and analyze its characteristics:

From: ${email.from}
Subject: ${email.subject}
Body:
${email.body}

Please provide:
1. The category this email belongs to (use existing categories if available, or suggest a new one)
2. The tone (formal, professional, casual, friendly, warm, urgent)
3. The formality level (high, medium, low)
4. Your confidence in this classification (0.0 to 1.0)
5. Whether this email requires a response (yes/no)

Format your response as:
Category: [category > subcategory]
Tone: [tone]
Formality: [formality]
Confidence: [0.0-1.0]
Requires Response: [yes/no]
Reasoning: [brief explanation]`;
}

function parseConfidence(value: string): number {
  const confidence = value ? Number(value) : Number.NaN;
  if (!Number.isFinite(confidence)) return 0.5;
  return Math.min(1, Math.max(0, confidence));
}

/**
 * Read the "Field: value" lines of a triage answer. Markdown emphasis and
 * list markers around the field names are ignored; missing fields keep
 * their defaults and a repeated field takes its last value.
 */
export function parseTriageResponse(text: string): TriageOutput {
  const fields: Record<string, string> = {};

  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(/\*\*/g, '').replace(/^[\s>*-]+/, '').trim();
    const separator = line.indexOf(':');
    if (separator <= 0) continue;

    const field = line.slice(0, separator).trim().toLowerCase();
    fields[field] = line.slice(separator + 1).trim();
  }

  return triageOutputSchema.parse({
    category: fields['category'] || undefined,
    tone: fields['tone']?.toLowerCase() || undefined,
    formality: fields['formality']?.toLowerCase() || undefined,
    confidence: parseConfidence(fields['confidence'] ?? ''),
    requiresResponse: ['yes', 'true'].includes(fields['requires response']?.toLowerCase() ?? ''),
    reasoning: fields['reasoning'] || undefined,
    rawResponse: text,
  });
}

/** Output recorded for an example the agent failed on. */
export function failedTriageOutput(error: unknown): TriageOutput {
  return triageOutputSchema.parse({
    category: 'Error',
    tone: 'unknown',
    formality: 'unknown',
    confidence: 0,
    requiresResponse: false,
    error: error instanceof Error ? error.message : String(error),
  });
}
