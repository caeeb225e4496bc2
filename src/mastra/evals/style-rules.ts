/**
 * Tone vocabularies and per-category style expectations shared by the
 * evaluators. Category keys are lower-case top-level category names.
 */

export const TONE_GROUPS: Record<string, readonly string[]> = {
  formal: ['formal', 'professional', 'polished'],
  casual: ['casual', 'informal', 'relaxed'],
  friendly: ['friendly', 'warm', 'welcoming'],
  urgent: ['urgent', 'pressing', 'important', 'critical'],
};

// Synonyms accepted when checking whether the tone was detected at all
export const PATTERN_TONE_SYNONYMS: readonly (readonly string[])[] = [
  ['formal', 'professional', 'polished'],
  ['casual', 'informal', 'relaxed'],
  ['friendly', 'warm', 'welcoming'],
  ['urgent', 'pressing', 'important'],
];

// Pairs that earn partial tone credit
export const RELATED_TONES: ReadonlyArray<readonly [string, string]> = [
  ['formal', 'casual'],
  ['friendly', 'warm'],
  ['urgent', 'important'],
];

export const FORMALITY_LEVELS = ['low', 'medium', 'high'] as const;

export interface CategoryStyle {
  tones: readonly string[];
  formality: readonly string[];
}

// What the agent's own tone/formality should look like for a category
export const CONSISTENCY_RULES: Record<string, CategoryStyle> = {
  work: { tones: ['professional', 'formal'], formality: ['high', 'medium'] },
  hockey: { tones: ['casual', 'friendly'], formality: ['low', 'medium'] },
  personal: { tones: ['casual', 'friendly', 'warm'], formality: ['low', 'medium'] },
  finance: { tones: ['formal', 'professional'], formality: ['high'] },
  shopping: { tones: ['friendly', 'casual'], formality: ['medium', 'low'] },
  organizational: { tones: ['formal', 'professional'], formality: ['high'] },
};

// Acceptable reply style for emails of a category
export const APPROPRIATENESS_RULES: Record<string, CategoryStyle> = {
  work: { tones: ['professional', 'formal', 'polite'], formality: ['high', 'medium'] },
  hockey: { tones: ['casual', 'friendly', 'warm'], formality: ['low', 'medium'] },
  personal: { tones: ['casual', 'friendly', 'warm'], formality: ['low', 'medium'] },
  finance: { tones: ['formal', 'professional'], formality: ['high'] },
  organizational: { tones: ['formal', 'professional'], formality: ['high'] },
};

/** Own entries only, so names like "constructor" are unknown categories. */
export function styleFor(rules: Record<string, CategoryStyle>, category: string): CategoryStyle | undefined {
  return Object.hasOwn(rules, category) ? rules[category] : undefined;
}
