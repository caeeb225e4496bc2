import { FORMALITY_LEVELS, PATTERN_TONE_SYNONYMS, RELATED_TONES, TONE_GROUPS } from './style-rules';

export const CATEGORY_PATH_SEPARATOR = '>';

export function normalize(value: string): string {
  return value.toLowerCase().trim();
}

/** Split "Work > Project Alpha" into trimmed segments. */
export function categorySegments(category: string): string[] {
  return category.split(CATEGORY_PATH_SEPARATOR).map(segment => segment.trim());
}

export function parentCategory(category: string): string {
  return categorySegments(category)[0];
}

function toneGroupOf(tone: string): string | undefined {
  return Object.keys(TONE_GROUPS).find(group => TONE_GROUPS[group].includes(tone));
}

/** Same tone, or both tones in one synonym group. */
export function tonesMatch(predicted: string, expected: string): boolean {
  if (predicted === expected) return true;
  return PATTERN_TONE_SYNONYMS.some(group => group.includes(predicted) && group.includes(expected));
}

export function toneScore(predicted: string, expected: string): number {
  const predictedGroup = toneGroupOf(predicted) ?? predicted;
  const expectedGroup = toneGroupOf(expected) ?? expected;

  if (predicted === expected || predictedGroup === expectedGroup) return 1.0;

  const related = RELATED_TONES.some(pair => pair.includes(predicted) && pair.includes(expected));
  return related ? 0.7 : 0.0;
}

/** Full credit for the same level, half for one level apart. */
export function formalityScore(predicted: string, expected: string): number {
  if (predicted === expected) return 1.0;

  const levels: readonly string[] = FORMALITY_LEVELS;
  const predictedIndex = levels.indexOf(predicted);
  const expectedIndex = levels.indexOf(expected);
  if (predictedIndex < 0 || expectedIndex < 0) return 0.0;

  return Math.abs(predictedIndex - expectedIndex) === 1 ? 0.5 : 0.0;
}

export function formatScore(value: number): string {
  return value.toFixed(2);
}
