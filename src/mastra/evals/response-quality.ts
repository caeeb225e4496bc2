import type { EvaluationResult, TriageExpectation, TriageOutput } from '../schemas/evaluation-schemas';
import { APPROPRIATENESS_RULES, styleFor } from './style-rules';
import { formalityScore, formatScore, normalize, parentCategory, toneScore } from './text';

/**
 * Weighted match of tone (40%), formality (40%) and the reply-needed flag (20%).
 */
export function responseQuality(run: TriageOutput, example: TriageExpectation): EvaluationResult {
  const predictedTone = normalize(run.tone);
  const expectedTone = normalize(example.expectedTone);
  const predictedFormality = normalize(run.formality);
  const expectedFormality = normalize(example.expectedFormality);

  const tone = toneScore(predictedTone, expectedTone);
  const formality = formalityScore(predictedFormality, expectedFormality);
  const responseNeeded = run.requiresResponse === example.requiresResponse ? 1.0 : 0.0;
  const score = tone * 0.4 + formality * 0.4 + responseNeeded * 0.2;

  const lines = [
    tone === 1.0
      ? `✅ Tone correct: ${expectedTone}`
      : `❌ Tone mismatch: expected '${expectedTone}', got '${predictedTone}'`,
    formality === 1.0
      ? `✅ Formality correct: ${expectedFormality}`
      : `❌ Formality mismatch: expected '${expectedFormality}', got '${predictedFormality}'`,
    responseNeeded === 1.0
      ? '✅ Response requirement correct'
      : `❌ Response requirement wrong: expected ${example.requiresResponse}, got ${run.requiresResponse}`,
  ];

  return {
    key: 'response_quality',
    score,
    comment: `${lines.join('\n')}\n\nOverall Score: ${formatScore(score)}/1.00`,
  };
}

/**
 * Is the tone/formality the agent chose acceptable for the labelled category?
 */
export function draftAppropriateness(run: TriageOutput, example: TriageExpectation): EvaluationResult {
  const category = parentCategory(normalize(example.expectedCategory));
  const tone = normalize(run.tone);
  const formality = normalize(run.formality);
  const key = 'draft_appropriateness';

  const rules = styleFor(APPROPRIATENESS_RULES, category);
  if (!rules) {
    return { key, score: 0.5, comment: `⚠️  Unable to evaluate appropriateness for category: ${category}` };
  }

  const toneAppropriate = rules.tones.some(acceptable => tone.includes(acceptable));
  const formalityAppropriate = rules.formality.includes(formality);

  if (toneAppropriate && formalityAppropriate) {
    return {
      key,
      score: 1.0,
      comment: `✅ Appropriate tone (${tone}) and formality (${formality}) for ${category} emails`,
    };
  }
  if (toneAppropriate || formalityAppropriate) {
    return {
      key,
      score: 0.5,
      comment: `⚠️  Partially appropriate for ${category}\nTone: ${tone}, Formality: ${formality}`,
    };
  }
  return {
    key,
    score: 0.0,
    comment: `❌ Inappropriate tone/formality for ${category}\nGot: ${tone}/${formality}\nExpected: ${rules.tones.join(', ')}/${rules.formality.join(', ')}`,
  };
}
