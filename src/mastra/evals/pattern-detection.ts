import type { EvaluationResult, TriageExpectation, TriageOutput } from '../schemas/evaluation-schemas';
import { CONSISTENCY_RULES, styleFor } from './style-rules';
import { formatScore, normalize, parentCategory, tonesMatch } from './text';

const HIGH_CONFIDENCE = 0.8;
const MEDIUM_CONFIDENCE = 0.6;

/** How well the stated confidence fits the outcome, 0..1. */
export function calibrationFactor(confidence: number, correct: boolean): number {
  if (confidence >= HIGH_CONFIDENCE) return correct ? 1.0 : 0.0;
  if (confidence < MEDIUM_CONFIDENCE) return correct ? 0.6 : 0.8;
  return 0.7;
}

/**
 * Check that the agent picked up category, tone and formality, weighted 70/30
 * with confidence calibration.
 */
export function patternDetection(run: TriageOutput, example: TriageExpectation): EvaluationResult {
  const categoryExpected = normalize(example.expectedCategory);
  const toneExpected = normalize(example.expectedTone);
  const formalityExpected = normalize(example.expectedFormality);

  const categoryCorrect = normalize(run.category) === categoryExpected;
  const toneCorrect = tonesMatch(normalize(run.tone), toneExpected);
  const formalityCorrect = normalize(run.formality) === formalityExpected;

  const detected = [categoryCorrect, toneCorrect, formalityCorrect].filter(Boolean).length;
  const calibration = calibrationFactor(run.confidence, categoryCorrect);
  const score = (detected / 3) * 0.7 + calibration * 0.3;

  const lines = [
    `Pattern Detection: ${detected}/3`,
    categoryCorrect
      ? '  ✅ Category pattern recognized'
      : `  ❌ Category pattern missed (expected: ${categoryExpected})`,
    toneCorrect ? '  ✅ Tone pattern recognized' : `  ❌ Tone pattern missed (expected: ${toneExpected})`,
    formalityCorrect
      ? '  ✅ Formality pattern recognized'
      : `  ❌ Formality pattern missed (expected: ${formalityExpected})`,
    calibration > 0.7
      ? `  ✅ Confidence well-calibrated (${formatScore(run.confidence)})`
      : `  ⚠️  Confidence calibration issue (${formatScore(run.confidence)})`,
  ];

  return { key: 'pattern_detection', score, comment: lines.join('\n') };
}

/**
 * High confidence should come with right answers, low confidence with wrong ones.
 */
export function confidenceCalibration(run: TriageOutput, example: TriageExpectation): EvaluationResult {
  const { confidence } = run;
  const correct = normalize(run.category) === normalize(example.expectedCategory);
  const shown = formatScore(confidence);
  const key = 'confidence_calibration';

  if (confidence >= HIGH_CONFIDENCE) {
    return correct
      ? { key, score: 1.0, comment: `✅ Well-calibrated: High confidence (${shown}) and correct prediction` }
      : { key, score: 0.0, comment: `❌ Overconfident: High confidence (${shown}) but incorrect prediction` };
  }

  if (confidence < MEDIUM_CONFIDENCE) {
    return correct
      ? { key, score: 0.6, comment: `⚠️  Under-confident: Low confidence (${shown}) but prediction was correct` }
      : { key, score: 0.8, comment: `✅ Well-calibrated: Low confidence (${shown}) and incorrect prediction` };
  }

  return correct
    ? { key, score: 0.8, comment: `✅ Reasonable: Medium confidence (${shown}) and correct` }
    : { key, score: 0.5, comment: `⚠️  Medium confidence (${shown}) but incorrect` };
}

/**
 * The agent's own tone and formality should suit the category it chose.
 * Needs no label beyond the run itself.
 */
export function internalConsistency(run: TriageOutput, _example: TriageExpectation): EvaluationResult {
  const category = parentCategory(normalize(run.category));
  const tone = normalize(run.tone);
  const formality = normalize(run.formality);
  const key = 'internal_consistency';

  const rules = styleFor(CONSISTENCY_RULES, category);
  if (!rules) {
    return { key, score: 0.5, comment: `⚠️  Cannot evaluate consistency for category: ${category}` };
  }

  const toneConsistent = rules.tones.some(expected => tone.includes(expected));
  const formalityConsistent = rules.formality.includes(formality);

  if (toneConsistent && formalityConsistent) {
    return { key, score: 1.0, comment: `✅ Internally consistent: ${category} → ${tone}/${formality}` };
  }
  if (toneConsistent || formalityConsistent) {
    return { key, score: 0.5, comment: `⚠️  Partially consistent: ${category} → ${tone}/${formality}` };
  }
  return { key, score: 0.0, comment: `❌ Inconsistent: ${category} should not have ${tone}/${formality}` };
}
