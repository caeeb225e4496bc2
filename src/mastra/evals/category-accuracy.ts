import type { EvaluationResult, TriageExpectation, TriageOutput } from '../schemas/evaluation-schemas';
import { categorySegments, normalize, parentCategory } from './text';

/**
 * Score the predicted category against the labelled one.
 *
 * 1.0 exact, 0.7 same top-level category, 0.5 one contains the other, else 0.
 */
export function categoryAccuracy(run: TriageOutput, example: TriageExpectation): EvaluationResult {
  const predicted = normalize(run.category);
  const expected = normalize(example.expectedCategory);
  const key = 'category_accuracy';

  if (predicted === expected) {
    return { key, score: 1.0, comment: `✅ Perfect match: '${expected}'` };
  }

  if (parentCategory(predicted) === parentCategory(expected)) {
    return {
      key,
      score: 0.7,
      comment: `⚠️  Parent category correct\nExpected: '${expected}'\nGot: '${predicted}'`,
    };
  }

  if (predicted.includes(expected) || expected.includes(predicted)) {
    return { key, score: 0.5, comment: `⚠️  Partial match\nExpected: '${expected}'\nGot: '${predicted}'` };
  }

  return { key, score: 0.0, comment: `❌ Incorrect category\nExpected: '${expected}'\nGot: '${predicted}'` };
}

/**
 * Score parent and subcategory separately, so a right subcategory under the
 * wrong parent still earns credit.
 */
export function hierarchicalCategory(run: TriageOutput, example: TriageExpectation): EvaluationResult {
  const predicted = normalize(run.category);
  const expected = normalize(example.expectedCategory);
  const predictedParts = categorySegments(predicted);
  const expectedParts = categorySegments(expected);
  const key = 'hierarchical_accuracy';

  if (predictedParts.length > 1 && expectedParts.length > 1) {
    const [predictedParent, predictedChild] = predictedParts;
    const [expectedParent, expectedChild] = expectedParts;

    if (predictedParent === expectedParent && predictedChild === expectedChild) {
      return { key, score: 1.0, comment: '✅ Perfect hierarchical match' };
    }
    if (predictedParent === expectedParent) {
      return {
        key,
        score: 0.7,
        comment: `⚠️  Parent correct, subcategory wrong\nExpected child: '${expectedChild}'\nGot: '${predictedChild}'`,
      };
    }
    if (predictedChild === expectedChild) {
      return {
        key,
        score: 0.5,
        comment: `⚠️  Subcategory correct, parent wrong\nExpected parent: '${expectedParent}'\nGot: '${predictedParent}'`,
      };
    }
  }

  if (expectedParts.length > 1 && predictedParts.length === 1) {
    return {
      key,
      score: 0.3,
      comment: `⚠️  Expected hierarchical category, got flat\nExpected: '${expected}'\nGot: '${predicted}'`,
    };
  }

  if (predictedParts.length === 1 && expectedParts.length === 1 && predicted === expected) {
    return { key, score: 1.0, comment: '✅ Correct flat category' };
  }

  return { key, score: 0.0, comment: `❌ Category structure mismatch\nExpected: '${expected}'\nGot: '${predicted}'` };
}
