import { describe, expect, it } from 'vitest';
import { categoryAccuracy, hierarchicalCategory } from './category-accuracy';
import { expectation, triageOutput } from './test-helpers';

const score = (
  evaluator: typeof categoryAccuracy,
  predicted: string,
  expected: string,
) => evaluator(triageOutput({ category: predicted }), expectation({ expectedCategory: expected })).score;

describe('categoryAccuracy', () => {
  it('gives full credit for an exact match ignoring case and spacing', () => {
    const result = categoryAccuracy(
      triageOutput({ category: ' Work > Project Alpha ' }),
      expectation({ expectedCategory: 'work > project alpha' }),
    );

    expect(result).toEqual({
      key: 'category_accuracy',
      score: 1.0,
      comment: "✅ Perfect match: 'work > project alpha'",
    });
  });

  it('gives 0.7 when only the parent category matches', () => {
    expect(score(categoryAccuracy, 'Work > Meetings', 'Work > Project Alpha')).toBe(0.7);
  });

  it('gives 0.5 when one category contains the other', () => {
    expect(score(categoryAccuracy, 'Bank', 'Finance > Banking')).toBe(0.5);
  });

  it('gives nothing for an unrelated category', () => {
    const result = categoryAccuracy(
      triageOutput({ category: 'Shopping' }),
      expectation({ expectedCategory: 'Personal' }),
    );

    expect(result.score).toBe(0);
    expect(result.comment).toBe("❌ Incorrect category\nExpected: 'personal'\nGot: 'shopping'");
  });

  it('scores a missing prediction as Unknown', () => {
    const result = categoryAccuracy(triageOutput({}), expectation({ expectedCategory: 'Work' }));

    expect(result.comment).toBe("❌ Incorrect category\nExpected: 'work'\nGot: 'unknown'");
  });
});

describe('hierarchicalCategory', () => {
  it('gives full credit when parent and child match', () => {
    expect(score(hierarchicalCategory, 'Work > Project Alpha', 'work>project alpha')).toBe(1.0);
  });

  it('gives 0.7 for the right parent with the wrong child', () => {
    expect(score(hierarchicalCategory, 'Work > Meetings', 'Work > Project Alpha')).toBe(0.7);
  });

  it('gives 0.5 for the right child under the wrong parent', () => {
    expect(score(hierarchicalCategory, 'Personal > Family', 'Work > Family')).toBe(0.5);
  });

  it('gives 0.3 for a flat answer where a subcategory was expected', () => {
    expect(score(hierarchicalCategory, 'Work', 'Work > Project Alpha')).toBe(0.3);
  });

  it('accepts equal flat categories', () => {
    const result = hierarchicalCategory(
      triageOutput({ category: 'Finance' }),
      expectation({ expectedCategory: 'finance' }),
    );

    expect(result).toEqual({ key: 'hierarchical_accuracy', score: 1.0, comment: '✅ Correct flat category' });
  });

  it('gives nothing when neither level matches', () => {
    expect(score(hierarchicalCategory, 'Hockey > Team A', 'Finance > Banking')).toBe(0);
  });
});
