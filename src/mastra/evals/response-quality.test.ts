import { describe, expect, it } from 'vitest';
import { draftAppropriateness, responseQuality } from './response-quality';
import { expectation, triageOutput } from './test-helpers';

describe('responseQuality', () => {
  it('gives full credit for synonymous tone, equal formality and the right reply flag', () => {
    const result = responseQuality(
      triageOutput({ tone: 'warm', formality: 'low', requiresResponse: true }),
      expectation({ expectedTone: 'friendly', expectedFormality: 'low', requiresResponse: true }),
    );

    expect(result.score).toBeCloseTo(1.0);
    expect(result.comment).toBe(
      '✅ Tone correct: friendly\n✅ Formality correct: low\n✅ Response requirement correct\n\nOverall Score: 1.00/1.00',
    );
  });

  it('gives partial credit for related tones and adjacent formality', () => {
    const result = responseQuality(
      triageOutput({ tone: 'formal', formality: 'medium', requiresResponse: false }),
      expectation({ expectedTone: 'casual', expectedFormality: 'high', requiresResponse: false }),
    );

    expect(result.key).toBe('response_quality');
    expect(result.score).toBeCloseTo(0.68);
    expect(result.comment.endsWith('Overall Score: 0.68/1.00')).toBe(true);
  });

  it('gives nothing when every part is wrong', () => {
    const result = responseQuality(
      triageOutput({ tone: 'urgent', formality: 'low', requiresResponse: false }),
      expectation({ expectedTone: 'casual', expectedFormality: 'high', requiresResponse: true }),
    );

    expect(result.score).toBe(0);
    expect(result.comment.split('\n')[2]).toBe('❌ Response requirement wrong: expected true, got false');
  });

  it('still credits critical as an urgent tone', () => {
    const result = responseQuality(
      triageOutput({ tone: 'critical', formality: 'high', requiresResponse: true }),
      expectation({ expectedTone: 'urgent', expectedFormality: 'high', requiresResponse: true }),
    );

    expect(result.score).toBeCloseTo(1.0);
    expect(result.comment.split('\n')[0]).toBe('✅ Tone correct: urgent');
  });
});

describe('draftAppropriateness', () => {
  const check = (expectedCategory: string, tone: string, formality: string) =>
    draftAppropriateness(triageOutput({ tone, formality }), expectation({ expectedCategory }));

  it('accepts a polite medium-formality reply for work mail', () => {
    expect(check('Work > Project Alpha', 'polite', 'medium')).toEqual({
      key: 'draft_appropriateness',
      score: 1.0,
      comment: '✅ Appropriate tone (polite) and formality (medium) for work emails',
    });
  });

  it('gives half credit when only the tone fits', () => {
    expect(check('Finance', 'formal', 'low').score).toBe(0.5);
  });

  it('lists the acceptable style when nothing fits', () => {
    expect(check('Hockey > Team A', 'formal', 'high')).toEqual({
      key: 'draft_appropriateness',
      score: 0.0,
      comment: '❌ Inappropriate tone/formality for hockey\nGot: formal/high\nExpected: casual, friendly, warm/low, medium',
    });
  });

  it('gives a neutral score for categories without rules', () => {
    expect(check('Shopping', 'friendly', 'low').score).toBe(0.5);
  });

  it.each(['Constructor', '__proto__ > Inbox'])('gives a neutral score for %s', (expectedCategory) => {
    expect(check(expectedCategory, 'casual', 'low').score).toBe(0.5);
  });
});
