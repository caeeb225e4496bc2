import type { EvaluationSummary, ExampleEvaluation } from '../schemas/evaluation-schemas';

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Mean score per evaluator key and over all scores, rounded to 3 decimals.
 */
export function summarizeEvaluations(examples: ExampleEvaluation[]): EvaluationSummary {
  const totals = new Map<string, { sum: number; count: number }>();
  let overallSum = 0;
  let overallCount = 0;

  for (const example of examples) {
    for (const result of example.results) {
      const total = totals.get(result.key) ?? { sum: 0, count: 0 };
      total.sum += result.score;
      total.count += 1;
      totals.set(result.key, total);

      overallSum += result.score;
      overallCount += 1;
    }
  }

  const byKey: EvaluationSummary['byKey'] = {};
  for (const [key, total] of totals) {
    byKey[key] = { mean: round(total.sum / total.count), count: total.count };
  }

  return {
    exampleCount: examples.length,
    failedCount: examples.filter(example => example.output.error !== undefined).length,
    overallScore: overallCount > 0 ? round(overallSum / overallCount) : 0,
    byKey,
  };
}
