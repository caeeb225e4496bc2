import type {
  ExampleEvaluation,
  TriageEvaluator,
  TriageExpectation,
  TriageOutput,
} from '../schemas/evaluation-schemas';
import { categoryAccuracy, hierarchicalCategory } from './category-accuracy';
import { confidenceCalibration, internalConsistency, patternDetection } from './pattern-detection';
import { draftAppropriateness, responseQuality } from './response-quality';

export { categoryAccuracy, hierarchicalCategory } from './category-accuracy';
export { calibrationFactor, confidenceCalibration, internalConsistency, patternDetection } from './pattern-detection';
export { draftAppropriateness, responseQuality } from './response-quality';
export { buildTriagePrompt, failedTriageOutput, parseTriageResponse } from './triage-response';
export { loadDataset } from './dataset';
export { summarizeEvaluations } from './summary';

export const triageEvaluators: TriageEvaluator[] = [
  categoryAccuracy,
  hierarchicalCategory,
  patternDetection,
  confidenceCalibration,
  internalConsistency,
  responseQuality,
  draftAppropriateness,
];

/**
 * Run every evaluator against one agent output.
 */
export function evaluateTriage(
  emailId: string,
  output: TriageOutput,
  expectation: TriageExpectation,
  evaluators: TriageEvaluator[] = triageEvaluators,
): ExampleEvaluation {
  return {
    emailId,
    output,
    results: evaluators.map(evaluate => evaluate(output, expectation)),
  };
}
