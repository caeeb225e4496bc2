import { logger } from '../config/logger';
import type { DatasetExample, TriageExpectation, TriageOutput } from '../schemas/evaluation-schemas';
import { buildTriagePrompt, failedTriageOutput, parseTriageResponse } from './triage-response';

export type GenerateText = (prompt: string) => Promise<string>;

export interface TriageRun {
  emailId: string;
  output: TriageOutput;
  expectation: TriageExpectation;
}

/**
 * Ask the agent about every example, `concurrency` at a time.
 * A failed call becomes an error output for that example only.
 */
export async function runTriageExamples(
  examples: DatasetExample[],
  generate: GenerateText,
  concurrency = 3,
): Promise<TriageRun[]> {
  const runs: TriageRun[] = [];
  const batchSize = Math.max(1, Math.floor(concurrency));

  for (let i = 0; i < examples.length; i += batchSize) {
    const batch = examples.slice(i, i + batchSize);
    const batchRuns = await Promise.all(
      batch.map(async ({ inputs, outputs }): Promise<TriageRun> => {
        try {
          const text = await generate(buildTriagePrompt(inputs));
          return { emailId: inputs.emailId, output: parseTriageResponse(text), expectation: outputs };
        } catch (err) {
          logger.warn('[TriageEval] Agent failed on example', {
            emailId: inputs.emailId,
            error: err instanceof Error ? err.message : String(err),
          });
          return { emailId: inputs.emailId, output: failedTriageOutput(err), expectation: outputs };
        }
      }),
    );
    runs.push(...batchRuns);
  }

  return runs;
}
