import { createStep, createWorkflow } from '@mastra/core/workflows';
import { z } from 'zod';
import {
  datasetExampleSchema,
  evaluationReportSchema,
  triageExpectationSchema,
  triageOutputSchema,
} from '../schemas/evaluation-schemas';
import { evaluateTriage, loadDataset, summarizeEvaluations } from '../evals';
import { runTriageExamples } from '../evals/runner';
import { logger } from '../config/logger';

const evaluationInputSchema = z.object({
  datasetPath: z.string().optional(),
  limit: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().default(3),
});

const loadedDatasetSchema = z.object({
  examples: z.array(datasetExampleSchema),
  concurrency: z.number(),
});

const triageRunsSchema = z.object({
  runs: z.array(z.object({
    emailId: z.string(),
    output: triageOutputSchema,
    expectation: triageExpectationSchema,
  })),
});

// Step 1: Load the labelled examples
const loadExamples = createStep({
  id: 'load-dataset',
  description: 'Loads and validates the labelled evaluation dataset',
  inputSchema: evaluationInputSchema,
  outputSchema: loadedDatasetSchema,
  execute: async ({ inputData }) => {
    if (!inputData) throw new Error('Input data required');

    const { datasetPath, limit, concurrency } = inputData;
    const examples = await loadDataset(datasetPath);
    const selected = limit ? examples.slice(0, limit) : examples;

    logger.info('[TriageEval] Dataset loaded', { total: examples.length, selected: selected.length });

    return { examples: selected, concurrency };
  },
});

// Step 2: Ask the triage agent about each example
const runTriageAgent = createStep({
  id: 'run-triage-agent',
  description: 'Runs the triage agent on every example and parses its answers',
  inputSchema: loadedDatasetSchema,
  outputSchema: triageRunsSchema,
  execute: async ({ inputData, mastra }) => {
    if (!inputData) throw new Error('Input data required');

    const agent = mastra?.getAgent('emailTriageAgent');
    if (!agent) throw new Error('Email triage agent not found');

    const runs = await runTriageExamples(
      inputData.examples,
      async (prompt) => {
        const response = await agent.generate([{ role: 'user', content: prompt }]);
        return response.text || '';
      },
      inputData.concurrency,
    );

    return { runs };
  },
});

// Step 3: Score every run and summarize
const scoreRuns = createStep({
  id: 'score-runs',
  description: 'Applies every triage evaluator and averages the scores',
  inputSchema: triageRunsSchema,
  outputSchema: evaluationReportSchema,
  execute: async ({ inputData }) => {
    if (!inputData) throw new Error('Input data required');

    const examples = inputData.runs.map(run => evaluateTriage(run.emailId, run.output, run.expectation));
    const summary = summarizeEvaluations(examples);

    logger.info('[TriageEval] Evaluation finished', {
      exampleCount: summary.exampleCount,
      failedCount: summary.failedCount,
      overallScore: summary.overallScore,
    });

    return { examples, summary };
  },
});

const triageEvaluationWorkflow = createWorkflow({
  id: 'triage-evaluation-workflow',
  inputSchema: evaluationInputSchema,
  outputSchema: evaluationReportSchema,
})
  .then(loadExamples)
  .then(runTriageAgent)
  .then(scoreRuns);

triageEvaluationWorkflow.commit();

export { triageEvaluationWorkflow };
