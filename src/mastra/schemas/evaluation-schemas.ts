import { z } from 'zod';

// Email as presented to the agent during evaluation
export const evaluationEmailSchema = z.object({
  emailId: z.string(),
  from: z.string(),
  subject: z.string(),
  body: z.string(),
  date: z.string().optional(),
  hasAttachments: z.boolean().default(false),
});

// Structured triage answer produced by the agent
export const triageOutputSchema = z.object({
  category: z.string().default('Unknown'),
  tone: z.string().default('unknown'),
  formality: z.string().default('unknown'),
  confidence: z.number().min(0).max(1).default(0.5),
  requiresResponse: z.boolean().default(false),
  reasoning: z.string().optional(),
  rawResponse: z.string().optional(),
  error: z.string().optional(),
});

// Labelled expectation for one dataset example
export const triageExpectationSchema = z.object({
  expectedCategory: z.string().default(''),
  expectedTone: z.string().default(''),
  expectedFormality: z.string().default(''),
  requiresResponse: z.boolean().default(false),
});

export const datasetExampleSchema = z.object({
  inputs: evaluationEmailSchema,
  outputs: triageExpectationSchema,
});

export const datasetSchema = z.array(datasetExampleSchema);

export const evaluationResultSchema = z.object({
  key: z.string(),
  score: z.number().min(0).max(1),
  comment: z.string(),
});

export const exampleEvaluationSchema = z.object({
  emailId: z.string(),
  output: triageOutputSchema,
  results: z.array(evaluationResultSchema),
});

export const evaluationSummarySchema = z.object({
  exampleCount: z.number(),
  failedCount: z.number(),
  overallScore: z.number(),
  byKey: z.record(z.string(), z.object({
    mean: z.number(),
    count: z.number(),
  })),
});

export const evaluationReportSchema = z.object({
  examples: z.array(exampleEvaluationSchema),
  summary: evaluationSummarySchema,
});

// Type exports
export type EvaluationEmail = z.infer<typeof evaluationEmailSchema>;
export type TriageOutput = z.infer<typeof triageOutputSchema>;
export type TriageExpectation = z.infer<typeof triageExpectationSchema>;
export type DatasetExample = z.infer<typeof datasetExampleSchema>;
export type EvaluationResult = z.infer<typeof evaluationResultSchema>;
export type ExampleEvaluation = z.infer<typeof exampleEvaluationSchema>;
export type EvaluationSummary = z.infer<typeof evaluationSummarySchema>;
export type EvaluationReport = z.infer<typeof evaluationReportSchema>;

export type TriageEvaluator = (run: TriageOutput, example: TriageExpectation) => EvaluationResult;
