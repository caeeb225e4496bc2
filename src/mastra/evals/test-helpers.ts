import {
  triageExpectationSchema,
  triageOutputSchema,
  type TriageExpectation,
  type TriageOutput,
} from '../schemas/evaluation-schemas';

export const triageOutput = (fields: Partial<TriageOutput>): TriageOutput => triageOutputSchema.parse(fields);

export const expectation = (fields: Partial<TriageExpectation>): TriageExpectation =>
  triageExpectationSchema.parse(fields);
