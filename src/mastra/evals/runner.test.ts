import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../config/logger';
import type { DatasetExample } from '../schemas/evaluation-schemas';
import { runTriageExamples } from './runner';

function example(emailId: string, subject: string): DatasetExample {
  return {
    inputs: { emailId, from: 'sender@example.com', subject, body: 'Body text', hasAttachments: false },
    outputs: { expectedCategory: subject, expectedTone: '', expectedFormality: '', requiresResponse: false },
  };
}

// Answers with the email subject as the category after a short delay
function fakeAgent() {
  let inFlight = 0;
  let maxInFlight = 0;

  const generate = async (prompt: string): Promise<string> => {
    inFlight += 1;
    maxInFlight = Math.max(maxInFlight, inFlight);
    await new Promise(resolve => setTimeout(resolve, 5));
    inFlight -= 1;

    const subject = /^Subject: (.*)$/m.exec(prompt)?.[1] ?? '';
    if (subject === 'Broken') throw new Error('model unavailable');
    return `Category: ${subject}\nConfidence: 0.9`;
  };

  return { generate, maxInFlight: () => maxInFlight };
}

describe('runTriageExamples', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps dataset order and runs at most `concurrency` calls at once', async () => {
    const agent = fakeAgent();
    const examples = ['Finance', 'Hockey', 'Personal', 'Shopping', 'Work'].map((subject, i) =>
      example(`e${i + 1}`, subject),
    );

    const runs = await runTriageExamples(examples, agent.generate, 2);

    expect(runs.map(run => run.emailId)).toEqual(['e1', 'e2', 'e3', 'e4', 'e5']);
    expect(runs.map(run => run.output.category)).toEqual(['Finance', 'Hockey', 'Personal', 'Shopping', 'Work']);
    expect(runs[0].output.confidence).toBe(0.9);
    expect(runs[0].expectation).toBe(examples[0].outputs);
    expect(agent.maxInFlight()).toBe(2);
  });

  it('records a failed call as an error output and carries on', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const agent = fakeAgent();

    const runs = await runTriageExamples(
      [example('e1', 'Broken'), example('e2', 'Finance')],
      agent.generate,
    );

    expect(runs[0].output).toEqual({
      category: 'Error',
      tone: 'unknown',
      formality: 'unknown',
      confidence: 0,
      requiresResponse: false,
      error: 'model unavailable',
    });
    expect(runs[1].output.category).toBe('Finance');
    expect(warn).toHaveBeenCalledWith('[TriageEval] Agent failed on example', {
      emailId: 'e1',
      error: 'model unavailable',
    });
  });

  it('runs one at a time when concurrency is below one', async () => {
    const agent = fakeAgent();

    const runs = await runTriageExamples([example('e1', 'Finance'), example('e2', 'Work')], agent.generate, 0);

    expect(runs.map(run => run.output.category)).toEqual(['Finance', 'Work']);
    expect(agent.maxInFlight()).toBe(1);
  });
});
