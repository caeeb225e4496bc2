import { Mastra } from '@mastra/core/mastra';
import { LibSQLStore } from '@mastra/libsql';
import { emailTriageAgent } from './agents/email-triage-agent';
import { inboxDiagramWorkflow } from './workflows/inbox-diagram-workflow';
import { triageEvaluationWorkflow } from './workflows/triage-evaluation-workflow';
import { logger } from './config/logger';
import { MASTRA_DB_URL } from './config/paths';

export const mastra = new Mastra({
  agents: { emailTriageAgent },
  workflows: {
    inboxDiagramWorkflow,
    triageEvaluationWorkflow,
  },
  bundler: {
    sourcemap: true,
  },
  storage: new LibSQLStore({
    id: 'mastra-storage',
    url: MASTRA_DB_URL,
  }),
  logger,
});
