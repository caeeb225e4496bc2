import { Agent } from '@mastra/core/agent';
import { getModelConfig } from '../config/model';
import { createMermaidDiagramTool } from '../tools/mermaid-diagram-tool';
import {
  applyCategoryLabelTool,
  createDraftTool,
  listCategoriesTool,
  readEmailTool,
  searchEmailsTool,
} from '../tools/gmail-tools';
import { triageInstructions } from './triage-instructions';

export const emailTriageAgent = new Agent({
  id: 'email-triage-agent',
  name: 'Email Triage Assistant',
  description: 'Categorizes the inbox into a label hierarchy, drafts replies and draws the category diagram',
  model: getModelConfig(),
  instructions: triageInstructions,
  tools: {
    searchEmailsTool,
    readEmailTool,
    applyCategoryLabelTool,
    listCategoriesTool,
    createDraftTool,
    createMermaidDiagramTool,
  },
});
