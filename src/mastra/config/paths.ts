import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

function expandTilde(p: string): string {
  return p.startsWith('~') ? p.replace('~', homedir()) : p;
}

const defaultDatasetPath = fileURLToPath(new URL('../../../datasets/triage-examples.json', import.meta.url));

export const DATASET_PATH = process.env.TRIAGE_DATASET_PATH
  ? resolve(expandTilde(process.env.TRIAGE_DATASET_PATH))
  : defaultDatasetPath;

export const MASTRA_DB_URL = process.env.MASTRA_DB_URL || 'file:../mastra.db';
