import { readFile } from 'node:fs/promises';
import { DATASET_PATH } from '../config/paths';
import { datasetSchema, type DatasetExample } from '../schemas/evaluation-schemas';

/**
 * Load and validate the labelled evaluation dataset.
 */
export async function loadDataset(filePath: string = DATASET_PATH): Promise<DatasetExample[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read evaluation dataset ${filePath}: ${reason}`);
  }

  const parsed = datasetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid evaluation dataset ${filePath}: ${parsed.error.message}`);
  }

  return parsed.data;
}
