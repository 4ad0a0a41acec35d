/**
 * `nlcmd train` - fit the naive Bayes classifier on the curated dataset
 * and save it for later runs (`modelPath` in the config).
 */

import { loadConfig } from '../../config/index.js';
import { DEFAULT_DATASET_PATH, datasetEntries, loadDataset } from '../../dataset/index.js';
import { DatasetError } from '../../resolver/index.js';
import { BayesCommandClassifier, saveModel } from '../../classifier/index.js';
import { extractFlag } from '../args.js';

export const DEFAULT_MODEL_PATH = 'nlcmd-model.json';

/**
 * CLI entry for `train`.
 *
 * Output path: --out, else the configured modelPath, else
 * nlcmd-model.json in the working directory.
 *
 * @returns Exit code: 0 once saved, 1 when the dataset is unavailable or empty
 */
export async function trainCommand(args: string[]): Promise<number> {
  try {
    const config = await loadConfig(extractFlag(args, 'config'));
    const datasetPath = extractFlag(args, 'dataset') ?? config.datasetPath;
    const dataset = loadDataset(datasetPath);
    const entries = dataset ? datasetEntries(dataset) : [];
    if (entries.length === 0) {
      throw new DatasetError('Dataset unavailable or empty, nothing to train on', datasetPath ?? DEFAULT_DATASET_PATH);
    }

    const classifier = BayesCommandClassifier.fromEntries(entries);
    const out = extractFlag(args, 'out') ?? config.modelPath ?? DEFAULT_MODEL_PATH;
    saveModel(classifier, out);

    console.log(JSON.stringify({
      saved: out,
      documents: entries.length,
      labels: classifier.labels.length,
    }, null, 2));
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ error: message }, null, 2));
    return 1;
  }
}
