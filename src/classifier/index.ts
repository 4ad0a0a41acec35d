/**
 * Intent classifier capability and its naive Bayes implementation.
 */

export { ClassifierModelSchema, TrainingDocumentSchema } from './types.js';
export type {
  ClassifierModel,
  ClassifierPrediction,
  CommandClassifier,
  RankedPrediction,
  TrainingDocument,
} from './types.js';
export { BayesCommandClassifier, saveModel, loadModel } from './bayes-command-classifier.js';
