export {
  classifyWorkItem,
  evaluateWorkItems,
  normalizeWorkItem,
  type EvaluateOptions,
  type StalenessConfig,
} from './evaluator';
