/**
 * Analysis entity - public API
 */
export {
  type AnalysisResult,
  type AnalysisError,
  type AnalysisOutcome,
  type ContentAnalyzer,
  describeAnalysisError,
} from './types';
