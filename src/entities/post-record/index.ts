/**
 * Post record entity - public API
 */
export {
  type PostState,
  type TerminalState,
  type PipelineStage,
  type SkipReason,
  type PostHandle,
  type PostRecord,
} from './types';
