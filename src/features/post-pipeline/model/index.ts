/**
 * Post pipeline model exports
 */
export type {
  PipelineState,
  TerminalPipelineState,
  ActivePipelineState,
  PipelineEvent,
  PostOutcome,
  PipelineOptions,
} from './types';
