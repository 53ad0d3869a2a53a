/**
 * Post Pipeline feature - public API
 *
 * Takes one discovered post to a terminal state
 */

export { processPost, transition, IllegalTransitionError, type PipelineDeps } from './lib';

export type { PipelineState, PipelineEvent, PostOutcome, PipelineOptions } from './model';
