/**
 * Post pipeline library exports
 */
export { transition, isTerminal, toPostRecord, IllegalTransitionError } from './transition';
export { processPost, type PipelineDeps } from './process-post';
