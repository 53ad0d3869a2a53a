/**
 * Page run library exports
 */
export { walkPages, type WalkPagesDeps, type WalkPagesOptions, type DelayRange } from './walk-pages';
export {
  createRunOrchestrator,
  type RunOrchestrator,
  type RunOrchestratorDeps,
  type RunOrchestratorOptions,
} from './run-once';
